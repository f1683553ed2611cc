// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import type { FileSystem } from "@effect/platform";
import { Effect, type Option } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { GeneralError, SystemError, VerificationError } from "../../lib/errors";
import type { ImageBuilder } from "../../provision/builder";
import type { ProvisionPlan } from "../../provision/plan";
import { verifyImage } from "../../provision/verify";
import { applyTagOverride, writeJsonResult } from "./utils";

export interface VerifyOptions {
  readonly plan: ProvisionPlan;
  readonly tag: Option.Option<string>;
  readonly format: LogFormat;
}

/** Check a built image against the descriptor it was built from. */
export const executeVerify = (
  options: VerifyOptions
): Effect.Effect<
  void,
  GeneralError | SystemError | VerificationError,
  ImageBuilder | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const plan = yield* applyTagOverride(options.plan, options.tag);
    const report = yield* verifyImage(plan).pipe(Effect.annotateLogs("image", plan.tag));
    yield* writeJsonResult(options.format, report);
  });
