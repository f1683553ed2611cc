// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Run the provisioning pipeline. Nothing is tagged unless every step
 * before the commit succeeded.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, type Option } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { GeneralError, ProvisioningError, StagingError } from "../../lib/errors";
import type { ImageBuilder } from "../../provision/builder";
import { provision } from "../../provision/index";
import type { ProvisionPlan } from "../../provision/plan";
import { applyTagOverride, writeJsonResult } from "./utils";

export interface BuildOptions {
  readonly plan: ProvisionPlan;
  readonly tag: Option.Option<string>;
  readonly format: LogFormat;
}

export const executeBuild = (
  options: BuildOptions
): Effect.Effect<
  void,
  GeneralError | ProvisioningError | StagingError,
  ImageBuilder | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const plan = yield* applyTagOverride(options.plan, options.tag);
    yield* Effect.logDebug(`Build context: ${plan.contextDir}`);
    const result = yield* provision(plan).pipe(Effect.annotateLogs("image", plan.tag));
    yield* writeJsonResult(options.format, result);
  });
