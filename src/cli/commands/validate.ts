// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Descriptor validation without side effects. Loading and planning have
 * already run by the time this executes, so reaching it means every file
 * parsed and the merged descriptor passed the schema.
 */

import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { LoadedDescriptor } from "../../config/loader";
import { logSuccess } from "../../lib/log";
import type { ProvisionPlan } from "../../provision/plan";
import { writeJsonResult } from "./utils";

export interface ValidateOptions {
  readonly descriptor: LoadedDescriptor;
  readonly plan: ProvisionPlan;
  readonly format: LogFormat;
}

export const executeValidate = (options: ValidateOptions): Effect.Effect<void> =>
  Effect.gen(function* () {
    const { descriptor, plan, format } = options;
    yield* Effect.logDebug(`Validated ${descriptor.files.join(", ")}`);
    yield* logSuccess(
      `Descriptor is valid: ${plan.packages.length} package(s) on ${plan.baseImage}`
    );
    yield* writeJsonResult(format, {
      valid: true,
      files: descriptor.files,
      baseImage: plan.baseImage,
      tag: plan.tag,
      manager: plan.manager.name,
      packages: plan.packages,
    });
  });
