// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Containerfile output for engines that build from one.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { renderContainerfile } from "../../containerfile/generator";
import type { ConfigError, SystemError } from "../../lib/errors";
import { logSuccess, writeOutput } from "../../lib/log";
import { toAbsolutePathEffect } from "../../lib/paths";
import type { ProvisionPlan } from "../../provision/plan";
import { writeFile } from "../../system/fs";

export interface RenderOptions {
  readonly plan: ProvisionPlan;
  readonly output: Option.Option<string>;
}

export const executeRender = (
  options: RenderOptions
): Effect.Effect<void, ConfigError | SystemError, FileSystem.FileSystem> => {
  const containerfile = renderContainerfile(options.plan);
  return Option.match(options.output, {
    onNone: (): Effect.Effect<void> => writeOutput(containerfile),
    onSome: (file): Effect.Effect<void, ConfigError | SystemError, FileSystem.FileSystem> =>
      Effect.gen(function* () {
        const target = yield* toAbsolutePathEffect(file);
        yield* writeFile(target, containerfile);
        yield* logSuccess(`Wrote ${target}`);
      }),
  });
};
