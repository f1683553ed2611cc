// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Helpers shared by the image commands.
 */

import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { GeneralError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { decodeContainerImage, parseErrorToGeneralError } from "../../lib/types";
import { type ProvisionPlan, withTag } from "../../provision/plan";

/** `--tag` wins over the descriptor's `[image].tag`. */
export const applyTagOverride = (
  plan: ProvisionPlan,
  tag: Option.Option<string>
): Effect.Effect<ProvisionPlan, GeneralError> =>
  Option.match(tag, {
    onNone: (): Effect.Effect<ProvisionPlan, GeneralError> => Effect.succeed(plan),
    onSome: (value): Effect.Effect<ProvisionPlan, GeneralError> =>
      pipe(
        decodeContainerImage(value),
        Effect.mapError(parseErrorToGeneralError),
        Effect.map((image) => withTag(plan, image))
      ),
  });

/** Machine-readable result on stdout in json mode; nothing in pretty mode. */
export const writeJsonResult = (format: LogFormat, value: unknown): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () => writeOutput(JSON.stringify(value))),
    Match.when("pretty", () => Effect.void),
    Match.exhaustive
  );
