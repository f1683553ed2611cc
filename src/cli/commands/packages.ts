// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { type Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { writeOutput } from "../../lib/log";
import type { ProvisionPlan } from "../../provision/plan";

export interface PackagesOptions {
  readonly plan: ProvisionPlan;
  readonly format: LogFormat;
}

/** The resolved Package Set, deduplicated, one name per line. */
export const executePackages = (options: PackagesOptions): Effect.Effect<void> =>
  pipe(
    Match.value(options.format),
    Match.when("json", () => writeOutput(JSON.stringify(options.plan.packages))),
    Match.when("pretty", () => writeOutput(options.plan.packages.join("\n"))),
    Match.exhaustive
  );
