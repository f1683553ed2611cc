// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

/** Zero or more descriptor files; empty falls back to IMAGESMITH_CONFIG. */
export const descriptorArgs: Args<string[]> = A.text({ name: "descriptor" }).pipe(
  A.withDescription("Path to a TOML descriptor (later files override earlier ones)"),
  A.repeated
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly context: Options<Option.Option<string>>;
  readonly debugDelay: Options<number>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  context: O.text("context").pipe(
    O.withAlias("C"),
    O.withDescription("Build context directory (default: directory of the first descriptor)"),
    O.optional
  ),
  debugDelay: O.integer("debug-delay").pipe(
    O.withDefault(0),
    O.withDescription("Seconds to sleep before doing anything, to attach a debugger")
  ),
};

// Per-command options

export const tag: Options<Option.Option<string>> = O.text("tag").pipe(
  O.withAlias("t"),
  O.withDescription("Image tag (overrides [image].tag)"),
  O.optional
);

export const output: Options<Option.Option<string>> = O.text("output").pipe(
  O.withAlias("o"),
  O.withDescription("Write to this file instead of stdout"),
  O.optional
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly context: Option.Option<string>;
  readonly debugDelay: number;
}

export interface CommandArgs extends GlobalOptions {
  readonly descriptors: readonly string[];
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
