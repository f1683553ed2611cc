// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML descriptor loading with fail-fast validation. Each file is parsed
 * on its own so syntax errors carry the offending path; the merged result
 * is decoded once so schema violations are reported together.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import { parse } from "smol-toml";
import { type NonEmptyArray, isNonEmptyArray } from "../lib/assert";
import {
  ConfigError,
  ErrorCode,
  GeneralError,
  type SystemError,
  causeOf,
  errorMessage,
} from "../lib/errors";
import { toAbsolutePathEffect } from "../lib/paths";
import { decodeToEffect } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { fileExists, readFile } from "../system/fs";
import { mergeTables } from "./merge";
import { type ProvisionConfig, provisionConfigSchema } from "./schema";

export const loadTomlFile = (
  filePath: AbsolutePath
): Effect.Effect<Record<string, unknown>, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* pipe(
      fileExists(filePath),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* readFile(filePath);

    return yield* Effect.try({
      try: (): Record<string, unknown> => parse(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });
  });

export interface LoadedDescriptor {
  readonly config: ProvisionConfig;
  /** Resolved descriptor paths in load order. */
  readonly files: NonEmptyArray<AbsolutePath>;
}

/**
 * Load, merge and validate one or more descriptor files.
 * Later files override earlier ones key by key.
 */
export const loadProvisionConfig = (
  paths: readonly string[]
): Effect.Effect<
  LoadedDescriptor,
  ConfigError | SystemError | GeneralError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    if (!isNonEmptyArray(paths)) {
      return yield* Effect.fail(
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "No descriptor given: pass a path or set IMAGESMITH_CONFIG",
        })
      );
    }

    const [first, ...rest] = paths;
    const files: NonEmptyArray<AbsolutePath> = [
      yield* toAbsolutePathEffect(first),
      ...(yield* Effect.forEach(rest, (p) => toAbsolutePathEffect(p))),
    ];

    const tables = yield* Effect.forEach(files, (file) => loadTomlFile(file));
    const config = yield* decodeToEffect(
      provisionConfigSchema,
      mergeTables(tables),
      files.join(", ")
    );

    return { config, files };
  });
