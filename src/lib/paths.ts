// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Path normalization for user-provided paths (descriptor files, build
 * context, stage source). Everything leaving this module is a branded
 * AbsolutePath.
 */

import { dirname, isAbsolute, normalize, relative, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import { type AbsolutePath, AbsolutePathSchema } from "./types";

/** Rejects null bytes to prevent path injection attacks. */
const hasNullByte = (p: string): boolean => p.includes("\x00");

const resolveToAbsolute = (p: string, base: string = process.cwd()): AbsolutePath =>
  AbsolutePathSchema.make(resolve(base, normalize(p)));

/** Use for all user-provided or descriptor paths. */
export const toAbsolutePathEffect = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p));

export const parentDir = (p: AbsolutePath): AbsolutePath => AbsolutePathSchema.make(dirname(p));

export interface ContainedPath {
  readonly absolute: AbsolutePath;
  /** Relative to the containing directory, `/`-separated. */
  readonly relative: string;
}

/**
 * Resolve `p` against `root` and require the result to stay inside `root`.
 * Absolute inputs are accepted when they point inside the root.
 */
export const resolveWithin = (
  root: AbsolutePath,
  p: string
): Effect.Effect<ContainedPath, ConfigError> => {
  if (hasNullByte(p)) {
    return Effect.fail(
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Invalid path contains null byte: ${p}`,
      })
    );
  }
  const absolute = resolveToAbsolute(p, root);
  const rel = relative(root, absolute);
  const escapes = rel === "" || rel === ".." || rel.startsWith("../") || isAbsolute(rel);
  return escapes
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Path '${p}' must name a file inside ${root}`,
          path: p,
        })
      )
    : Effect.succeed({ absolute, relative: rel });
};
