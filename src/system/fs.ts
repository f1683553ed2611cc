// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations over the @effect/platform FileSystem service.
 * Platform errors are mapped into SystemError so callers see one error
 * hierarchy.
 */

import { createHash } from "node:crypto";
import { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import { ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

const readError = (path: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `Failed to read ${path}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

const writeError = (path: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_WRITE_FAILED,
    message: `Failed to write ${path}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

/** Regular file check; a directory at the path counts as absent. */
export const fileExists = (
  path: AbsolutePath
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* pipe(
      fs.stat(path),
      Effect.map((info) => info.type === "File"),
      Effect.orElseSucceed(() => false)
    );
  });

export const readFile = (
  path: AbsolutePath
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    Effect.mapError(fs.readFileString(path, "utf-8"), (e) => readError(path, e))
  );

export const readBytes = (
  path: AbsolutePath
): Effect.Effect<Uint8Array, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    Effect.mapError(fs.readFile(path), (e) => readError(path, e))
  );

export const writeFile = (
  path: AbsolutePath,
  content: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.flatMap(FileSystem.FileSystem, (fs) =>
    Effect.mapError(fs.writeFileString(path, content), (e) => writeError(path, e))
  );

export const hashContent = (content: string | Uint8Array): string =>
  createHash("sha256").update(content).digest("hex");

/** Hex SHA-256 of a file's bytes. */
export const sha256File = (
  path: AbsolutePath
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.map(readBytes(path), hashContent);
