// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ImageBuilder backed by the buildah CLI.
 */

import { Effect, Layer, Option, ParseResult, Schema, pipe } from "effect";
import { BuildahBinaryConfig } from "../config/env";
import { ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import { imageId, workingContainer } from "../lib/types";
import { CommandExecutor, type CommandExecutorService } from "../system/services/executor";
import { ImageBuilder, type ImageBuilderService, type ImageRuntimeConfig } from "./builder";
import { formatMode } from "./plan";

/** `.OCIv1.Config` as buildah prints it; absent and null both mean "unset". */
const OciConfigSchema = Schema.Struct({
  Entrypoint: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  Cmd: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
});

const outputError = (command: string, detail: string): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Unexpected output from ${command}: ${detail}`,
  });

/** buildah prints progress before the value callers want. */
const lastLine = (command: string, stdout: string): Effect.Effect<string, SystemError> =>
  pipe(
    stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0),
    (lines) => Option.fromNullable(lines[lines.length - 1]),
    Option.match({
      onNone: (): Effect.Effect<string, SystemError> =>
        Effect.fail(outputError(command, "no output")),
      onSome: (line): Effect.Effect<string, SystemError> => Effect.succeed(line),
    })
  );

export const parseRuntimeConfig = (
  stdout: string
): Effect.Effect<ImageRuntimeConfig, SystemError> =>
  pipe(
    Effect.try({
      try: (): unknown => JSON.parse(stdout),
      catch: (e): SystemError =>
        new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Unexpected output from buildah inspect: ${errorMessage(e)}`,
          ...causeOf(e),
        }),
    }),
    Effect.flatMap((json) =>
      pipe(
        Schema.decodeUnknown(OciConfigSchema)(json),
        Effect.mapError((e) =>
          outputError("buildah inspect", ParseResult.TreeFormatter.formatErrorSync(e))
        )
      )
    ),
    Effect.map(
      (config): ImageRuntimeConfig => ({
        entrypoint: config.Entrypoint ?? [],
        cmd: config.Cmd ?? [],
      })
    )
  );

const envFlags = (env: Readonly<Record<string, string>>): readonly string[] =>
  Object.entries(env).flatMap(([key, value]) => ["--env", `${key}=${value}`]);

export const makeBuildahBuilder = (
  executor: CommandExecutorService,
  buildah: string
): ImageBuilderService => ({
  from: (image) =>
    pipe(
      executor.execOutput([buildah, "from", "--quiet", image]),
      Effect.flatMap((stdout) => lastLine("buildah from", stdout)),
      Effect.map(workingContainer)
    ),

  run: (container, argv, env = {}) =>
    executor.exec([buildah, "run", ...envFlags(env), container, "--", ...argv]),

  copy: (container, source, destination, mode) =>
    Effect.asVoid(
      executor.execSuccess([
        buildah,
        "copy",
        "--chmod",
        formatMode(mode),
        container,
        source,
        destination,
      ])
    ),

  setEntrypoint: (container, argv) =>
    Effect.asVoid(
      executor.execSuccess([
        buildah,
        "config",
        "--entrypoint",
        JSON.stringify(argv),
        "--cmd",
        "",
        container,
      ])
    ),

  commit: (container, tag) =>
    pipe(
      executor.execOutput([buildah, "commit", "--quiet", container, tag]),
      Effect.flatMap((stdout) => lastLine("buildah commit", stdout)),
      Effect.map(imageId)
    ),

  remove: (container) => Effect.asVoid(executor.execSuccess([buildah, "rm", container])),

  inspectImage: (image) =>
    pipe(
      executor.execOutput([
        buildah,
        "inspect",
        "--type",
        "image",
        "--format",
        "{{json .OCIv1.Config}}",
        image,
      ]),
      Effect.flatMap(parseRuntimeConfig)
    ),
});

export const BuildahBuilderLive: Layer.Layer<ImageBuilder, never, CommandExecutor> = Layer.effect(
  ImageBuilder,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    // Config.withDefault ensures this never fails, so orDie is safe
    const buildah = yield* Effect.orDie(BuildahBinaryConfig);
    return makeBuildahBuilder(executor, buildah);
  })
);
