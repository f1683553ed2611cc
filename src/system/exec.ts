// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution through the @effect/platform Command API.
 * Commands are always structured argument arrays; nothing here goes
 * through a shell.
 */

import { Command } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, causeOf, errorMessage } from "../lib/errors";

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't need R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

/** Non-empty guarantee prevents index errors on destructuring. */
interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

export const formatCommand = (command: readonly string[]): string => command.join(" ");

/** Never fails on a non-zero exit; only on spawn failure. */
export const exec = (
  command: readonly string[]
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const { cmd, args } = yield* validateCommand(command);
    const commandStr = formatCommand(command);

    return yield* withExecutor(
      Effect.gen(function* () {
        const process = yield* Command.start(Command.make(cmd, ...args));

        // Both pipes drain concurrently with the wait, or a full pipe blocks the child
        const [exitCode, stdout, stderr] = yield* Effect.all(
          [process.exitCode, streamToString(process.stdout), streamToString(process.stderr)],
          { concurrency: 3 }
        );

        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));
  });

/** Message for a command that ran but exited non-zero. */
export const commandFailedMessage = (command: readonly string[], result: ExecResult): string => {
  const stderr = result.stderr.trim();
  return `Command failed with exit code ${result.exitCode}: ${formatCommand(command)}${stderr ? `\n${stderr}` : ""}`;
};
