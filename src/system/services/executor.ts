// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CommandExecutor service using Context.Tag pattern.
 * Every subprocess goes through this service so tests can substitute a
 * scripted implementation of `exec`.
 */

import { Context, Effect, Layer, pipe } from "effect";
import { ErrorCode, type GeneralError, SystemError } from "../../lib/errors";
import { type ExecResult, commandFailedMessage, exec } from "../exec";

export type ExecFn = (
  command: readonly string[]
) => Effect.Effect<ExecResult, SystemError | GeneralError>;

/**
 * CommandExecutor service interface - provides command execution via Effect DI.
 * Base service with no dependencies.
 */
export interface CommandExecutorService {
  readonly exec: ExecFn;
  /** Fails with EXEC_FAILED if the exit code is non-zero. */
  readonly execSuccess: ExecFn;
  readonly execOutput: (
    command: readonly string[]
  ) => Effect.Effect<string, SystemError | GeneralError>;
}

/**
 * CommandExecutor service identifier for Effect dependency injection.
 */
export interface CommandExecutor {
  readonly _tag: "CommandExecutor";
}

/**
 * CommandExecutor context tag.
 * Use with `yield* CommandExecutor` to access the service in Effect generators.
 */
export const CommandExecutor: Context.Tag<CommandExecutor, CommandExecutorService> =
  Context.GenericTag<CommandExecutor, CommandExecutorService>("imagesmith/CommandExecutor");

/** Derive the strict variants from a single `exec`. */
export const makeCommandExecutor = (run: ExecFn): CommandExecutorService => {
  const execSuccess: ExecFn = (command) =>
    pipe(
      run(command),
      Effect.filterOrFail(
        (result): result is ExecResult => result.exitCode === 0,
        (result) =>
          new SystemError({
            code: ErrorCode.EXEC_FAILED,
            message: commandFailedMessage(command, result),
          })
      )
    );

  return {
    exec: run,
    execSuccess,
    execOutput: (command) => Effect.map(execSuccess(command), (r) => r.stdout),
  };
};

export const CommandExecutorLive: Layer.Layer<CommandExecutor> = Layer.succeed(
  CommandExecutor,
  makeCommandExecutor(exec)
);
