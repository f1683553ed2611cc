// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Turning a finished program into a process exit status.
 */

import { Cause, Exit, Match, Option, pipe } from "effect";

/** Anything carrying a numeric `code` has already been displayed by the command runner. */
const hasCode = (v: unknown): v is { readonly code: number } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

const hasMessage = (v: unknown): v is { readonly message: string } =>
  typeof v === "object" && v !== null && "message" in v && typeof v.message === "string";

/** 0 on success; the error's code capped at 125; 1 for anything without a code. */
export const exitCodeFromExit = (exit: Exit.Exit<unknown, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(hasCode, (v) => Math.min(v.code, 125)),
            Match.orElse(() => 1)
          ),
      }),
  });

export const logExitError = (exit: Exit.Exit<unknown, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (err: unknown): void =>
          pipe(
            Match.value(err),
            Match.when(hasCode, () => undefined),
            Match.when(hasMessage, (v) => console.error(`Error: ${v.message}`)),
            Match.orElse((v) => console.error(`Error: ${String(v)}`))
          ),
      }),
  });
