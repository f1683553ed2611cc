// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled log calls. Call sites only attach annotations; turning them into
 * `[n/total] →` or `✓` is the logger's job (effect-logger.ts).
 */

import { Data, Effect, Match, SynchronizedRef, pipe } from "effect";

/**
 * Closed union of log styles. Match.exhaustive enforces handling all variants,
 * so adding a new style produces compile errors at all unhandled call sites.
 */
type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
}>;

const { step, success } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

/** Program output (package lists, rendered Containerfiles); bypasses the logger. */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  });

/**
 * Numbered progress for a fixed-length procedure.
 * The counter is a SynchronizedRef so the logged numbers stay in sequence.
 */
export interface StepCounter {
  readonly next: (message: string) => Effect.Effect<void>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.map(SynchronizedRef.make(0), (ref) => ({
    next: (message: string): Effect.Effect<void> =>
      SynchronizedRef.updateAndGetEffect(ref, (n) =>
        Effect.as(logStep(n + 1, total, message), n + 1)
      ).pipe(Effect.asVoid),
  }));
