// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Sequential build pipeline. Each step sees everything the steps before it
 * produced. A step may hold a resource; its cleanup is deferred to the end
 * of the run and is told whether the run completed. Cleanups run last-in,
 * first-out.
 */

import { Effect, Exit, Option } from "effect";
import { logStep } from "../lib/log";

/** How the run ended, as seen from a cleanup. */
export type Outcome = "completed" | "aborted";

/** Runs with the state as it stood after its own step; cannot fail. */
export type Cleanup<State, R> = (state: State, outcome: Outcome) => Effect.Effect<void, never, R>;

export interface SetupStep<In, Out, E, R> {
  /** Progress line logged as the step starts. */
  readonly message: string;
  readonly acquire: (state: In) => Effect.Effect<Out, E, R>;
  readonly release: Option.Option<Cleanup<In & Out, R>>;
}

export const SetupStep = {
  pure: <In, Out, E, R>(
    message: string,
    acquire: (state: In) => Effect.Effect<Out, E, R>
  ): SetupStep<In, Out, E, R> => ({ message, acquire, release: Option.none() }),

  resource: <In, Out, E, R>(
    message: string,
    acquire: (state: In) => Effect.Effect<Out, E, R>,
    release: Cleanup<In & Out, R>
  ): SetupStep<In, Out, E, R> => ({ message, acquire, release: Option.some(release) }),
} as const;

/** State before the first step. */
export type Initial = Readonly<Record<never, never>>;

export interface Pipeline<State extends object, E, R> {
  /** Appends a step; the state it reads must already be produced. */
  readonly andThen: <Out extends object, E2, R2>(
    step: SetupStep<State, Out, E2, R2>
  ) => Pipeline<State & Out, E | E2, R | R2>;
  /** All steps in one scope; fails with the first step that fails. */
  readonly run: () => Effect.Effect<State, E, R>;
}

// Steps are stored with their types erased: a list cannot carry the state
// type growing along it. `andThen` checks each step before it is stored.
interface StoredStep {
  readonly message: string;
  readonly acquire: (state: object) => Effect.Effect<object, unknown, unknown>;
  readonly release: Option.Option<Cleanup<object, unknown>>;
}

const store = <In, Out, E, R>(step: SetupStep<In, Out, E, R>): StoredStep =>
  step as unknown as StoredStep;

const outcomeOf = (exit: Exit.Exit<unknown, unknown>): Outcome =>
  Exit.isSuccess(exit) ? "completed" : "aborted";

const runStep = (
  step: StoredStep,
  state: object,
  position: number,
  total: number
): Effect.Effect<object, unknown, unknown> => {
  const next = Effect.map(step.acquire(state), (output): object => ({ ...state, ...output }));
  return Effect.zipRight(
    logStep(position, total, step.message),
    Option.match(step.release, {
      onNone: () => next,
      onSome: (release) =>
        Effect.acquireRelease(next, (after, exit) => release(after, outcomeOf(exit))),
    })
  );
};

const build = <State extends object, E, R>(
  steps: readonly StoredStep[]
): Pipeline<State, E, R> => ({
  andThen: <Out extends object, E2, R2>(step: SetupStep<State, Out, E2, R2>) =>
    build<State & Out, E | E2, R | R2>([...steps, store(step)]),

  run: () => {
    const initial: object = {};
    return Effect.scoped(
      Effect.reduce(steps, initial, (state, step, index) =>
        runStep(step, state, index + 1, steps.length)
      )
    ) as Effect.Effect<State, E, R>;
  },
});

export const pipeline = (): Pipeline<Initial, never, never> => build([]);
