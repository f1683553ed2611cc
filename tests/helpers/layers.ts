// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Test helpers for providing Effect layers in tests.
 * NodeContext.layer provides FileSystem, Path and CommandExecutor from
 * @effect/platform-node; the image builder and the command executor are
 * replaced by in-process fakes so no test ever spawns buildah.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, type Exit, Layer, Logger } from "effect";
import { messageText } from "../../src/lib/effect-logger";
import { imageId, workingContainer } from "../../src/lib/types";
import { ImageBuilder, type ImageBuilderService } from "../../src/provision/builder";
import type { ExecResult } from "../../src/system/exec";
import {
  type CommandExecutorService,
  makeCommandExecutor,
} from "../../src/system/services/executor";

/** Drops every log line. */
export const SilentLogger: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, Logger.none);

/**
 * Test layer providing all platform services.
 * Use with runTest/runTestExit for effects requiring FileSystem.
 */
export const TestLayer: Layer.Layer<NodeContext.NodeContext> = Layer.merge(
  NodeContext.layer,
  SilentLogger
);

/**
 * Run an effect in tests with platform services provided.
 */
export const runTest = <A, E>(effect: Effect.Effect<A, E, NodeContext.NodeContext>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestLayer)));

/**
 * Run an effect in tests and return the Exit value.
 */
export const runTestExit = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<Exit.Exit<A, E>> => Effect.runPromiseExit(effect.pipe(Effect.provide(TestLayer)));

// ============================================================================
// Log capture
// ============================================================================

export interface CapturedLog {
  readonly level: string;
  readonly message: string;
}

export interface LogCapture {
  readonly layer: Layer.Layer<never>;
  readonly entries: CapturedLog[];
}

/** Replaces the default logger with one that records level and message text. */
export const captureLogs = (): LogCapture => {
  const entries: CapturedLog[] = [];
  const logger = Logger.make(({ logLevel, message }) => {
    entries.push({ level: logLevel.label, message: messageText(message) });
  });
  return { layer: Logger.replace(Logger.defaultLogger, logger), entries };
};

// ============================================================================
// Fake image builder
// ============================================================================

export const FAKE_CONTAINER = workingContainer("fedora-working-container");
export const FAKE_IMAGE_ID = imageId("sha256:0123456789abcdef0123456789abcdef");

export const execResult = (exitCode = 0, stdout = "", stderr = ""): ExecResult => ({
  exitCode,
  stdout,
  stderr,
});

export interface RecordedRun {
  readonly argv: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export interface FakeBuilder {
  readonly layer: Layer.Layer<ImageBuilder>;
  /** One readable line per builder operation, in call order. */
  readonly calls: string[];
  readonly runs: RecordedRun[];
}

const defaultBuilder: ImageBuilderService = {
  from: () => Effect.succeed(FAKE_CONTAINER),
  run: () => Effect.succeed(execResult()),
  copy: () => Effect.void,
  setEntrypoint: () => Effect.void,
  commit: () => Effect.succeed(FAKE_IMAGE_ID),
  remove: () => Effect.void,
  inspectImage: () => Effect.succeed({ entrypoint: [], cmd: [] }),
};

/**
 * ImageBuilder that records every call and delegates to `overrides`
 * (or a succeeding default) for the result.
 */
export const fakeBuilder = (overrides: Partial<ImageBuilderService> = {}): FakeBuilder => {
  const calls: string[] = [];
  const runs: RecordedRun[] = [];
  const impl: ImageBuilderService = { ...defaultBuilder, ...overrides };
  const record = (line: string): Effect.Effect<void> =>
    Effect.sync(() => {
      calls.push(line);
    });

  const service: ImageBuilderService = {
    from: (image) => Effect.zipRight(record(`from ${image}`), impl.from(image)),
    run: (container, argv, env = {}) =>
      Effect.zipRight(
        Effect.sync(() => {
          calls.push(`run ${container} ${argv.join(" ")}`);
          runs.push({ argv, env });
        }),
        impl.run(container, argv, env)
      ),
    copy: (container, source, destination, mode) =>
      Effect.zipRight(
        record(`copy ${container} ${source} ${destination} ${mode.toString(8)}`),
        impl.copy(container, source, destination, mode)
      ),
    setEntrypoint: (container, argv) =>
      Effect.zipRight(
        record(`entrypoint ${container} ${JSON.stringify(argv)}`),
        impl.setEntrypoint(container, argv)
      ),
    commit: (container, tag) =>
      Effect.zipRight(record(`commit ${container} ${tag}`), impl.commit(container, tag)),
    remove: (container) => Effect.zipRight(record(`remove ${container}`), impl.remove(container)),
    inspectImage: (image) =>
      Effect.zipRight(record(`inspect ${image}`), impl.inspectImage(image)),
  };

  return { layer: Layer.succeed(ImageBuilder, service), calls, runs };
};

// ============================================================================
// Scripted command executor
// ============================================================================

export interface ScriptedExecutor {
  readonly service: CommandExecutorService;
  readonly commands: (readonly string[])[];
}

/** CommandExecutor whose `exec` answers from `respond` and records every command. */
export const scriptedExecutor = (
  respond: (command: readonly string[]) => ExecResult = () => execResult()
): ScriptedExecutor => {
  const commands: (readonly string[])[] = [];
  const service = makeCommandExecutor((command) =>
    Effect.sync(() => {
      commands.push(command);
      return respond(command);
    })
  );
  return { service, commands };
};
