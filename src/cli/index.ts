// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * CLI entry point. The runCommand wrapper centralizes descriptor loading,
 * context resolution, and error display to avoid duplication across commands.
 */

import { Command, type ValidationError } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { FileSystem } from "@effect/platform";
import { ConfigError, Duration, Effect, Layer, Match, Option, pipe } from "effect";
import {
  ConfigPathsConfig,
  DebugModeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
} from "../config/env";
import { LOG_FORMAT_DEFAULT, type LogFormat, type LogLevel } from "../config/field-values";
import { type LoadedDescriptor, loadProvisionConfig } from "../config/loader";
import { resolve } from "../config/resolve";
import { isNonEmptyArray } from "../lib/assert";
import { ImagesmithLoggerLive, colorize, detectColor } from "../lib/effect-logger";
import type { ImagesmithError } from "../lib/errors";
import { parentDir, toAbsolutePathEffect } from "../lib/paths";
import type { AbsolutePath } from "../lib/types";
import { IMAGESMITH_VERSION } from "../lib/version";
import { BuildahBuilderLive } from "../provision/buildah";
import type { ImageBuilder } from "../provision/builder";
import { type ProvisionPlan, createPlan } from "../provision/plan";
import { CommandExecutorLive } from "../system/services/executor";

import { executeBuild } from "./commands/build";
import { executePackages } from "./commands/packages";
import { executeRender } from "./commands/render";
import { executeValidate } from "./commands/validate";
import { executeVerify } from "./commands/verify";

import {
  type CommandArgs,
  type GlobalOptions,
  descriptorArgs,
  effectiveFormat,
  globalOptions,
  output,
  tag,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > descriptor (priority order). */
interface ResolvedSettings {
  readonly descriptor: LoadedDescriptor;
  readonly contextDir: AbsolutePath;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
}

interface CommandContext extends ResolvedSettings {
  readonly plan: ProvisionPlan;
}

/** Application failures, plus a malformed IMAGESMITH_* variable. */
export type CommandError = ImagesmithError | ConfigError.ConfigError;

// Context resolution

/** Positional descriptors, else IMAGESMITH_CONFIG. */
const descriptorPaths = (
  args: CommandArgs
): Effect.Effect<readonly string[], ConfigError.ConfigError> =>
  isNonEmptyArray(args.descriptors) ? Effect.succeed(args.descriptors) : ConfigPathsConfig;

const resolveContextDir = (
  globals: GlobalOptions,
  descriptor: LoadedDescriptor
): Effect.Effect<AbsolutePath, ImagesmithError> =>
  Option.match(globals.context, {
    onNone: (): Effect.Effect<AbsolutePath, ImagesmithError> =>
      Effect.succeed(parentDir(descriptor.files[0])),
    onSome: (dir): Effect.Effect<AbsolutePath, ImagesmithError> => toAbsolutePathEffect(dir),
  });

/** Resolves configuration from CLI, environment, and descriptor with CLI taking precedence. */
const resolveSettings = (
  args: CommandArgs
): Effect.Effect<ResolvedSettings, CommandError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const paths = yield* descriptorPaths(args);
    const descriptor = yield* loadProvisionConfig(paths);
    const logging = descriptor.config.logging;

    const envLogLevel = yield* LogLevelOptionConfig;
    const envLogFormat = yield* LogFormatOptionConfig;
    const envDebug = yield* DebugModeConfig;

    const logLevel: LogLevel = pipe(
      Match.value(args.verbose || envDebug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({ cli: args.logLevel, env: envLogLevel, descriptor: logging.level })
      ),
      Match.exhaustive
    );

    const format: LogFormat = resolve({
      cli: effectiveFormat(args),
      env: envLogFormat,
      descriptor: logging.format,
    });

    const contextDir = yield* resolveContextDir(args, descriptor);

    return { descriptor, contextDir, format, logLevel };
  });

/** Format for errors raised before the descriptor is loaded. */
const earlyFormat = (globals: GlobalOptions): Effect.Effect<LogFormat> =>
  pipe(
    LogFormatOptionConfig,
    Effect.orElseSucceed(() => Option.none<LogFormat>()),
    Effect.map(
      (env): LogFormat =>
        resolve({ cli: effectiveFormat(globals), env, descriptor: LOG_FORMAT_DEFAULT })
    )
  );

// Error display

/** Captured package-manager output, when the failure carries any. */
const errorStderr = (err: ImagesmithError): Option.Option<string> =>
  pipe(
    Match.value(err),
    Match.tag("ProvisioningError", (e) => Option.fromNullable(e.stderr)),
    Match.orElse(() => Option.none<string>()),
    Option.filter((s) => s.length > 0)
  );

/**
 * Formats error for terminal output with optional color. Sync because called in exit path.
 * Environment errors carry no code; the exit handler prints those.
 */
const displayError = (err: CommandError, format: LogFormat): void => {
  if (ConfigError.isConfigError(err)) {
    return;
  }
  const stderr = errorStderr(err);
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(
        `${JSON.stringify({
          error: err.message,
          code: err.code,
          ...Option.match(stderr, { onNone: () => ({}), onSome: (s) => ({ stderr: s }) }),
        })}\n`
      )
    ),
    Match.when("pretty", () => {
      const prefix = colorize("red", "✗", detectColor(process.env, process.stderr.isTTY === true));
      const details = Option.match(stderr, { onNone: () => "", onSome: (s) => `\n${s}` });
      process.stderr.write(`${prefix} ${err.message}${details}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

/** buildah, driven through the real process executor. */
const ImageBuilderLive: Layer.Layer<ImageBuilder> = BuildahBuilderLive.pipe(
  Layer.provide(CommandExecutorLive)
);

/** Sleep before acting so a debugger can attach to the process. */
const debugDelay = (seconds: number): Effect.Effect<void> =>
  Effect.when(Effect.sleep(Duration.seconds(seconds)), () => seconds > 0).pipe(Effect.asVoid);

type HandlerRequirements = ImageBuilder | FileSystem.FileSystem;

type Handler = (ctx: CommandContext) => Effect.Effect<void, ImagesmithError, HandlerRequirements>;

/** Centralizes context and error handling so each command stays focused on its logic. */
const runCommand = (
  builder: Layer.Layer<ImageBuilder>,
  args: CommandArgs,
  commandName: string,
  handler: Handler
): Effect.Effect<void, CommandError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* debugDelay(args.debugDelay);

    const settings = yield* pipe(
      resolveSettings(args),
      Effect.tapError((err) =>
        Effect.flatMap(earlyFormat(args), (format) =>
          Effect.sync(() => displayError(err, format))
        )
      )
    );

    yield* pipe(
      Effect.gen(function* () {
        const plan = yield* createPlan(settings.descriptor.config, settings.contextDir);
        yield* handler({ ...settings, plan });
      }),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, settings.format))),
      Effect.provide(builder),
      Effect.provide(ImagesmithLoggerLive({ level: settings.logLevel, format: settings.format }))
    );
  });

// Subcommand definitions

const subcommands = (builder: Layer.Layer<ImageBuilder>) => {
  const run = (args: CommandArgs, name: string, handler: Handler) =>
    runCommand(builder, args, name, handler);

  const validateCmd = Command.make(
    "validate",
    { ...globalOptions, descriptors: descriptorArgs },
    (args) =>
      run(args, "validate", (ctx) =>
        executeValidate({ descriptor: ctx.descriptor, plan: ctx.plan, format: ctx.format })
      )
  ).pipe(Command.withDescription("Validate descriptor files without building anything"));

  const packagesCmd = Command.make(
    "packages",
    { ...globalOptions, descriptors: descriptorArgs },
    (args) =>
      run(args, "packages", (ctx) => executePackages({ plan: ctx.plan, format: ctx.format }))
  ).pipe(Command.withDescription("Print the resolved package set"));

  const renderCmd = Command.make(
    "render",
    { ...globalOptions, descriptors: descriptorArgs, output },
    (args) => run(args, "render", (ctx) => executeRender({ plan: ctx.plan, output: args.output }))
  ).pipe(Command.withDescription("Render the equivalent Containerfile"));

  const buildCmd = Command.make(
    "build",
    { ...globalOptions, descriptors: descriptorArgs, tag },
    (args) =>
      run(args, "build", (ctx) =>
        executeBuild({ plan: ctx.plan, tag: args.tag, format: ctx.format })
      )
  ).pipe(Command.withDescription("Provision and commit the image"));

  const verifyCmd = Command.make(
    "verify",
    { ...globalOptions, descriptors: descriptorArgs, tag },
    (args) =>
      run(args, "verify", (ctx) =>
        executeVerify({ plan: ctx.plan, tag: args.tag, format: ctx.format })
      )
  ).pipe(Command.withDescription("Check a built image against its descriptor"));

  return [validateCmd, packagesCmd, renderCmd, buildCmd, verifyCmd] as const;
};

// Root command

export type Cli = (
  args: readonly string[]
) => Effect.Effect<void, CommandError | ValidationError.ValidationError, CliApp.Environment>;

/** Takes the full `process.argv`; the runtime and script words are dropped by the parser. */
export const makeCli = (builder: Layer.Layer<ImageBuilder>): Cli =>
  Command.run(
    Command.make("imagesmith").pipe(
      Command.withDescription("Declarative container image provisioner"),
      Command.withSubcommands(subcommands(builder))
    ),
    {
      name: "imagesmith",
      version: IMAGESMITH_VERSION,
    }
  );

export const cli: Cli = makeCli(ImageBuilderLive);
