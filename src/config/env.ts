// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read until a Config
 * is yielded inside an Effect at the CLI boundary.
 */

import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

const NAMESPACE = "IMAGESMITH";

/**
 * Log level override (IMAGESMITH_LOG_LEVEL). None when unset so the
 * descriptor value can take over.
 */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  NAMESPACE
);

/** Log format override (IMAGESMITH_LOG_FORMAT). */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  NAMESPACE
);

/**
 * Debug mode flag (IMAGESMITH_DEBUG).
 * When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  NAMESPACE
);

/** `a.toml:b.toml` → ["a.toml", "b.toml"]; empty segments are dropped. */
export const splitPathList = (value: string): readonly string[] =>
  value.split(":").filter((part) => part.length > 0);

/**
 * Descriptor paths used when none are given on the command line
 * (IMAGESMITH_CONFIG, colon-separated).
 */
export const ConfigPathsConfig: Config.Config<readonly string[]> = Config.nested(
  Config.string("CONFIG").pipe(Config.withDefault(""), Config.map(splitPathList)),
  NAMESPACE
);

/** buildah executable (IMAGESMITH_BUILDAH). */
export const BuildahBinaryConfig: Config.Config<string> = Config.nested(
  Config.nonEmptyString("BUILDAH").pipe(Config.withDefault("buildah")),
  NAMESPACE
);

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = [
  ["logLevel", "IMAGESMITH_LOG_LEVEL"],
  ["logFormat", "IMAGESMITH_LOG_FORMAT"],
  ["debug", "IMAGESMITH_DEBUG"],
  ["config", "IMAGESMITH_CONFIG"],
  ["buildah", "IMAGESMITH_BUILDAH"],
] as const;

export type TestConfigOverrides = {
  readonly [K in (typeof envVarNames)[number][0]]?: string;
};

/**
 * ConfigProvider backed by a map instead of process.env. Keys use the
 * environment's names, so nested configs are joined with "_".
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ config: "a.toml:b.toml" });
 * const paths = await Effect.runPromise(
 *   Effect.withConfigProvider(ConfigPathsConfig, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries = envVarNames.flatMap(([key, name]) => {
    const value = overrides[key];
    return value === undefined ? [] : [[name, value] as const];
  });
  return ConfigProvider.fromMap(new Map(entries), { pathDelim: "_" });
};
