// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema definitions for provisioning descriptors.
 * Single source of truth for descriptor structure and validation.
 */

import { Schema } from "effect";
import {
  type AbsolutePath,
  AbsolutePathSchema,
  type ContainerImage,
  ContainerImageSchema,
  type PackageName,
  PackageNameSchema,
  containerImage,
  path,
} from "../lib/types";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  PACKAGE_MANAGER_DEFAULT,
  PACKAGE_MANAGER_VALUES,
  type PackageManagerName,
} from "./field-values";

export const DEFAULT_IMAGE_TAG: ContainerImage = containerImage("localhost/provisioned:latest");
export const DEFAULT_STAGE_SOURCE = "build.sh";
export const DEFAULT_STAGE_DESTINATION: AbsolutePath = path("/usr/local/bin/build.sh");

/** Relative to the build context; emptiness is the only thing checked here. */
const stageSourceSchema = Schema.String.pipe(
  Schema.filter((s): boolean => s.trim().length > 0, {
    message: (): string => "Stage source must not be empty",
  })
);

// ============================================================================
// [image]
// ============================================================================

export interface ImageConfig {
  readonly base: ContainerImage;
  readonly tag: ContainerImage;
}

export interface ImageConfigInput {
  readonly base: string;
  readonly tag?: string | undefined;
}

export const imageSchema: Schema.Schema<ImageConfig, ImageConfigInput> = Schema.Struct({
  base: ContainerImageSchema,
  tag: Schema.optionalWith(ContainerImageSchema, {
    default: (): ContainerImage => DEFAULT_IMAGE_TAG,
  }),
});

// ============================================================================
// [packages]
// ============================================================================

export interface PackagesConfig {
  readonly manager: PackageManagerName;
  readonly weakDependencies: boolean;
  readonly install: readonly [PackageName, ...PackageName[]];
}

export interface PackagesConfigInput {
  readonly manager?: PackageManagerName | undefined;
  readonly weakDependencies?: boolean | undefined;
  readonly install: readonly [string, ...string[]];
}

export const packagesSchema: Schema.Schema<PackagesConfig, PackagesConfigInput> = Schema.Struct({
  manager: Schema.optionalWith(Schema.Literal(...PACKAGE_MANAGER_VALUES), {
    default: (): PackageManagerName => PACKAGE_MANAGER_DEFAULT,
  }),
  weakDependencies: Schema.optionalWith(Schema.Boolean, { default: (): boolean => false }),
  install: Schema.NonEmptyArray(PackageNameSchema),
});

// ============================================================================
// [stage]
// ============================================================================

export interface StageConfig {
  readonly source: string;
  readonly destination: AbsolutePath;
}

export interface StageConfigInput {
  readonly source?: string | undefined;
  readonly destination?: string | undefined;
}

export const stageSchema: Schema.Schema<StageConfig, StageConfigInput> = Schema.Struct({
  source: Schema.optionalWith(stageSourceSchema, { default: (): string => DEFAULT_STAGE_SOURCE }),
  destination: Schema.optionalWith(AbsolutePathSchema, {
    default: (): AbsolutePath => DEFAULT_STAGE_DESTINATION,
  }),
});

// ============================================================================
// [logging]
// ============================================================================

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface LoggingConfigInput {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
}

export const loggingSchema: Schema.Schema<LoggingConfig, LoggingConfigInput> = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: (): LogLevel => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: (): LogFormat => LOG_FORMAT_DEFAULT,
  }),
});

// ============================================================================
// Descriptor
// ============================================================================

export interface ProvisionConfig {
  readonly image: ImageConfig;
  readonly packages: PackagesConfig;
  readonly stage: StageConfig;
  readonly logging: LoggingConfig;
}

export interface ProvisionConfigInput {
  readonly image: ImageConfigInput;
  readonly packages: PackagesConfigInput;
  readonly stage?: StageConfigInput | undefined;
  readonly logging?: LoggingConfigInput | undefined;
}

export const provisionConfigSchema: Schema.Schema<ProvisionConfig, ProvisionConfigInput> =
  Schema.Struct({
    image: imageSchema,
    packages: packagesSchema,
    stage: Schema.optionalWith(stageSchema, {
      default: (): StageConfig => ({
        source: DEFAULT_STAGE_SOURCE,
        destination: DEFAULT_STAGE_DESTINATION,
      }),
    }),
    logging: Schema.optionalWith(loggingSchema, {
      default: (): LoggingConfig => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
    }),
  });
