// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ImageBuilder service using Context.Tag pattern.
 * A step-wise image builder: working containers are created from an
 * image, mutated, and committed. Nothing exists as an image until commit.
 */

import { Context, type Effect } from "effect";
import type { GeneralError, SystemError } from "../lib/errors";
import type { AbsolutePath, ContainerImage, ImageId, WorkingContainer } from "../lib/types";
import type { ExecResult } from "../system/exec";

export type BuilderError = SystemError | GeneralError;

/** The parts of an image's runtime config the provisioner controls. */
export interface ImageRuntimeConfig {
  readonly entrypoint: readonly string[];
  readonly cmd: readonly string[];
}

export interface ImageBuilderService {
  readonly from: (image: ContainerImage) => Effect.Effect<WorkingContainer, BuilderError>;
  /** Resolves with the exit code; a non-zero exit is not a failure here. */
  readonly run: (
    container: WorkingContainer,
    argv: readonly string[],
    env?: Readonly<Record<string, string>>
  ) => Effect.Effect<ExecResult, BuilderError>;
  readonly copy: (
    container: WorkingContainer,
    source: AbsolutePath,
    destination: AbsolutePath,
    mode: number
  ) => Effect.Effect<void, BuilderError>;
  /** Sets the entrypoint in exec form and clears any default command. */
  readonly setEntrypoint: (
    container: WorkingContainer,
    argv: readonly string[]
  ) => Effect.Effect<void, BuilderError>;
  readonly commit: (
    container: WorkingContainer,
    tag: ContainerImage
  ) => Effect.Effect<ImageId, BuilderError>;
  readonly remove: (container: WorkingContainer) => Effect.Effect<void, BuilderError>;
  readonly inspectImage: (
    image: ContainerImage
  ) => Effect.Effect<ImageRuntimeConfig, BuilderError>;
}

export interface ImageBuilder {
  readonly _tag: "ImageBuilder";
}

export const ImageBuilder: Context.Tag<ImageBuilder, ImageBuilderService> = Context.GenericTag<
  ImageBuilder,
  ImageBuilderService
>("imagesmith/ImageBuilder");
