// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Image provisioning. Runs the build steps in order against a fresh
 * working container and commits the result; any failure before the
 * commit leaves no image behind.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import type { NonEmptyArray } from "../lib/assert";
import type { ProvisioningError, StagingError } from "../lib/errors";
import { logSuccess } from "../lib/log";
import type { ContainerImage, ImageId, PackageName } from "../lib/types";
import type { ImageBuilder } from "./builder";
import { pipeline } from "./pipeline";
import type { ProvisionPlan } from "./plan";
import {
  commitImage,
  declareEntrypoint,
  fetchBaseImage,
  installPackages,
  purgeCaches,
  stageExecutable,
} from "./steps";

export interface ProvisionResult {
  readonly imageId: ImageId;
  readonly tag: ContainerImage;
  readonly packages: NonEmptyArray<PackageName>;
  readonly cachesPurged: boolean;
}

/** `sha256:0123…` → first 12 hex characters, the way image tools print ids. */
export const shortImageId = (id: ImageId): string => id.replace(/^sha256:/, "").slice(0, 12);

export const provision = (
  plan: ProvisionPlan
): Effect.Effect<
  ProvisionResult,
  ProvisioningError | StagingError,
  ImageBuilder | FileSystem.FileSystem
> =>
  pipe(
    pipeline()
      .andThen(fetchBaseImage(plan))
      .andThen(installPackages(plan))
      .andThen(purgeCaches(plan))
      .andThen(stageExecutable(plan))
      .andThen(declareEntrypoint(plan))
      .andThen(commitImage(plan))
      .run(),
    Effect.map(
      (state): ProvisionResult => ({
        imageId: state.imageId,
        tag: plan.tag,
        packages: state.installed,
        cachesPurged: state.cachesPurged,
      })
    ),
    Effect.tap((result) =>
      logSuccess(`Built ${result.tag} (${shortImageId(result.imageId)})`)
    )
  );

