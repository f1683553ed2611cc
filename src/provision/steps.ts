// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The six provisioning steps. Each maps builder failures into the typed
 * failure its step owns; only the cache purge is allowed to fail quietly.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import {
  ErrorCode,
  ProvisioningError,
  StagingError,
  type SystemError,
  type GeneralError,
} from "../lib/errors";
import type { AbsolutePath, ImageId, PackageName, WorkingContainer } from "../lib/types";
import type { NonEmptyArray } from "../lib/assert";
import { formatCommand } from "../system/exec";
import { fileExists } from "../system/fs";
import { ImageBuilder } from "./builder";
import { type PackageCommand, commandArgv, commandEnv } from "./package-manager";
import { SetupStep } from "./pipeline";
import type { ProvisionPlan } from "./plan";

export type ProvisionStepName =
  | "fetch-base"
  | "install"
  | "purge"
  | "stage"
  | "entrypoint"
  | "commit";

export interface FetchedBase {
  readonly container: WorkingContainer;
}

export interface PackagesInstalled {
  readonly installed: NonEmptyArray<PackageName>;
}

export interface CachesPurged {
  /** False when any purge command failed; the build carries on regardless. */
  readonly cachesPurged: boolean;
}

export interface ExecutableStaged {
  readonly staged: AbsolutePath;
}

export interface EntrypointDeclared {
  readonly entrypoint: readonly [AbsolutePath];
}

export interface ImageCommitted {
  readonly imageId: ImageId;
}

const builderFailure =
  (step: ProvisionStepName, what: string) =>
  (e: SystemError | GeneralError): ProvisioningError =>
    new ProvisioningError({
      code: ErrorCode.PROVISIONING_FAILED,
      step,
      message: `${what}: ${e.message}`,
      cause: e,
    });

// ============================================================================
// 1. Fetch base image
// ============================================================================

/** The working container is removed when the pipeline ends, whether or not the build completed. */
export const fetchBaseImage = (
  plan: ProvisionPlan
): SetupStep<object, FetchedBase, ProvisioningError, ImageBuilder> =>
  SetupStep.resource(
    `Fetching base image ${plan.baseImage}`,
    () =>
      pipe(
        Effect.flatMap(ImageBuilder, (builder) => builder.from(plan.baseImage)),
        Effect.map((container): FetchedBase => ({ container })),
        Effect.mapError(
          builderFailure("fetch-base", `Failed to fetch base image ${plan.baseImage}`)
        )
      ),
    ({ container }, outcome) =>
      pipe(
        Effect.flatMap(ImageBuilder, (builder) => builder.remove(container)),
        Effect.tap(() =>
          outcome === "completed"
            ? Effect.logDebug(`Removed working container ${container}`)
            : Effect.logInfo(`Build aborted; removed working container ${container}`)
        ),
        Effect.catchAll((e) =>
          Effect.logWarning(`Failed to remove working container ${container}: ${e.message}`)
        )
      )
  );

// ============================================================================
// 2. Install packages
// ============================================================================

const runInstallCommand = (
  container: WorkingContainer,
  command: PackageCommand
): Effect.Effect<void, ProvisioningError, ImageBuilder> => {
  const argv = commandArgv(command);
  return pipe(
    Effect.flatMap(ImageBuilder, (builder) => builder.run(container, argv, commandEnv(command))),
    Effect.mapError(builderFailure("install", `Failed to run ${formatCommand(argv)}`)),
    Effect.filterOrFail(
      (result) => result.exitCode === 0,
      (result) =>
        new ProvisioningError({
          code: ErrorCode.PROVISIONING_FAILED,
          step: "install",
          message: `Package installation failed with exit code ${result.exitCode}: ${formatCommand(argv)}`,
          stderr: result.stderr.trim(),
        })
    ),
    Effect.asVoid
  );
};

export const installPackages = (
  plan: ProvisionPlan
): SetupStep<FetchedBase, PackagesInstalled, ProvisioningError, ImageBuilder> =>
  SetupStep.pure(
    `Installing ${plan.packages.length} package(s) with ${plan.manager.name}`,
    ({ container }) =>
      pipe(
        Effect.forEach(
          plan.manager.install(plan.packages, plan.policy),
          (command) => runInstallCommand(container, command),
          { discard: true }
        ),
        Effect.as({ installed: plan.packages })
      )
  );

// ============================================================================
// 3. Purge caches
// ============================================================================

const purgeWarning = (detail: string): Effect.Effect<boolean> =>
  Effect.as(Effect.logWarning(`Cache purge failed, continuing: ${detail}`), false);

const runPurgeCommand = (
  container: WorkingContainer,
  command: PackageCommand
): Effect.Effect<boolean, never, ImageBuilder> => {
  const argv = commandArgv(command);
  return pipe(
    Effect.flatMap(ImageBuilder, (builder) => builder.run(container, argv, commandEnv(command))),
    Effect.flatMap((result) =>
      result.exitCode === 0
        ? Effect.succeed(true)
        : purgeWarning(`${formatCommand(argv)} exited with ${result.exitCode}`)
    ),
    Effect.catchAll((e) => purgeWarning(e.message))
  );
};

export const purgeCaches = (
  plan: ProvisionPlan
): SetupStep<FetchedBase, CachesPurged, never, ImageBuilder> =>
  SetupStep.pure("Purging package caches", ({ container }) =>
    pipe(
      Effect.forEach(plan.manager.clean, (command) => runPurgeCommand(container, command)),
      Effect.map((results): CachesPurged => ({ cachesPurged: results.every(Boolean) }))
    )
  );

// ============================================================================
// 4. Stage executable
// ============================================================================

export const stageExecutable = (
  plan: ProvisionPlan
): SetupStep<FetchedBase, ExecutableStaged, StagingError, ImageBuilder | FileSystem.FileSystem> =>
  SetupStep.pure(
    `Staging ${plan.stage.contextPath} → ${plan.stage.destination}`,
    ({ container }) =>
      Effect.gen(function* () {
        const { source, destination, mode, contextPath } = plan.stage;

        const exists = yield* fileExists(source);
        if (!exists) {
          return yield* Effect.fail(
            new StagingError({
              code: ErrorCode.STAGING_FAILED,
              message: `Staged executable not found in build context: ${contextPath} (${source})`,
              source,
            })
          );
        }

        const builder = yield* ImageBuilder;
        yield* pipe(
          builder.copy(container, source, destination, mode),
          Effect.mapError(
            (e) =>
              new StagingError({
                code: ErrorCode.STAGING_FAILED,
                message: `Failed to copy ${contextPath} to ${destination}: ${e.message}`,
                source,
                cause: e,
              })
          )
        );

        return { staged: destination };
      })
  );

// ============================================================================
// 5. Declare entrypoint
// ============================================================================

export const declareEntrypoint = (
  plan: ProvisionPlan
): SetupStep<FetchedBase, EntrypointDeclared, ProvisioningError, ImageBuilder> =>
  SetupStep.pure(`Declaring entrypoint ${JSON.stringify(plan.entrypoint)}`, ({ container }) =>
    pipe(
      Effect.flatMap(ImageBuilder, (builder) => builder.setEntrypoint(container, plan.entrypoint)),
      Effect.mapError(builderFailure("entrypoint", "Failed to declare entrypoint")),
      Effect.as({ entrypoint: plan.entrypoint })
    )
  );

// ============================================================================
// 6. Commit
// ============================================================================

export const commitImage = (
  plan: ProvisionPlan
): SetupStep<FetchedBase, ImageCommitted, ProvisioningError, ImageBuilder> =>
  SetupStep.pure(`Committing ${plan.tag}`, ({ container }) =>
    pipe(
      Effect.flatMap(ImageBuilder, (builder) => builder.commit(container, plan.tag)),
      Effect.map((imageId): ImageCommitted => ({ imageId })),
      Effect.mapError(builderFailure("commit", `Failed to commit ${plan.tag}`))
    )
  );
