// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The provisioning plan: a decoded descriptor resolved against a build
 * context. Everything downstream (pipeline, Containerfile, verification)
 * reads the plan, never the raw descriptor.
 */

import { Array as Arr, Effect } from "effect";
import type { ProvisionConfig } from "../config/schema";
import type { NonEmptyArray } from "../lib/assert";
import type { ConfigError } from "../lib/errors";
import { resolveWithin } from "../lib/paths";
import type { AbsolutePath, ContainerImage, PackageName } from "../lib/types";
import { type InstallPolicy, type PackageManager, packageManagerFor } from "./package-manager";

/** rwxr-xr-x */
export const EXECUTABLE_MODE = 0o755;

/** `0o755` → `"0755"`, the form buildah and COPY --chmod take. */
export const formatMode = (mode: number): string => `0${mode.toString(8)}`;

export interface StagedExecutable {
  /** Absolute path of the file in the build context. */
  readonly source: AbsolutePath;
  /** The same file relative to the build context. */
  readonly contextPath: string;
  readonly destination: AbsolutePath;
  readonly mode: number;
}

export interface ProvisionPlan {
  readonly baseImage: ContainerImage;
  readonly tag: ContainerImage;
  readonly contextDir: AbsolutePath;
  readonly manager: PackageManager;
  /** Order of first appearance, no duplicates. */
  readonly packages: NonEmptyArray<PackageName>;
  readonly policy: InstallPolicy;
  readonly stage: StagedExecutable;
  /** Always exactly `[stage.destination]`. */
  readonly entrypoint: readonly [AbsolutePath];
}

export interface DedupedPackages {
  readonly unique: NonEmptyArray<PackageName>;
  /** Each repeated name once, in order of its first repeat. */
  readonly duplicates: readonly PackageName[];
}

export const dedupePackages = (packages: NonEmptyArray<PackageName>): DedupedPackages => {
  const [first, ...rest] = packages;
  const unique = rest.reduce<NonEmptyArray<PackageName>>(
    (acc, p) => (acc.includes(p) ? acc : [...acc, p]),
    [first]
  );
  const duplicates = Arr.dedupe(packages.filter((p, i) => packages.indexOf(p) !== i));
  return { unique, duplicates };
};

export const createPlan = (
  config: ProvisionConfig,
  contextDir: AbsolutePath
): Effect.Effect<ProvisionPlan, ConfigError> =>
  Effect.gen(function* () {
    const { unique, duplicates } = dedupePackages(config.packages.install);
    if (duplicates.length > 0) {
      yield* Effect.logWarning(`Duplicate packages ignored: ${duplicates.join(", ")}`);
    }

    const source = yield* resolveWithin(contextDir, config.stage.source);
    const destination = config.stage.destination;

    return {
      baseImage: config.image.base,
      tag: config.image.tag,
      contextDir,
      manager: packageManagerFor(config.packages.manager),
      packages: unique,
      policy: { weakDependencies: config.packages.weakDependencies },
      stage: {
        source: source.absolute,
        contextPath: source.relative,
        destination,
        mode: EXECUTABLE_MODE,
      },
      entrypoint: [destination],
    };
  });

export const withTag = (plan: ProvisionPlan, tag: ContainerImage): ProvisionPlan => ({
  ...plan,
  tag,
});
