// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Post-build verification. A throwaway working container is created from
 * the built image, inspected, and removed again; the image itself is never
 * modified.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, pipe } from "effect";
import { ErrorCode, type SystemError, VerificationError } from "../lib/errors";
import { createStepCounter, logSuccess } from "../lib/log";
import type { PackageName, WorkingContainer } from "../lib/types";
import { sha256File } from "../system/fs";
import { type BuilderError, ImageBuilder, type ImageBuilderService } from "./builder";
import { commandArgv } from "./package-manager";
import type { ProvisionPlan } from "./plan";

export type CheckName = "packages" | "executable" | "content" | "entrypoint";

export interface CheckResult {
  readonly name: CheckName;
  readonly passed: boolean;
  readonly detail: string;
}

export interface VerificationReport {
  readonly image: string;
  readonly checks: readonly CheckResult[];
}

const CHECK_COUNT = 4;

const check = (name: CheckName, passed: boolean, detail: string): CheckResult => ({
  name,
  passed,
  detail,
});

/** Order-independent comparison; duplicates do not count twice. */
export const samePackageSet = (
  a: readonly PackageName[],
  b: readonly PackageName[]
): boolean => {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((p) => right.has(p));
};

const sameArgv = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((word, i) => word === b[i]);

const checkPackages = (
  builder: ImageBuilderService,
  container: WorkingContainer,
  plan: ProvisionPlan
): Effect.Effect<CheckResult, BuilderError> =>
  pipe(
    builder.run(container, commandArgv(plan.manager.query(plan.packages))),
    Effect.map((result) => {
      const installed = plan.manager.parseInstalled(plan.packages, result.stdout);
      const missing = plan.packages.filter((p) => !installed.includes(p));
      return Arr.isEmptyArray(missing)
        ? check("packages", true, `${plan.packages.length} package(s) installed`)
        : check("packages", false, `Missing packages: ${missing.join(", ")}`);
    })
  );

const checkExecutable = (
  builder: ImageBuilderService,
  container: WorkingContainer,
  plan: ProvisionPlan
): Effect.Effect<CheckResult, BuilderError> =>
  pipe(
    builder.run(container, ["test", "-x", plan.stage.destination]),
    Effect.map((result) =>
      result.exitCode === 0
        ? check("executable", true, `${plan.stage.destination} is executable`)
        : check("executable", false, `${plan.stage.destination} is missing or not executable`)
    )
  );

/** `sha256sum` prints `<hex>  <path>`. */
const firstWord = (stdout: string): string => stdout.trim().split(/\s+/)[0] ?? "";

const checkContent = (
  builder: ImageBuilderService,
  container: WorkingContainer,
  plan: ProvisionPlan
): Effect.Effect<CheckResult, BuilderError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { destination, source, contextPath } = plan.stage;
    const expected = yield* sha256File(source);
    const result = yield* builder.run(container, ["sha256sum", destination]);

    if (result.exitCode !== 0) {
      return check("content", false, `Could not read ${destination}`);
    }
    return firstWord(result.stdout) === expected
      ? check("content", true, `${destination} matches ${contextPath}`)
      : check("content", false, `${destination} differs from ${contextPath}`);
  });

const checkEntrypoint = (
  builder: ImageBuilderService,
  plan: ProvisionPlan
): Effect.Effect<CheckResult, BuilderError> =>
  pipe(
    builder.inspectImage(plan.tag),
    Effect.map(({ entrypoint, cmd }): CheckResult => {
      if (!sameArgv(entrypoint, plan.entrypoint)) {
        return check(
          "entrypoint",
          false,
          `Entrypoint is ${JSON.stringify(entrypoint)}, expected ${JSON.stringify(plan.entrypoint)}`
        );
      }
      return cmd.length === 0
        ? check("entrypoint", true, `Entrypoint is ${JSON.stringify(entrypoint)}`)
        : check("entrypoint", false, `Default command should be empty, got ${JSON.stringify(cmd)}`);
    })
  );

export const verifyImage = (
  plan: ProvisionPlan
): Effect.Effect<
  VerificationReport,
  VerificationError | BuilderError | SystemError,
  ImageBuilder | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const builder = yield* ImageBuilder;
    const counter = yield* createStepCounter(CHECK_COUNT);

    const checks = yield* Effect.acquireUseRelease(
      builder.from(plan.tag),
      (container) =>
        Effect.gen(function* () {
          yield* counter.next("Checking installed packages");
          const packages = yield* checkPackages(builder, container, plan);
          yield* counter.next(`Checking ${plan.stage.destination} is executable`);
          const executable = yield* checkExecutable(builder, container, plan);
          yield* counter.next(`Comparing ${plan.stage.destination} with ${plan.stage.contextPath}`);
          const content = yield* checkContent(builder, container, plan);
          yield* counter.next("Checking entrypoint");
          const entrypoint = yield* checkEntrypoint(builder, plan);
          return [packages, executable, content, entrypoint];
        }),
      (container) =>
        pipe(
          builder.remove(container),
          Effect.catchAll((e) =>
            Effect.logWarning(`Failed to remove working container ${container}: ${e.message}`)
          )
        )
    );

    const failures = checks.filter((c) => !c.passed).map((c) => c.detail);
    if (Arr.isNonEmptyArray(failures)) {
      return yield* Effect.fail(
        new VerificationError({
          code: ErrorCode.VERIFICATION_FAILED,
          message: `Image ${plan.tag} failed ${failures.length} of ${CHECK_COUNT} checks:\n  ${failures.join("\n  ")}`,
          failures,
        })
      );
    }

    yield* logSuccess(`Verified ${plan.tag}`);
    return { image: plan.tag, checks };
  });
