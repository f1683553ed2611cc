// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { createHash } from "node:crypto";
import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, pipe } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { VerificationError } from "../../src/lib/errors";
import { PackageNameSchema } from "../../src/lib/types";
import type { ImageBuilder, ImageBuilderService } from "../../src/provision/builder";
import type { ProvisionPlan } from "../../src/provision/plan";
import { samePackageSet, verifyImage } from "../../src/provision/verify";
import { BUILD_SCRIPT, type TempDir, makeTempDir, testPlan } from "../helpers/fixtures";
import { type FakeBuilder, SilentLogger, execResult, fakeBuilder } from "../helpers/layers";

const scriptHash = createHash("sha256").update(BUILD_SCRIPT).digest("hex");

interface ImageState {
  readonly rpmOutput: string;
  readonly executable: boolean;
  readonly contentHash: string;
  readonly cmd: readonly string[];
}

const goodImage: ImageState = {
  rpmOutput: "git.x86_64\npython3-pip.noarch\n",
  executable: true,
  contentHash: scriptHash,
  cmd: [],
};

/** Builder whose working containers answer each check from `state`. */
const imageBuilder = (state: ImageState): FakeBuilder => {
  const run: ImageBuilderService["run"] = (_ctr, argv) =>
    Effect.succeed(
      argv[0] === "rpm"
        ? execResult(0, state.rpmOutput)
        : argv[0] === "test"
          ? execResult(state.executable ? 0 : 1)
          : execResult(0, `${state.contentHash}  ${argv[1] ?? ""}\n`)
    );
  return fakeBuilder({
    run,
    inspectImage: () => Effect.succeed({ entrypoint: ["/usr/local/bin/build.sh"], cmd: state.cmd }),
  });
};

const runVerify = <A, E>(
  effect: Effect.Effect<A, E, ImageBuilder | FileSystem.FileSystem>,
  builder: FakeBuilder
): Promise<A> =>
  Effect.runPromise(
    pipe(
      effect,
      Effect.provide(builder.layer),
      Effect.provide(NodeContext.layer),
      Effect.provide(SilentLogger)
    )
  );

describe("verifyImage", () => {
  let context: TempDir;
  let plan: ProvisionPlan;

  beforeEach(() => {
    context = makeTempDir();
    context.write("build.sh", BUILD_SCRIPT);
    plan = testPlan(context.path);
  });

  afterEach(() => {
    context.cleanup();
  });

  test("passes every check on a correctly provisioned image", async () => {
    const builder = imageBuilder(goodImage);

    const report = await runVerify(verifyImage(plan), builder);

    expect(report).toEqual({
      image: "localhost/test-image:latest",
      checks: [
        { name: "packages", passed: true, detail: "2 package(s) installed" },
        { name: "executable", passed: true, detail: "/usr/local/bin/build.sh is executable" },
        { name: "content", passed: true, detail: "/usr/local/bin/build.sh matches build.sh" },
        { name: "entrypoint", passed: true, detail: 'Entrypoint is ["/usr/local/bin/build.sh"]' },
      ],
    });
  });

  test("checks inside a throwaway container and removes it", async () => {
    const builder = imageBuilder(goodImage);

    await runVerify(verifyImage(plan), builder);

    expect(builder.calls).toEqual([
      "from localhost/test-image:latest",
      "run fedora-working-container rpm -q --queryformat %{NAME}.%{ARCH}\\n git python3-pip",
      "run fedora-working-container test -x /usr/local/bin/build.sh",
      "run fedora-working-container sha256sum /usr/local/bin/build.sh",
      "inspect localhost/test-image:latest",
      "remove fedora-working-container",
    ]);
  });

  test("collects every failed check into one error", async () => {
    const builder = imageBuilder({
      rpmOutput: "git.x86_64\npackage python3-pip is not installed\n",
      executable: true,
      contentHash: "0000",
      cmd: ["/bin/sh"],
    });

    const error = await runVerify(Effect.flip(verifyImage(plan)), builder);

    expect(error).toBeInstanceOf(VerificationError);
    expect(error).toMatchObject({
      code: 42,
      failures: [
        "Missing packages: python3-pip",
        "/usr/local/bin/build.sh differs from build.sh",
        'Default command should be empty, got ["/bin/sh"]',
      ],
    });
    expect(error.message).toBe(
      [
        "Image localhost/test-image:latest failed 3 of 4 checks:",
        "  Missing packages: python3-pip",
        "  /usr/local/bin/build.sh differs from build.sh",
        '  Default command should be empty, got ["/bin/sh"]',
      ].join("\n")
    );
    expect(builder.calls.at(-1)).toBe("remove fedora-working-container");
  });

  test("reports a staged file without execute permission", async () => {
    const builder = imageBuilder({ ...goodImage, executable: false });

    const error = await runVerify(Effect.flip(verifyImage(plan)), builder);

    expect(error).toMatchObject({
      failures: ["/usr/local/bin/build.sh is missing or not executable"],
    });
  });
});

describe("samePackageSet", () => {
  const git = PackageNameSchema.make("git");
  const pip = PackageNameSchema.make("python3-pip");
  const samba = PackageNameSchema.make("samba-client");

  test("ignores order", () => {
    expect(samePackageSet([git, pip, samba], [samba, git, pip])).toBe(true);
  });

  test("ignores repeats", () => {
    expect(samePackageSet([git, git, pip], [pip, git])).toBe(true);
  });

  test("detects a missing package", () => {
    expect(samePackageSet([git, pip], [git])).toBe(false);
  });

  test("detects a substituted package", () => {
    expect(samePackageSet([git, pip], [git, samba])).toBe(false);
  });
});
