// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { readFileSync } from "node:fs";
import { afterAll, afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { NodeContext } from "@effect/platform-node";
import { Effect, Option } from "effect";
import { executeBuild } from "../../src/cli/commands/build";
import { executePackages } from "../../src/cli/commands/packages";
import { executeRender } from "../../src/cli/commands/render";
import { applyTagOverride, writeJsonResult } from "../../src/cli/commands/utils";
import { executeValidate } from "../../src/cli/commands/validate";
import { renderContainerfile } from "../../src/containerfile/generator";
import type { ProvisionPlan } from "../../src/provision/plan";
import { BUILD_SCRIPT, type TempDir, makeTempDir, testConfig, testPlan } from "../helpers/fixtures";
import { SilentLogger, fakeBuilder, runTest } from "../helpers/layers";

const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

/** Everything written to stdout since the last clear, concatenated. */
const written = (): string => stdout.mock.calls.map(([chunk]) => String(chunk)).join("");

describe("commands", () => {
  let context: TempDir;
  let plan: ProvisionPlan;

  beforeEach(() => {
    context = makeTempDir();
    context.write("build.sh", BUILD_SCRIPT);
    plan = testPlan(context.path);
  });

  afterEach(() => {
    context.cleanup();
    stdout.mockClear();
  });

  afterAll(() => {
    stdout.mockRestore();
  });

  describe("applyTagOverride", () => {
    test("keeps the descriptor tag without an override", async () => {
      const result = await runTest(applyTagOverride(plan, Option.none()));
      expect(result.tag).toBe("localhost/test-image:latest");
    });

    test("--tag replaces the tag", async () => {
      const result = await runTest(applyTagOverride(plan, Option.some("localhost/other:2")));
      expect(result.tag).toBe("localhost/other:2");
      expect(result.baseImage).toBe(plan.baseImage);
    });

    test("an invalid --tag is INVALID_ARGS", async () => {
      const error = await runTest(
        Effect.flip(applyTagOverride(plan, Option.some("not a tag")))
      );
      expect(error.code).toBe(2);
    });
  });

  describe("writeJsonResult", () => {
    test("prints in json mode", async () => {
      await runTest(writeJsonResult("json", { ok: true }));
      expect(written()).toBe('{"ok":true}\n');
    });

    test("prints nothing in pretty mode", async () => {
      await runTest(writeJsonResult("pretty", { ok: true }));
      expect(written()).toBe("");
    });
  });

  describe("packages", () => {
    test("one name per line", async () => {
      await runTest(executePackages({ plan, format: "pretty" }));
      expect(written()).toBe("git\npython3-pip\n");
    });

    test("a JSON array in json mode", async () => {
      await runTest(executePackages({ plan, format: "json" }));
      expect(written()).toBe('["git","python3-pip"]\n');
    });

    test("duplicates are listed once", async () => {
      const duplicated = testPlan(
        context.path,
        testConfig({
          packages: {
            manager: "dnf",
            weakDependencies: false,
            install: [plan.packages[0], plan.packages[0]],
          },
        })
      );
      await runTest(executePackages({ plan: duplicated, format: "pretty" }));
      expect(written()).toBe("git\n");
    });
  });

  describe("render", () => {
    test("prints the Containerfile", async () => {
      await runTest(executeRender({ plan, output: Option.none() }));
      expect(written()).toBe(renderContainerfile(plan));
    });

    test("writes the Containerfile to --output", async () => {
      const target = context.file("Containerfile");
      await runTest(executeRender({ plan, output: Option.some(target) }));
      expect(readFileSync(target, "utf-8")).toBe(renderContainerfile(plan));
      expect(written()).toBe("");
    });
  });

  describe("validate", () => {
    test("reports the plan in json mode", async () => {
      const file = context.file("ci.toml");
      await runTest(
        executeValidate({
          descriptor: { config: testConfig(), files: [file] },
          plan,
          format: "json",
        })
      );
      expect(JSON.parse(written())).toEqual({
        valid: true,
        files: [file],
        baseImage: "registry.example.com/base:1",
        tag: "localhost/test-image:latest",
        manager: "dnf",
        packages: ["git", "python3-pip"],
      });
    });
  });

  describe("build", () => {
    test("commits under the overridden tag and prints the result", async () => {
      const builder = fakeBuilder();
      await Effect.runPromise(
        executeBuild({ plan, tag: Option.some("localhost/override:1"), format: "json" }).pipe(
          Effect.provide(builder.layer),
          Effect.provide(NodeContext.layer),
          Effect.provide(SilentLogger)
        )
      );

      expect(builder.calls).toContain("commit fedora-working-container localhost/override:1");
      expect(JSON.parse(written())).toEqual({
        imageId: "sha256:0123456789abcdef0123456789abcdef",
        tag: "localhost/override:1",
        packages: ["git", "python3-pip"],
        cachesPurged: true,
      });
    });
  });
});
