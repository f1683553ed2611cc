// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
import { describe, expect, test } from "vitest";
import { renderContainerfile, runLines } from "../../src/containerfile/generator";
import { PackageNameSchema, path } from "../../src/lib/types";
import { dnf } from "../../src/provision/package-manager";
import { testConfig, testPlan } from "../helpers/fixtures";

const contextDir = path("/srv/context");

describe("renderContainerfile", () => {
  test("dnf: install and purge share one layer", () => {
    expect(renderContainerfile(testPlan(contextDir))).toBe(
      [
        "FROM registry.example.com/base:1",
        "RUN dnf install -y --setopt=install_weak_deps=False \\",
        "      git \\",
        "      python3-pip \\",
        "    && (dnf clean all || true)",
        "COPY --chmod=0755 build.sh /usr/local/bin/build.sh",
        'ENTRYPOINT ["/usr/local/bin/build.sh"]',
        "",
      ].join("\n")
    );
  });

  test("apt: environment is scoped to each install command", () => {
    const config = testConfig({
      packages: {
        manager: "apt",
        weakDependencies: false,
        install: [PackageNameSchema.make("git"), PackageNameSchema.make("python3-pip")],
      },
    });

    expect(renderContainerfile(testPlan(contextDir, config))).toBe(
      [
        "FROM registry.example.com/base:1",
        "RUN DEBIAN_FRONTEND=noninteractive apt-get update \\",
        "    && DEBIAN_FRONTEND=noninteractive apt-get install -y --no-install-recommends \\",
        "      git \\",
        "      python3-pip \\",
        "    && (apt-get clean || true) \\",
        "    && (rm -rf /var/lib/apt/lists/* || true)",
        "COPY --chmod=0755 build.sh /usr/local/bin/build.sh",
        'ENTRYPOINT ["/usr/local/bin/build.sh"]',
        "",
      ].join("\n")
    );
  });

  test("a custom stage path is copied and used as the entrypoint", () => {
    const config = testConfig({
      stage: { source: "ci/run-tests", destination: path("/opt/ci/run-tests") },
    });
    const lines = renderContainerfile(testPlan(contextDir, config)).split("\n");

    expect(lines.slice(-3)).toEqual([
      "COPY --chmod=0755 ci/run-tests /opt/ci/run-tests",
      'ENTRYPOINT ["/opt/ci/run-tests"]',
      "",
    ]);
  });

  test("never emits CMD or ENV", () => {
    const rendered = renderContainerfile(testPlan(contextDir));
    const keywords = rendered
      .split("\n")
      .filter((line) => /^[A-Z]/.test(line))
      .map((line) => line.split(" ")[0]);

    expect(keywords).toEqual(["FROM", "RUN", "COPY", "ENTRYPOINT"]);
  });
});

describe("runLines", () => {
  test("puts each operand on its own line", () => {
    const install = dnf.install([PackageNameSchema.make("git")], { weakDependencies: true });

    expect(runLines(install, dnf.clean)).toEqual([
      "dnf install -y --setopt=install_weak_deps=True",
      "      git",
      "    && (dnf clean all || true)",
    ]);
  });

  test("renders no purge when there is nothing to clean", () => {
    const install = dnf.install([PackageNameSchema.make("git")], { weakDependencies: false });

    expect(runLines(install, [])).toEqual([
      "dnf install -y --setopt=install_weak_deps=False",
      "      git",
    ]);
  });
});
