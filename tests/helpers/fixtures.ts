// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * Descriptor and plan fixtures, plus throwaway build contexts on disk.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import type { ProvisionConfig } from "../../src/config/schema";
import {
  type AbsolutePath,
  AbsolutePathSchema,
  PackageNameSchema,
  containerImage,
  path,
} from "../../src/lib/types";
import { type ProvisionPlan, createPlan } from "../../src/provision/plan";
import { SilentLogger } from "./layers";

export const BUILD_SCRIPT = "#!/bin/sh\necho placeholder build\n";

export const testConfig = (overrides: Partial<ProvisionConfig> = {}): ProvisionConfig => ({
  image: {
    base: containerImage("registry.example.com/base:1"),
    tag: containerImage("localhost/test-image:latest"),
  },
  packages: {
    manager: "dnf",
    weakDependencies: false,
    install: [PackageNameSchema.make("git"), PackageNameSchema.make("python3-pip")],
  },
  stage: { source: "build.sh", destination: path("/usr/local/bin/build.sh") },
  logging: { level: "info", format: "pretty" },
  ...overrides,
});

/** Plan construction for tests; the duplicate-package warning is discarded. */
export const testPlan = (
  contextDir: AbsolutePath,
  config: ProvisionConfig = testConfig()
): ProvisionPlan =>
  Effect.runSync(createPlan(config, contextDir).pipe(Effect.provide(SilentLogger)));

export interface TempDir {
  readonly path: AbsolutePath;
  /** Path inside the directory; nothing is created. */
  readonly file: (...segments: string[]) => AbsolutePath;
  readonly write: (name: string, content: string) => AbsolutePath;
  readonly cleanup: () => void;
}

export const makeTempDir = (prefix = "imagesmith-test-"): TempDir => {
  const dir = AbsolutePathSchema.make(mkdtempSync(join(tmpdir(), prefix)));
  const file = (...segments: string[]): AbsolutePath =>
    AbsolutePathSchema.make(join(dir, ...segments));
  return {
    path: dir,
    file,
    write: (name, content): AbsolutePath => {
      const target = file(name);
      writeFileSync(target, content);
      return target;
    },
    cleanup: (): void => rmSync(dir, { recursive: true, force: true }),
  };
};
