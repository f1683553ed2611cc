// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Package-manager families. Each family turns a Package Set and an
 * Install Policy into concrete commands; nothing here runs anything.
 * The same command values feed both the buildah pipeline and the
 * Containerfile renderer, so the two can never disagree.
 */

import { Data, Match, pipe } from "effect";
import type { PackageManagerName } from "../config/field-values";
import type { PackageName } from "../lib/types";

/**
 * A command to run inside the image.
 * `Exec` keeps its operands (package names) apart from the fixed words so
 * renderers can lay them out one per line. `Shell` exists for the one
 * purge that needs a glob.
 */
export type PackageCommand = Data.TaggedEnum<{
  Exec: {
    readonly argv: readonly string[];
    readonly operands: readonly string[];
    readonly env: Readonly<Record<string, string>>;
  };
  Shell: { readonly script: string };
}>;

export const PackageCommand = Data.taggedEnum<PackageCommand>();

const exec = (
  argv: readonly string[],
  operands: readonly string[] = [],
  env: Readonly<Record<string, string>> = {}
): PackageCommand => PackageCommand.Exec({ argv, operands, env });

/** Full argument vector as it is handed to the process. */
export const commandArgv = (command: PackageCommand): readonly string[] =>
  pipe(
    Match.value(command),
    Match.tag("Exec", ({ argv, operands }) => [...argv, ...operands]),
    Match.tag("Shell", ({ script }) => ["sh", "-c", script]),
    Match.exhaustive
  );

export const commandEnv = (command: PackageCommand): Readonly<Record<string, string>> =>
  pipe(
    Match.value(command),
    Match.tag("Exec", ({ env }) => env),
    Match.tag("Shell", () => ({})),
    Match.exhaustive
  );

/** Whether weak (recommended) dependencies are pulled in. Same for every build. */
export interface InstallPolicy {
  readonly weakDependencies: boolean;
}

export interface PackageManager {
  readonly name: PackageManagerName;
  readonly install: (
    packages: readonly PackageName[],
    policy: InstallPolicy
  ) => readonly PackageCommand[];
  /** Cache purge; failures here never fail a build. */
  readonly clean: readonly PackageCommand[];
  /** Lists which of `packages` are installed, one per line, arch-qualified. May exit non-zero. */
  readonly query: (packages: readonly PackageName[]) => PackageCommand;
  /** Subset of `requested` reported installed by `query`'s stdout. */
  readonly parseInstalled: (
    requested: readonly PackageName[],
    stdout: string
  ) => readonly PackageName[];
}

const outputLines = (stdout: string): readonly string[] =>
  stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

/**
 * Name comparison that tolerates an architecture suffix on either side
 * (`python3-samba.x86_64`, `libsmbclient0:amd64`). A qualified request only
 * matches an unqualified report, never a report for another architecture.
 */
const archAwareMatch =
  (separator: string) =>
  (requested: string, reported: string): boolean => {
    const unqualified = (name: string): string => {
      const cut = name.lastIndexOf(separator);
      return cut > 0 ? name.slice(0, cut) : name;
    };
    return (
      reported === requested ||
      unqualified(reported) === requested ||
      (!reported.includes(separator) && unqualified(requested) === reported)
    );
  };

const keepReported = (
  requested: readonly PackageName[],
  reported: readonly string[],
  matches: (requested: string, reported: string) => boolean
): readonly PackageName[] => requested.filter((p) => reported.some((r) => matches(p, r)));

// ============================================================================
// dnf
// ============================================================================

export const dnf: PackageManager = {
  name: "dnf",
  install: (packages, policy) => [
    exec(
      [
        "dnf",
        "install",
        "-y",
        `--setopt=install_weak_deps=${policy.weakDependencies ? "True" : "False"}`,
      ],
      packages
    ),
  ],
  clean: [exec(["dnf", "clean", "all"])],
  // rpm prints "package X is not installed" for misses; those lines never match a name
  query: (packages) => exec(["rpm", "-q", "--queryformat", "%{NAME}.%{ARCH}\\n"], packages),
  parseInstalled: (requested, stdout) =>
    keepReported(requested, outputLines(stdout), archAwareMatch(".")),
};

// ============================================================================
// apt
// ============================================================================

const APT_ENV: Readonly<Record<string, string>> = { DEBIAN_FRONTEND: "noninteractive" };

/** `${binary:Package}\t${db:Status-Status}` lines; only "installed" counts. */
const parseDpkgStatus = (stdout: string): readonly string[] =>
  outputLines(stdout).flatMap((line) => {
    const [name, status] = line.split("\t");
    return name !== undefined && status?.trim() === "installed" ? [name.trim()] : [];
  });

export const apt: PackageManager = {
  name: "apt",
  install: (packages, policy) => [
    exec(["apt-get", "update"], [], APT_ENV),
    exec(
      ["apt-get", "install", "-y", ...(policy.weakDependencies ? [] : ["--no-install-recommends"])],
      packages,
      APT_ENV
    ),
  ],
  clean: [
    exec(["apt-get", "clean"]),
    PackageCommand.Shell({ script: "rm -rf /var/lib/apt/lists/*" }),
  ],
  query: (packages) =>
    exec(["dpkg-query", "-W", "-f", "${binary:Package}\\t${db:Status-Status}\\n"], packages),
  parseInstalled: (requested, stdout) =>
    keepReported(requested, parseDpkgStatus(stdout), archAwareMatch(":")),
};

export const packageManagerFor = (name: PackageManagerName): PackageManager =>
  pipe(
    Match.value(name),
    Match.when("dnf", () => dnf),
    Match.when("apt", () => apt),
    Match.exhaustive
  );
