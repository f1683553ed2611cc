// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Plan → Containerfile. The install and the cache purge share one RUN so
 * the purge shrinks the layer it cleans, and each purge command is
 * wrapped so it can never fail the build.
 */

import { Match, pipe } from "effect";
import { type PackageCommand, commandEnv } from "../provision/package-manager";
import { type ProvisionPlan, formatMode } from "../provision/plan";
import { Instruction, formatContainerfile, shellQuote, shellWords } from "./format";

const CONTINUATION = "    && ";
const OPERAND_INDENT = "      ";

const envPrefix = (command: PackageCommand): readonly string[] =>
  Object.entries(commandEnv(command)).map(([key, value]) => `${key}=${shellQuote(value)}`);

/** One command on one line, operands included. */
const inlineCommand = (command: PackageCommand): string =>
  pipe(
    Match.value(command),
    Match.tag("Exec", (c) =>
      [...envPrefix(c), shellWords([...c.argv, ...c.operands])].join(" ")
    ),
    Match.tag("Shell", ({ script }) => script),
    Match.exhaustive
  );

/** A command with each operand on its own continuation line. */
const expandedCommand = (command: PackageCommand): readonly string[] =>
  pipe(
    Match.value(command),
    Match.tag("Exec", (c) => [
      [...envPrefix(c), shellWords(c.argv)].join(" "),
      ...c.operands.map((operand) => `${OPERAND_INDENT}${shellQuote(operand)}`),
    ]),
    Match.tag("Shell", ({ script }) => [script]),
    Match.exhaustive
  );

export const runLines = (
  install: readonly PackageCommand[],
  clean: readonly PackageCommand[]
): readonly string[] => [
  ...install.flatMap((command, i) => {
    const [head = "", ...operands] = expandedCommand(command);
    return [i === 0 ? head : `${CONTINUATION}${head}`, ...operands];
  }),
  ...clean.map((command) => `${CONTINUATION}(${inlineCommand(command)} || true)`),
];

export const containerfileInstructions = (plan: ProvisionPlan): readonly Instruction[] => [
  Instruction.From({ image: plan.baseImage }),
  Instruction.Run({
    lines: runLines(plan.manager.install(plan.packages, plan.policy), plan.manager.clean),
  }),
  Instruction.Copy({
    chmod: formatMode(plan.stage.mode),
    source: plan.stage.contextPath,
    destination: plan.stage.destination,
  }),
  Instruction.Entrypoint({ argv: plan.entrypoint }),
];

export const renderContainerfile = (plan: ProvisionPlan): string =>
  formatContainerfile(containerfileInstructions(plan));
