#!/usr/bin/env tsx
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.
/**
 * imagesmith - declarative container image provisioner
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, pipe } from "effect";
import { cli } from "./cli/index";
import { exitCodeFromExit, logExitError } from "./cli/exit";

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(
    pipe(cli(process.argv), Effect.provide(NodeContext.layer))
  );
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

void main();
