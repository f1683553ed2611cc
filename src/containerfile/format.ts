// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Containerfile serialization. Instructions are a closed union so the
 * generator cannot emit anything this module does not know how to write.
 */

import { Array as Arr, Data, Match, pipe } from "effect";
import { isAlphaNum, isOneOf } from "../lib/char";
import { all, escapeWith } from "../lib/str";

export type Instruction = Data.TaggedEnum<{
  From: { readonly image: string };
  /** First line is the command; the rest are continuation lines. */
  Run: { readonly lines: readonly string[] };
  Copy: { readonly chmod: string; readonly source: string; readonly destination: string };
  /** Always written in exec (JSON) form. */
  Entrypoint: { readonly argv: readonly string[] };
}>;

export const Instruction = Data.taggedEnum<Instruction>();

/** Characters a POSIX shell word may carry unquoted. */
const isShellSafe = (c: string): boolean => isAlphaNum(c) || isOneOf("_@%+=:,./-")(c);

const escapeSingleQuotes = escapeWith(new Map([["'", "'\\''"]]));

/** Single-quote a shell word when it needs it. */
export const shellQuote = (word: string): string =>
  word.length > 0 && all(isShellSafe)(word) ? word : `'${escapeSingleQuotes(word)}'`;

export const shellWords = (words: readonly string[]): string => words.map(shellQuote).join(" ");

/** COPY falls back to its JSON form when a path would not survive word splitting. */
const needsJsonForm = (p: string): boolean => /[\s"']/.test(p);

const formatCopy = (chmod: string, source: string, destination: string): string =>
  needsJsonForm(source) || needsJsonForm(destination)
    ? `COPY --chmod=${chmod} ${JSON.stringify([source, destination])}`
    : `COPY --chmod=${chmod} ${source} ${destination}`;

export const formatInstruction = (instruction: Instruction): string =>
  pipe(
    Match.value(instruction),
    Match.tag("From", ({ image }) => `FROM ${image}`),
    Match.tag("Run", ({ lines }) => `RUN ${lines.join(" \\\n")}`),
    Match.tag("Copy", ({ chmod, source, destination }) => formatCopy(chmod, source, destination)),
    Match.tag("Entrypoint", ({ argv }) => `ENTRYPOINT ${JSON.stringify(argv)}`),
    Match.exhaustive
  );

export const formatContainerfile = (instructions: readonly Instruction[]): string =>
  pipe(instructions, Arr.map(formatInstruction), (lines) => `${lines.join("\n")}\n`);
