// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema utilities with parser-first validation design.
 * Parsers return Option<StructuredData> for safe extraction; validators
 * derive from parsers via Option.isSome.
 */

import { Effect, Either, Option, ParseResult, Schema, pipe } from "effect";
import { isAlphaNum, isLowerHex, isOneOf } from "./char";
import { ConfigError, ErrorCode } from "./errors";
import { all, uncons } from "./str";

// ============================================================================
// Error Formatting
// ============================================================================

export const parseErrorToMessage = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

/**
 * Decode unknown data with a schema, returning Effect.
 * Output format on failure:
 *   Configuration validation failed for /path/to/file.toml:
 *   └─ ["packages"]["install"] ...
 */
export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> =>
  pipe(
    Schema.decodeUnknownEither(schema, { errors: "all" })(data),
    Either.match({
      onLeft: (error): Effect.Effect<A, ConfigError> =>
        Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Configuration validation failed for ${context}:\n${parseErrorToMessage(error)}`,
            path: context,
          })
        ),
      onRight: (value): Effect.Effect<A, ConfigError> => Effect.succeed(value),
    })
  );

// ============================================================================
// Package Name Parser
// ============================================================================

/** Valid package name char: [A-Za-z0-9+._:-] */
const isPackageRest = (c: string): boolean => isAlphaNum(c) || isOneOf("+._:-")(c);

/**
 * Parse a distribution package name. The first character must be
 * alphanumeric so a name can never be mistaken for a package-manager flag.
 */
export const parsePackageName = (s: string): Option.Option<string> =>
  pipe(
    uncons(s),
    Option.filter((tuple) => isAlphaNum(tuple[0])),
    Option.filter((tuple) => all(isPackageRest)(tuple[1])),
    Option.map(() => s)
  );

export const isValidPackageName = (s: string): boolean => Option.isSome(parsePackageName(s));

// ============================================================================
// Container Image Parser
// ============================================================================

/** Parsed container image structure */
export interface ParsedContainerImage {
  readonly name: string;
  readonly tag: Option.Option<string>;
  readonly digest: Option.Option<string>;
}

/** Valid image path char: [a-zA-Z0-9_./-] */
const isImageNameChar = (c: string): boolean => isAlphaNum(c) || isOneOf("_./-")(c);

/** Registry host may carry a port: [a-zA-Z0-9_.:-] */
const isRegistryChar = (c: string): boolean => isAlphaNum(c) || isOneOf("_.:-")(c);

/** Valid tag char: [a-zA-Z0-9_.-] */
const isTagChar = (c: string): boolean => isAlphaNum(c) || isOneOf("_.-")(c);

/** Reference components open with [A-Za-z0-9]; tags may also open with `_`. */
const startsWith =
  (pred: (c: string) => boolean) =>
  (s: string): boolean =>
    pipe(
      uncons(s),
      Option.exists((tuple) => pred(tuple[0]))
    );

const startsAlphaNum = startsWith(isAlphaNum);
const isTagStart = (c: string): boolean => isAlphaNum(c) || c === "_";

interface ImageParserState {
  readonly remaining: string;
  readonly digest: Option.Option<string>;
  readonly tag: Option.Option<string>;
}

const initialImageState = (s: string): ImageParserState => ({
  remaining: s,
  digest: Option.none(),
  tag: Option.none(),
});

/** Extract @sha256:digest if present */
const extractDigest = (state: ImageParserState): Option.Option<ImageParserState> => {
  const digestIdx = state.remaining.indexOf("@sha256:");
  return digestIdx === -1
    ? Option.some(state)
    : pipe(
        Option.some(state.remaining.slice(digestIdx + 8)),
        Option.filter((digestStr) => digestStr.length > 0 && all(isLowerHex)(digestStr)),
        Option.map((digestStr) => ({
          remaining: state.remaining.slice(0, digestIdx),
          digest: Option.some(digestStr),
          tag: state.tag,
        }))
      );
};

/** Extract :tag if present. A colon before the last slash belongs to a registry port. */
const extractTag = (state: ImageParserState): Option.Option<ImageParserState> => {
  const colonIdx = state.remaining.lastIndexOf(":");
  const slashIdx = state.remaining.lastIndexOf("/");
  return colonIdx === -1 || colonIdx < slashIdx
    ? Option.some(state)
    : pipe(
        Option.some(state.remaining.slice(colonIdx + 1)),
        Option.filter((tagStr) => startsWith(isTagStart)(tagStr) && all(isTagChar)(tagStr)),
        Option.map((tagStr) => ({
          remaining: state.remaining.slice(0, colonIdx),
          digest: state.digest,
          tag: Option.some(tagStr),
        }))
      );
};

const isValidImageName = (name: string): boolean => {
  const slashIdx = name.indexOf("/");
  if (slashIdx === -1) {
    return startsAlphaNum(name) && all(isImageNameChar)(name);
  }
  const registry = name.slice(0, slashIdx);
  const repository = name.slice(slashIdx + 1);
  return (
    startsAlphaNum(registry) &&
    all(isRegistryChar)(registry) &&
    startsAlphaNum(repository) &&
    all(isImageNameChar)(repository)
  );
};

const finalizeImage = (state: ImageParserState): Option.Option<ParsedContainerImage> =>
  pipe(
    Option.some(state),
    Option.filter((s) => isValidImageName(s.remaining)),
    Option.map((s) => ({
      name: s.remaining,
      tag: s.tag,
      digest: s.digest,
    }))
  );

/**
 * Parse container image: [registry[:port]/]name[:tag][@sha256:digest]
 */
export const parseContainerImage = (s: string): Option.Option<ParsedContainerImage> =>
  pipe(
    initialImageState(s),
    Option.some,
    Option.flatMap(extractDigest),
    Option.flatMap(extractTag),
    Option.flatMap(finalizeImage)
  );

export const isValidContainerImage = (s: string): boolean => Option.isSome(parseContainerImage(s));
