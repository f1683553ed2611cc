// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Custom logger because Effect's default lacks step progress indicators and
 * styled success messages that CLI UX requires.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as ImagesmithLogLevel } from "../config/field-values";

type LogStyleTag = "step" | "success";
export type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

const ANSI: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};
const RESET = "\x1b[0m";

/** Formatting-only annotations filtered from JSON to keep logs clean for aggregation. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set([
  "logStyle",
  "stepNumber",
  "stepTotal",
  "image",
]);

export const toEffectLogLevel = (level: ImagesmithLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const getStyle = (annotations: HashMap.HashMap<string, unknown>): Option.Option<LogStyleTag> =>
  pipe(
    getStringAnnotation(annotations, "logStyle"),
    Option.filter((v): v is LogStyleTag => v === "step" || v === "success")
  );

export const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI[color]}${text}${RESET}` : text;

const bold = (text: string, useColor: boolean): string =>
  useColor ? `\x1b[1m${text}${RESET}` : text;

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const formatStepMessage = (
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string => {
  const step = pipe(
    getStringAnnotation(annotations, "stepNumber"),
    Option.getOrElse(() => "?")
  );
  const total = pipe(
    getStringAnnotation(annotations, "stepTotal"),
    Option.getOrElse(() => "?")
  );
  return `${bold(`[${step}/${total}]`, useColor)} ${colorize("cyan", "→", useColor)} ${message}`;
};

const formatStyledMessage = (
  style: LogStyleTag,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string =>
  pipe(
    Match.value(style),
    Match.when("step", () => formatStepMessage(message, annotations, useColor)),
    Match.when("success", () => `${colorize("green", "✓", useColor)} ${message}`),
    Match.exhaustive
  );

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string =>
  pipe(
    getStyle(annotations),
    Option.match({
      onNone: (): string => {
        const levelColor = pipe(
          Option.fromNullable(LEVEL_COLORS[logLevel.label]),
          Option.getOrElse((): ColorName => "white")
        );
        const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
        const imageStr = pipe(
          getStringAnnotation(annotations, "image"),
          Option.match({
            onNone: (): string => "",
            onSome: (s): string => `${colorize("cyan", `[${s}]`, useColor)} `,
          })
        );
        return `${levelStr} ${imageStr}${message}${formatCause(cause)}`;
      },
      onSome: (style): string => formatStyledMessage(style, message, annotations, useColor),
    })
  );

const collectExternalAnnotations = (
  annotations: HashMap.HashMap<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
  );

const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    ...pipe(
      getStringAnnotation(annotations, "image"),
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (s): { readonly image: string } => ({ image: s }),
      })
    ),
    message,
    ...collectExternalAnnotations(annotations),
  });

/** Effect.log("a", "b") hands the logger an array. */
export const messageText = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

export interface LogRecord {
  readonly logLevel: LogLevel.LogLevel;
  readonly message: unknown;
  readonly annotations: HashMap.HashMap<string, unknown>;
  readonly cause: Cause.Cause<unknown>;
  readonly date: Date;
}

export interface FormattedLine {
  readonly text: string;
  readonly stream: "stdout" | "stderr";
}

/** Pure formatting step of the logger. Errors go to stderr. */
export const formatLogLine = (
  record: LogRecord,
  format: LogFormat,
  useColor: boolean
): FormattedLine => {
  const msg = messageText(record.message);
  const text = pipe(
    Match.value(format),
    Match.when("json", () => formatJson(record.logLevel, msg, record.annotations, record.date)),
    Match.when("pretty", () =>
      formatPretty(record.logLevel, msg, record.annotations, record.cause, useColor)
    ),
    Match.exhaustive
  );
  return { text, stream: record.logLevel.label === "ERROR" ? "stderr" : "stdout" };
};

const ImagesmithLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const line = formatLogLine({ logLevel, message, cause, annotations, date }, format, useColor);
    const stream = line.stream === "stderr" ? process.stderr : process.stdout;
    stream.write(`${line.text}\n`);
  });

/** NO_COLOR (https://no-color.org) wins; otherwise color only on a terminal. */
export const detectColor = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): boolean => env["NO_COLOR"] === undefined && isTTY;

export const ImagesmithLoggerLive = (options: {
  readonly level: ImagesmithLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      ImagesmithLogger(options.format, options.color ?? detectColor())
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
