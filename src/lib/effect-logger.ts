// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Application logger. Effect's default logger has no notion of step
 * progress or success/failure marks, so this one reads the style
 * annotations written by log.ts and renders them as pretty or JSON lines.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as AppLogLevel } from "../config/field-values";

type LogStyleTag = "step" | "success" | "fail";
type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

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

/** Formatting-only annotations, dropped from JSON output. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set(["logStyle", "stepNumber", "stepTotal"]);

export const toEffectLogLevel = (level: AppLogLevel): LogLevel.LogLevel =>
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
    Option.filter((v): v is LogStyleTag => v === "step" || v === "success" || v === "fail")
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  pipe(
    Match.value(useColor),
    Match.when(true, () => `${ANSI[color]}${text}${RESET}`),
    Match.when(false, () => text),
    Match.exhaustive
  );

const bold = (text: string, useColor: boolean): string =>
  pipe(
    Match.value(useColor),
    Match.when(true, () => `\x1b[1m${text}${RESET}`),
    Match.when(false, () => text),
    Match.exhaustive
  );

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
  const current = pipe(
    getStringAnnotation(annotations, "stepNumber"),
    Option.getOrElse(() => "?")
  );
  const total = pipe(
    getStringAnnotation(annotations, "stepTotal"),
    Option.getOrElse(() => "?")
  );
  return `${bold(`[${current}/${total}]`, useColor)} ${colorize("cyan", "→", useColor)} ${message}`;
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
    Match.when("fail", () => `${colorize("red", "✗", useColor)} ${message}`),
    Match.exhaustive
  );

/** Empty for causes with no failure, so plain log lines carry no trailer. */
const formatCause = (cause: Cause.Cause<unknown>): string =>
  pipe(
    Match.value(Cause.isEmpty(cause)),
    Match.when(true, () => ""),
    Match.when(false, () => `\n${Cause.pretty(cause)}`),
    Match.exhaustive
  );

export const formatPretty = (
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
        return `${levelStr} ${message}${formatCause(cause)}`;
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

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    message,
    ...collectExternalAnnotations(annotations),
  });

const isStderrOutput = (logLevel: LogLevel.LogLevel, style: Option.Option<LogStyleTag>): boolean =>
  LogLevel.greaterThanEqual(logLevel, LogLevel.Error) ||
  pipe(
    style,
    Option.map((s) => s === "fail"),
    Option.getOrElse(() => false)
  );

/** Arrays of strings are joined so `Effect.log("a", "b")` reads naturally. */
export const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

const AppLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = renderMessage(message);
    const style = getStyle(annotations);

    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );

    const stream = pipe(
      Match.value(isStderrOutput(logLevel, style)),
      Match.when(true, () => process.stderr),
      Match.when(false, () => process.stdout),
      Match.exhaustive
    );
    stream.write(`${output}\n`);
  });

/** Colors only on an interactive stdout, and never when NO_COLOR is set. */
export const detectColor = (): boolean =>
  process.stdout.isTTY === true && (process.env["NO_COLOR"] ?? "") === "";

export const AppLoggerLive = (options: {
  readonly level: AppLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      AppLogger(options.format, options.color ?? detectColor())
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
