// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Replacement for Effect's default logger. Pretty mode marks steps and
 * reconciliation outcomes and prefixes the resource a line concerns; JSON
 * mode writes one object per line with the outcome as a field.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as RocmstrapLogLevel } from "../config/field-values";
import type { LogStyleTag } from "./log";

const LOG_STYLES: ReadonlySet<string> = new Set<LogStyleTag>(["step", "success", "fail", "skip", "manual"]);

const isLogStyle = (v: string): v is LogStyleTag => LOG_STYLES.has(v);
export type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

/** Formatting-only annotations, kept out of JSON output. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set([
  "logStyle",
  "stepNumber",
  "stepTotal",
  "resource",
]);

const ANSI: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

const toEffectLogLevel = (level: RocmstrapLogLevel): LogLevel.LogLevel =>
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
    Option.filter(isLogStyle)
  );

export const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI[color]}${text}\x1b[0m` : text;

const bold = (text: string, useColor: boolean): string =>
  useColor ? `\x1b[1m${text}\x1b[0m` : text;

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

const resourcePrefix = (annotations: HashMap.HashMap<string, unknown>, useColor: boolean): string =>
  pipe(
    getStringAnnotation(annotations, "resource"),
    Option.match({
      onNone: (): string => "",
      onSome: (r): string => `${colorize("cyan", `[${r}]`, useColor)} `,
    })
  );

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
    Match.when(
      "skip",
      () => `${colorize("gray", "-", useColor)} ${resourcePrefix(annotations, useColor)}${message}`
    ),
    Match.when(
      "manual",
      () => `${colorize("yellow", "!", useColor)} ${resourcePrefix(annotations, useColor)}${message}`
    ),
    Match.exhaustive
  );

/** How a styled line reads in JSON output; steps are progress, not outcomes. */
const OUTCOMES: Readonly<Record<LogStyleTag, Option.Option<string>>> = {
  step: Option.none(),
  success: Option.some("done"),
  fail: Option.some("failed"),
  skip: Option.some("skipped"),
  manual: Option.some("manual"),
};

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

/** Exported for tests; the logger itself only writes the result. */
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
        return `${levelStr} ${resourcePrefix(annotations, useColor)}${message}${formatCause(cause)}`;
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
    ...pipe(
      getStringAnnotation(annotations, "resource"),
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (r): { readonly resource: string } => ({ resource: r }),
      })
    ),
    ...pipe(
      getStyle(annotations),
      Option.flatMap((style) => OUTCOMES[style]),
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (outcome): { readonly outcome: string } => ({ outcome }),
      })
    ),
    message,
    ...collectExternalAnnotations(annotations),
  });

const isStderrOutput = (logLevel: LogLevel.LogLevel, style: Option.Option<LogStyleTag>): boolean =>
  logLevel.label === "ERROR" ||
  logLevel.label === "WARN" ||
  pipe(
    style,
    Option.map((s) => s === "fail"),
    Option.getOrElse(() => false)
  );

const RocmstrapLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    const style = getStyle(annotations);

    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );

    const stream = isStderrOutput(logLevel, style) ? process.stderr : process.stdout;
    stream.write(`${output}\n`);
  });

/**
 * Color is on for a TTY unless NO_COLOR is set; FORCE_COLOR turns it on
 * regardless of the terminal.
 */
export const detectColor = (env: NodeJS.ProcessEnv, isTTY: boolean): boolean => {
  if (env["NO_COLOR"] !== undefined && env["NO_COLOR"] !== "") {
    return false;
  }
  if (env["FORCE_COLOR"] !== undefined && env["FORCE_COLOR"] !== "0") {
    return true;
  }
  return isTTY;
};

export const RocmstrapLoggerLive = (options: {
  readonly level: RocmstrapLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> => {
  const useColor = options.color ?? detectColor(process.env, process.stdout.isTTY === true);
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, RocmstrapLogger(options.format, useColor)),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
};
