// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment configuration as Effect Config values. Nothing is read until a
 * Config is yielded inside an Effect, so tests swap the source with
 * `Effect.withConfigProvider`.
 */

import { Config, ConfigProvider, Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

/** Falls back to /root when unset (containers, minimal sudo environments). */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

/** ROCMSTRAP_LOG_LEVEL; None when unset so the TOML value can apply. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  "ROCMSTRAP"
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  "ROCMSTRAP"
);

/** ROCMSTRAP_DEBUG=true forces debug logging. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "ROCMSTRAP"
);

/** ROCMSTRAP_PROJECT_DIR, then the unprefixed PROJECT_DIR. */
export const ProjectDirConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.string("PROJECT_DIR"), "ROCMSTRAP").pipe(
    Config.orElse(() => Config.string("PROJECT_DIR"))
  )
);

/**
 * The user whose groups and identity are managed. Under sudo this is the
 * invoking user, not root.
 */
export const TargetUserConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.string("SUDO_USER").pipe(Config.orElse(() => Config.string("USER")))
);

const envVarNames = {
  home: "HOME",
  user: "USER",
  sudoUser: "SUDO_USER",
  logLevel: "ROCMSTRAP_LOG_LEVEL",
  logFormat: "ROCMSTRAP_LOG_FORMAT",
  debug: "ROCMSTRAP_DEBUG",
  projectDir: "ROCMSTRAP_PROJECT_DIR",
} as const;

type EnvKey = keyof typeof envVarNames;

const OVERRIDE_KEYS: readonly EnvKey[] = [
  "home",
  "user",
  "sudoUser",
  "logLevel",
  "logFormat",
  "debug",
  "projectDir",
];

export type TestConfigOverrides = {
  readonly [K in EnvKey]?: string;
};

/**
 * ConfigProvider for tests. HOME and USER get placeholder values; everything
 * else is unset unless overridden.
 *
 * @example
 * Effect.withConfigProvider(program, createTestConfigProvider({ logLevel: "debug" }))
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([
    [envVarNames.home, "/home/testuser"],
    [envVarNames.user, "testuser"],
  ]);
  for (const key of OVERRIDE_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      values.set(envVarNames[key], value);
    }
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
