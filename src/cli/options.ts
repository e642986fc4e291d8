// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared so that every command spells
 * and describes them the same way.
 */

import { Options as O } from "@effect/cli";
import type { Options } from "@effect/cli/Options";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel, Scope } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, SCOPE_DEFAULT, SCOPE_VALUES } from "../config/field-values";

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly config: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to rocmstrap.toml (default: search ./, ~/.config/rocmstrap, /etc/rocmstrap)"),
    O.optional
  ),
};

// Version selection

export const versionOptions: {
  readonly rocm: Options<Option.Option<string>>;
  readonly latest: Options<boolean>;
} = {
  rocm: O.text("rocm").pipe(
    O.withDescription("Pin a ROCm version (X.Y or X.Y.Z)"),
    O.optional
  ),
  latest: O.boolean("latest").pipe(
    O.withDescription("Use the newest ROCm series the repository offers")
  ),
};

// Artifact generation

export const force: Options<boolean> = O.boolean("force").pipe(
  O.withAlias("f"),
  O.withDescription("Overwrite existing devcontainer files")
);

export const project: Options<Option.Option<string>> = O.text("project").pipe(
  O.withDescription("Project directory receiving .devcontainer/ (default: current directory)"),
  O.optional
);

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Show what would be done without doing it")
);

// Host provisioning

export const hostOptions: {
  readonly scope: Options<Scope>;
  readonly reinstall: Options<boolean>;
  readonly noInstallDrivers: Options<boolean>;
  readonly installHostRocm: Options<boolean>;
  readonly noCode: Options<boolean>;
} = {
  scope: O.choice("scope", SCOPE_VALUES).pipe(
    O.withDefault(SCOPE_DEFAULT),
    O.withDescription("What to set up: host, container, or all")
  ),
  reinstall: O.boolean("reinstall").pipe(
    O.withDescription("Re-apply host packages even when already installed")
  ),
  noInstallDrivers: O.boolean("no-install-drivers").pipe(
    O.withDescription("Leave the amdgpu kernel driver alone")
  ),
  installHostRocm: O.boolean("install-host-rocm").pipe(
    O.withDescription("Also install the ROCm userland on the host")
  ),
  noCode: O.boolean("no-code").pipe(O.withDescription("Do not install the editor")),
};

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
}

/** --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
