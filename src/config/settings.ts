// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * RunSettings: command-line flags, environment and the config file folded
 * into one immutable value that every stage reads from.
 */

import { Effect, Option, pipe } from "effect";
import { ErrorCode, GeneralError } from "../lib/errors";
import type { HostPlanOptions } from "../reconcile/plan";
import { DEFAULT_CODENAME } from "../rocm/repository";
import { RequestedVersion, type VersionSpec } from "../rocm/resolver";
import type { Scope } from "./field-values";
import { resolve } from "./resolve";
import type { ContainerConfig, FileConfig, RocmConfig } from "./schema";

/** Flags of `setup`; `generate` and `resolve` fill the ones they lack with defaults. */
export interface SetupFlags {
  readonly scope: Scope;
  readonly rocm: Option.Option<string>;
  readonly latest: boolean;
  readonly force: boolean;
  readonly reinstall: boolean;
  readonly noInstallDrivers: boolean;
  readonly installHostRocm: boolean;
  readonly noCode: boolean;
  readonly project: Option.Option<string>;
  readonly dryRun: boolean;
}

export interface EnvSettings {
  readonly projectDir: Option.Option<string>;
  readonly user: Option.Option<string>;
}

export interface RunSettings {
  readonly scope: Scope;
  readonly requested: RequestedVersion;
  /** Overwrite existing artifacts. */
  readonly force: boolean;
  readonly dryRun: boolean;
  readonly host: HostPlanOptions;
  readonly projectDir: string;
  /** The user whose groups and identity are managed. */
  readonly user: string;
  readonly rocm: RocmConfig;
  readonly container: ContainerConfig;
}

export const defaultSetupFlags: SetupFlags = {
  scope: "all",
  rocm: Option.none(),
  latest: false,
  force: false,
  reinstall: false,
  noInstallDrivers: false,
  installHostRocm: false,
  noCode: false,
  project: Option.none(),
  dryRun: false,
};

/** `--rocm` and `--latest` are mutually exclusive. */
export const requestedVersion = (
  rocm: Option.Option<string>,
  latest: boolean
): Effect.Effect<RequestedVersion, GeneralError> =>
  pipe(
    rocm,
    Option.match({
      onNone: (): Effect.Effect<RequestedVersion, GeneralError> =>
        Effect.succeed(latest ? RequestedVersion.Latest() : RequestedVersion.Default()),
      onSome: (version): Effect.Effect<RequestedVersion, GeneralError> =>
        latest
          ? Effect.fail(
              new GeneralError({
                code: ErrorCode.INVALID_ARGS,
                message: "--rocm and --latest cannot be used together",
              })
            )
          : Effect.succeed(RequestedVersion.Explicit({ version: version.trim() })),
    })
  );

export const buildRunSettings = (
  flags: SetupFlags,
  file: FileConfig,
  env: EnvSettings,
  defaults: { readonly cwd: string; readonly user: string }
): Effect.Effect<RunSettings, GeneralError> =>
  Effect.gen(function* () {
    const requested = yield* requestedVersion(flags.rocm, flags.latest);
    return {
      scope: flags.scope,
      requested,
      force: flags.force,
      dryRun: flags.dryRun,
      host: {
        installDrivers: !flags.noInstallDrivers,
        installHostRocm: flags.installHostRocm,
        installEditor: !flags.noCode,
        reinstall: flags.reinstall,
      },
      projectDir: resolve({ cli: flags.project, env: env.projectDir, toml: defaults.cwd }),
      user: pipe(
        env.user,
        Option.getOrElse(() => defaults.user)
      ),
      rocm: file.rocm,
      container: file.container,
    };
  });

/** Resolver input; the codename selects the APT distribution probed for each series. */
export const versionSpec = (settings: RunSettings, codename: Option.Option<string>): VersionSpec => ({
  requested: settings.requested,
  minimum: settings.rocm.minimum,
  fallback: settings.rocm.default,
  preferredLatest: settings.rocm.preferredLatest,
  repoBaseUrl: settings.rocm.repoBaseUrl,
  codename: pipe(
    codename,
    Option.getOrElse(() => DEFAULT_CODENAME)
  ),
});
