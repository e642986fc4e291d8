// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI definition. The runCommand wrapper centralizes configuration loading,
 * logger installation and error display so each command stays focused on
 * its own logic.
 */

import { userInfo } from "node:os";
import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { FileSystem } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import {
  DebugModeConfig,
  HomeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
  ProjectDirConfig,
  TargetUserConfig,
} from "../config/env";
import type { LogFormat, LogLevel } from "../config/field-values";
import { loadFileConfig } from "../config/loader";
import { resolve } from "../config/resolve";
import type { FileConfig } from "../config/schema";
import { type RunSettings, type SetupFlags, buildRunSettings, defaultSetupFlags } from "../config/settings";
import { RocmstrapLoggerLive, colorize, detectColor } from "../lib/effect-logger";
import {
  type AppError,
  type ConfigError,
  type GeneralError,
  type SystemError,
  getErrorCodeName,
} from "../lib/errors";
import { configSearchPaths } from "../lib/paths";
import { ROCMSTRAP_VERSION } from "../lib/version";
import { executeProbe } from "./commands/probe";
import { executeResolve } from "./commands/resolve";
import { executeGenerate, executeSetup } from "./commands/setup";
import type { AppServices } from "./commands/utils";
import {
  type GlobalOptions,
  dryRun,
  effectiveFormat,
  force,
  globalOptions,
  hostOptions,
  project,
  versionOptions,
} from "./options";

/** Resolved runtime context for commands. CLI args > env vars > config file. */
interface CommandContext {
  readonly fileConfig: FileConfig;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
  /** Directory a relative --project is resolved against, and the default project. */
  readonly cwd: string;
  readonly projectDir: Option.Option<string>;
  readonly user: string;
}

// Context resolution

const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const cwd = process.cwd();
    const home = yield* HomeConfig.pipe(Effect.orDie);
    const fileConfig = yield* loadFileConfig(globals.config, configSearchPaths(home, cwd));

    const envLogLevel = yield* LogLevelOptionConfig.pipe(Effect.orElseSucceed(() => Option.none()));
    const envLogFormat = yield* LogFormatOptionConfig.pipe(Effect.orElseSucceed(() => Option.none()));
    const envDebug = yield* DebugModeConfig.pipe(Effect.orElseSucceed(() => false));
    const projectDir = yield* ProjectDirConfig.pipe(Effect.orElseSucceed(() => Option.none()));
    const envUser = yield* TargetUserConfig.pipe(Effect.orElseSucceed(() => Option.none()));

    const logLevel: LogLevel = pipe(
      Match.value(globals.verbose || envDebug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({ cli: globals.logLevel, env: envLogLevel, toml: fileConfig.logging.level })
      ),
      Match.exhaustive
    );

    const format: LogFormat = resolve({
      cli: effectiveFormat(globals),
      env: envLogFormat,
      toml: fileConfig.logging.format,
    });

    const user = pipe(
      envUser,
      Option.getOrElse(() => userInfo().username)
    );

    return { fileConfig, format, logLevel, cwd, projectDir, user };
  });

const settingsFor = (
  ctx: CommandContext,
  flags: SetupFlags
): Effect.Effect<RunSettings, GeneralError> =>
  buildRunSettings(
    flags,
    ctx.fileConfig,
    { projectDir: ctx.projectDir, user: Option.some(ctx.user) },
    { cwd: ctx.cwd, user: ctx.user }
  );

// Error display

/** Rocmstrap errors carry exit codes; unknown errors get generic handling. */
const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/** Sync because it runs on the exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(
        `${JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })}\n`
      )
    ),
    Match.when("pretty", () => {
      const useColor = detectColor(process.env, process.stderr.isTTY === true);
      process.stderr.write(`${colorize("red", "✗", useColor)} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

const runCommand = <E>(
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, E, AppServices>
): Effect.Effect<void, E | ConfigError | SystemError, AppServices> =>
  Effect.gen(function* () {
    const ctx = yield* resolveContext(globals).pipe(
      Effect.tapError((err) => Effect.sync(() => displayError(err, "pretty")))
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(RocmstrapLoggerLive({ level: ctx.logLevel, format: ctx.format }))
    );
  });

// Subcommand definitions

const setupCmd = Command.make(
  "setup",
  { ...globalOptions, ...versionOptions, ...hostOptions, force, project, dryRun },
  (args) =>
    runCommand(args, "setup", (ctx) =>
      Effect.gen(function* () {
        const settings: RunSettings = yield* settingsFor(ctx, {
          scope: args.scope,
          rocm: args.rocm,
          latest: args.latest,
          force: args.force,
          reinstall: args.reinstall,
          noInstallDrivers: args.noInstallDrivers,
          installHostRocm: args.installHostRocm,
          noCode: args.noCode,
          project: args.project,
          dryRun: args.dryRun,
        });
        yield* executeSetup({ settings, format: ctx.format });
      })
    )
).pipe(Command.withDescription("Provision the host for ROCm and generate a devcontainer"));

const generateCmd = Command.make(
  "generate",
  { ...globalOptions, ...versionOptions, force, project, dryRun },
  (args) =>
    runCommand(args, "generate", (ctx) =>
      Effect.gen(function* () {
        const settings = yield* settingsFor(ctx, {
          ...defaultSetupFlags,
          rocm: args.rocm,
          latest: args.latest,
          force: args.force,
          project: args.project,
          dryRun: args.dryRun,
        });
        yield* executeGenerate({ settings, format: ctx.format });
      })
    )
).pipe(Command.withDescription("Generate .devcontainer/ only (setup --scope container)"));

const probeCmd = Command.make("probe", { ...globalOptions }, (args) =>
  runCommand(args, "probe", (ctx) => executeProbe({ user: ctx.user, format: ctx.format }))
).pipe(Command.withDescription("Show what the host looks like to rocmstrap"));

const resolveCmd = Command.make("resolve", { ...globalOptions, ...versionOptions }, (args) =>
  runCommand(args, "resolve", (ctx) =>
    Effect.gen(function* () {
      const settings = yield* settingsFor(ctx, {
        ...defaultSetupFlags,
        rocm: args.rocm,
        latest: args.latest,
      });
      yield* executeResolve({ settings, format: ctx.format });
    })
  )
).pipe(Command.withDescription("Print the ROCm version setup would use"));

// Root command

const rocmstrap = Command.make("rocmstrap").pipe(
  Command.withDescription("ROCm host provisioning and devcontainer generation"),
  Command.withSubcommands([setupCmd, generateCmd, probeCmd, resolveCmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.Environment | AppServices> = Command.run(rocmstrap, {
  name: "rocmstrap",
  version: ROCMSTRAP_VERSION,
});
