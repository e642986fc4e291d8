// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Host mutations used by the install paths. Everything that touches a root
 * owned file or the package database runs through the CommandExecutor as a
 * privileged command.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { GeneralError, NetworkError, SystemError } from "../lib/errors";
import { extractMessage } from "../lib/match-helpers";
import { SYSTEM_PATHS } from "../lib/paths";
import { pathJoin } from "../lib/types";
import { listDirectory, readFile } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";
import { RemoteFetcher } from "../system/services/remote";

export type InstallEnv = CommandExecutor | RemoteFetcher | FileSystem.FileSystem;
export type InstallFailure = SystemError | GeneralError | NetworkError;

export const privileged = (
  command: readonly string[],
  stdin?: string
): Effect.Effect<void, SystemError | GeneralError, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    yield* executor.execSuccess(command, {
      privileged: true,
      captureStdout: false,
      ...(stdin !== undefined ? { stdin } : {}),
    });
  });

/**
 * Run a step whose failure is worth a warning but does not fail the path,
 * such as restarting a daemon after its config was written.
 */
export const bestEffort = <R>(
  description: string,
  effect: Effect.Effect<void, InstallFailure, R>
): Effect.Effect<void, never, R> =>
  effect.pipe(
    Effect.catchAll((e) => Effect.logWarning(`${description} failed: ${extractMessage(e)}`))
  );

/** Write a root-owned file through `tee`. */
export const writeRootFile = (
  path: string,
  content: string
): Effect.Effect<void, SystemError | GeneralError, CommandExecutor> =>
  privileged(["tee", path], content);

export const aptUpdate: Effect.Effect<void, SystemError | GeneralError, CommandExecutor> =
  privileged(["apt-get", "update", "-y"]);

export const aptInstall = (
  packages: readonly string[],
  options: { readonly noRecommends?: boolean } = {}
): Effect.Effect<void, SystemError | GeneralError, CommandExecutor> =>
  privileged([
    "apt-get",
    "install",
    "-y",
    ...(options.noRecommends === true ? ["--no-install-recommends"] : []),
    ...packages,
  ]);

export const enableService = (
  unit: string
): Effect.Effect<void, SystemError | GeneralError, CommandExecutor> =>
  privileged(["systemctl", "enable", "--now", unit]);

/** Fetch an ASCII-armored key and store it dearmored as an APT keyring. */
export const installKeyring = (
  keyUrl: string,
  keyring: string
): Effect.Effect<void, InstallFailure, CommandExecutor | RemoteFetcher> =>
  Effect.gen(function* () {
    const remote = yield* RemoteFetcher;
    yield* privileged(["install", "-m", "0755", "-d", SYSTEM_PATHS.aptKeyrings]);
    const key = yield* remote.fetchText(keyUrl);
    yield* privileged(["gpg", "--batch", "--yes", "--dearmor", "-o", keyring], key);
    yield* privileged(["chmod", "a+r", keyring]);
  });

/**
 * Point every Microsoft `Signed-By=` option at the canonical keyring, so
 * adding that keyring does not produce "Conflicting values set for option
 * Signed-By".
 */
export const normalizeSignedBy = (content: string): string =>
  content.replace(/Signed-By=[^\s\]]*/g, `Signed-By=${SYSTEM_PATHS.microsoftKeyring}`);

export const normalizeMicrosoftSources: Effect.Effect<
  void,
  SystemError | GeneralError,
  CommandExecutor | FileSystem.FileSystem
> = Effect.gen(function* () {
  const entries = yield* listDirectory(SYSTEM_PATHS.aptSourcesDir);
  for (const entry of entries.filter((e) => e.endsWith(".list"))) {
    const file = pathJoin(SYSTEM_PATHS.aptSourcesDir, entry);
    const content = yield* readFile(file);
    if (!content.includes("packages.microsoft.com")) {
      continue;
    }
    const normalized = normalizeSignedBy(content);
    if (normalized !== content) {
      yield* Effect.logInfo(`Normalizing Signed-By entries in ${file}`);
      yield* writeRootFile(file, normalized);
    }
  }
});

/** dpkg architecture name, e.g. "amd64". */
export const dpkgArchitecture: Effect.Effect<string, SystemError | GeneralError, CommandExecutor> =
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    return (yield* executor.execOutput(["dpkg", "--print-architecture"])).trim();
  });
