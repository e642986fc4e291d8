// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment probe. Reads the host and never changes it: every query is a
 * file read, a stat, or a command with no side effects.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import { DRIVER_MODULES, type PackageFamily, type RequiredGroup } from "../config/field-values";
import { SYSTEM_PATHS } from "../lib/paths";
import { fileExists, listDirectory, readFileOption } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";
import { osIdentity, parseOsRelease } from "./os-release";
import {
  type HostObservations,
  type HostProfile,
  PROBED_COMMANDS,
  type ProbedCommand,
  type RocmUserland,
} from "./types";

export * from "./types";
export { osIdentity, parseOsRelease } from "./os-release";

const FAMILY_BINARIES: readonly (readonly [string, Exclude<PackageFamily, "none">])[] = [
  ["apt-get", "apt"],
  ["dnf", "dnf"],
  ["zypper", "zypper"],
];

/** First family whose manager binary is available, in priority order. */
export const pickFamily = (available: ReadonlySet<string>): PackageFamily =>
  pipe(
    FAMILY_BINARIES,
    Arr.findFirst(([binary]) => available.has(binary)),
    Option.map(([, family]) => family),
    Option.getOrElse((): PackageFamily => "none")
  );

/** Driver module names found anywhere in `lsmod` output. */
export const matchDriverModules = (lsmodOutput: string): readonly string[] =>
  DRIVER_MODULES.filter((name) => lsmodOutput.includes(name));

/** Membership of each required group, from `id -nG` output. */
export const parseGroupMembership = (idOutput: string): Record<RequiredGroup, boolean> => {
  const names = new Set(idOutput.split(/\s+/).filter((s) => s.length > 0));
  return {
    render: names.has("render"),
    video: names.has("video"),
    docker: names.has("docker"),
  };
};

/** `snap list` has a package named exactly `code`. */
export const hasCodeSnap = (snapListOutput: string): boolean =>
  snapListOutput.split("\n").some((line) => /^code\s/.test(line));

const detectFamily = (): Effect.Effect<PackageFamily, never, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const found = yield* Effect.forEach(FAMILY_BINARIES, ([binary]) =>
      pipe(
        executor.commandExists(binary),
        Effect.map((exists) => (exists ? Option.some(binary) : Option.none<string>()))
      )
    );
    return pickFamily(new Set(Arr.getSomes(found)));
  });

/**
 * Package-manager family and OS identity. An unreadable os-release leaves the
 * identity fields empty.
 */
export const probe = (): Effect.Effect<
  HostProfile,
  never,
  CommandExecutor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const packageFamily = yield* detectFamily();
    const content = yield* readFileOption(SYSTEM_PATHS.osRelease).pipe(
      Effect.catchAll((e) =>
        Effect.logDebug(`Cannot read ${SYSTEM_PATHS.osRelease}: ${e.message}`).pipe(
          Effect.as(Option.none<string>())
        )
      )
    );
    const identity = osIdentity(
      parseOsRelease(
        pipe(
          content,
          Option.getOrElse(() => "")
        )
      )
    );
    return { packageFamily, ...identity };
  });

/** Command output, or None when the command cannot run or exits non-zero. */
const queryOutput = (
  command: readonly string[]
): Effect.Effect<Option.Option<string>, never, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    return yield* executor.execOutput(command).pipe(
      Effect.map(Option.some),
      Effect.catchAll((e) =>
        Effect.logDebug(`${command.join(" ")} unavailable: ${e.message}`).pipe(
          Effect.as(Option.none<string>())
        )
      )
    );
  });

const observeCommands = (): Effect.Effect<
  Record<ProbedCommand, boolean>,
  never,
  CommandExecutor
> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const entries = yield* Effect.forEach(PROBED_COMMANDS, (name) =>
      Effect.map(executor.commandExists(name), (exists) => [name, exists] as const)
    );
    const commands: Record<ProbedCommand, boolean> = {
      docker: false,
      code: false,
      "amdgpu-install": false,
      snap: false,
      curl: false,
      wget: false,
      gpg: false,
      jq: false,
      git: false,
    };
    for (const [name, exists] of entries) {
      commands[name] = exists;
    }
    return commands;
  });

const observeRocm = (): Effect.Effect<
  RocmUserland,
  never,
  CommandExecutor | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const present = yield* fileExists(SYSTEM_PATHS.rocminfo);
    if (!present) {
      return "absent";
    }
    const run = yield* Effect.either(
      executor.exec([SYSTEM_PATHS.rocminfo], { captureStdout: false })
    );
    return Either.match(run, {
      onLeft: (): RocmUserland => "broken",
      onRight: (r): RocmUserland => (r.exitCode === 0 ? "healthy" : "broken"),
    });
  });

/**
 * Everything else the reconciler needs to know about the host. Absent kernel
 * modules and absent device nodes are reported independently.
 */
export const observe = (
  profile: HostProfile,
  user: string
): Effect.Effect<HostObservations, never, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const commands = yield* observeCommands();

    const lsmod = yield* queryOutput(["lsmod"]);
    const matched = pipe(
      lsmod,
      Option.map(matchDriverModules),
      Option.getOrElse((): readonly string[] => [])
    );
    if (matched.length === 0) {
      yield* Effect.logWarning("Kernel GPU drivers appear missing (amdgpu/kfd)");
    } else {
      yield* Effect.logDebug(`Kernel modules present: ${matched.join(", ")}`);
    }

    const kfd = yield* fileExists(SYSTEM_PATHS.kfd);
    const dri = (yield* listDirectory(SYSTEM_PATHS.dri)).length > 0;
    if (!(kfd || dri)) {
      yield* Effect.logWarning(
        `GPU device nodes (${SYSTEM_PATHS.kfd} or ${SYSTEM_PATHS.dri}/*) not found; containers won't see the GPU until drivers are installed`
      );
    }

    const idOutput = yield* queryOutput(["id", "-nG", user]);
    const groups = parseGroupMembership(
      pipe(
        idOutput,
        Option.getOrElse(() => "")
      )
    );

    const editorSnap = commands.snap
      ? pipe(yield* queryOutput(["snap", "list"]), Option.exists(hasCodeSnap))
      : false;

    const observations: HostObservations = {
      user,
      commands,
      kernelModules: { loaded: matched.length > 0, matched },
      deviceNodes: { kfd, dri },
      groups,
      rocm: yield* observeRocm(),
      editorSnap,
      dockerDaemonConfig: yield* fileExists(SYSTEM_PATHS.dockerDaemonConfig),
    };
    yield* Effect.logDebug(`Probed ${profile.distroId || "unknown"} host (${profile.packageFamily})`);
    return observations;
  });
