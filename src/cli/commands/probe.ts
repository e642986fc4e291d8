// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only host report: what the reconciler would see.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { writeOutput } from "../../lib/log";
import type { HostObservations, HostProfile } from "../../probe";
import type { CommandExecutor } from "../../system/services/executor";
import { probeHost, profileToJson } from "./utils";

export interface ProbeOptions {
  readonly user: string;
  readonly format: LogFormat;
}

const yesNo = (b: boolean): string => (b ? "yes" : "no");

const prettyReport = (profile: HostProfile, obs: HostObservations): string => {
  const present = Object.entries(obs.commands)
    .filter(([, found]) => found)
    .map(([name]) => name);
  const groups = Object.entries(obs.groups).map(([group, member]) => `${group}=${yesNo(member)}`);
  return [
    `Package family:   ${profile.packageFamily}`,
    `Distribution:     ${profile.distroId} ${profile.distroVersion}`.trimEnd(),
    `Codename:         ${pipe(
      profile.osCodename,
      Option.getOrElse(() => "(unknown)")
    )}`,
    `User:             ${obs.user}`,
    `Commands:         ${present.length > 0 ? present.join(", ") : "(none)"}`,
    `Kernel modules:   ${obs.kernelModules.loaded ? obs.kernelModules.matched.join(", ") : "not loaded"}`,
    `Device nodes:     kfd=${yesNo(obs.deviceNodes.kfd)} dri=${yesNo(obs.deviceNodes.dri)}`,
    `Groups:           ${groups.join(" ")}`,
    `ROCm userland:    ${obs.rocm}`,
    `Editor snap:      ${yesNo(obs.editorSnap)}`,
    `Docker daemon.json: ${yesNo(obs.dockerDaemonConfig)}`,
  ].join("\n");
};

export const executeProbe = (
  options: ProbeOptions
): Effect.Effect<void, never, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { profile, observations } = yield* probeHost(options.user);
    yield* pipe(
      Match.value(options.format),
      Match.when("json", () =>
        writeOutput(JSON.stringify({ profile: profileToJson(profile), observations }))
      ),
      Match.when("pretty", () => writeOutput(prettyReport(profile, observations))),
      Match.exhaustive
    );
  });
