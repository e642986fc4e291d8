// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stage helpers shared by the commands, and the text/JSON renderings of
 * their results.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { type RunSettings, versionSpec } from "../../config/settings";
import type { HostIdentity } from "../../devcontainer/identity";
import { type TemplateInput, baseImageRef, imageTag } from "../../devcontainer/types";
import { detectContainerUser } from "../../devcontainer/user-mapping";
import type { VersionError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type HostObservations, type HostProfile, observe, probe } from "../../probe";
import type { PlannedStep } from "../../reconcile/plan";
import type { Action } from "../../reconcile/types";
import { type ResolvedVersion, resolveVersion } from "../../rocm/resolver";
import type { CommandExecutor } from "../../system/services/executor";
import type { RemoteFetcher } from "../../system/services/remote";

/** Services every command runs against. */
export type AppServices = CommandExecutor | RemoteFetcher | FileSystem.FileSystem;

export interface ProbedHost {
  readonly profile: HostProfile;
  readonly observations: HostObservations;
}

export const probeHost = (
  user: string
): Effect.Effect<ProbedHost, never, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const profile = yield* probe();
    const observations = yield* observe(profile, user);
    return { profile, observations };
  });

export const resolveFor = (
  settings: RunSettings,
  profile: HostProfile
): Effect.Effect<ResolvedVersion, VersionError, RemoteFetcher> =>
  resolveVersion(versionSpec(settings, profile.osCodename)).pipe(
    Effect.tap((resolved) =>
      Effect.logInfo(
        `ROCm ${resolved.version} (series ${resolved.series}, from ${resolved.source}${
          resolved.fallbackUsed ? ", fallback" : ""
        })`
      )
    )
  );

/** Template input for an identity captured at run start; picks the container user. */
export const templateInputFor = (
  settings: RunSettings,
  resolved: ResolvedVersion,
  identity: HostIdentity
): Effect.Effect<TemplateInput, never, CommandExecutor> =>
  Effect.gen(function* () {
    const tag = imageTag(resolved.version, settings.container.fallbackTag);
    const user = yield* detectContainerUser(
      baseImageRef(settings.container, tag),
      identity.uid,
      settings.container.userName
    );
    return { resolved, identity, user, container: settings.container };
  });

// Rendering

export const describeAction = (action: Action): string =>
  pipe(
    Match.value(action),
    Match.tag("Skip", ({ reason }) => `skip (${reason})`),
    Match.tag("Install", () => "install"),
    Match.tag("Reinstall", ({ reason }) => `reinstall (${reason})`),
    Match.tag("AddToGroup", ({ group, user }) => `add ${user} to ${group}`),
    Match.tag("WriteFile", ({ path }) => `write ${path}`),
    Match.exhaustive
  );

export const resolvedToJson = (resolved: ResolvedVersion): Record<string, unknown> => ({
  version: resolved.version,
  series: resolved.series,
  repoSegment: resolved.repoSegment,
  fallbackUsed: resolved.fallbackUsed,
  source: resolved.source,
});

export const profileToJson = (profile: HostProfile): Record<string, unknown> => ({
  packageFamily: profile.packageFamily,
  distroId: profile.distroId,
  distroVersion: profile.distroVersion,
  osCodename: Option.getOrNull(profile.osCodename),
});

export const planToJson = (
  steps: readonly { readonly id: string; readonly action: Action }[]
): readonly Record<string, unknown>[] =>
  steps.map(({ id, action }) => ({ resource: id, action: action._tag, detail: describeAction(action) }));

/** Print a plan as `resource: action` lines, or one JSON document. */
export const printPlan = (
  title: string,
  steps: readonly { readonly id: string; readonly action: Action }[],
  format: LogFormat
): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () => writeOutput(JSON.stringify({ [title]: planToJson(steps) }))),
    Match.when("pretty", () =>
      writeOutput([`${title}:`, ...steps.map(({ id, action }) => `  ${id}: ${describeAction(action)}`)].join("\n"))
    ),
    Match.exhaustive
  );

export const hostPlanEntries = (
  steps: readonly PlannedStep[]
): readonly { readonly id: string; readonly action: Action }[] =>
  steps.map((step) => ({ id: step.resource.id, action: step.action }));
