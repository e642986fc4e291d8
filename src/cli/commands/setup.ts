// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Idempotent host provisioning and devcontainer generation:
 * probe, resolve, reconcile the host, emit the artifacts. Safe to re-run:
 * resources already in place are skipped and existing artifacts are kept
 * unless forced. A required resource that cannot be installed stops the run
 * before any artifact is written.
 */

import { Effect, Option } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { RunSettings } from "../../config/settings";
import { emitAll, planAll } from "../../devcontainer/emitter";
import { type HostIdentity, captureIdentity } from "../../devcontainer/identity";
import type { ArtifactError, ProvisionError, VersionError } from "../../lib/errors";
import { logSuccess, writeOutput } from "../../lib/log";
import { devcontainerDir } from "../../lib/paths";
import { type ApplyReport, applyPlan } from "../../reconcile/apply";
import { planHost } from "../../reconcile/plan";
import type { ResolvedVersion } from "../../rocm/resolver";
import {
  type AppServices,
  type ProbedHost,
  hostPlanEntries,
  printPlan,
  probeHost,
  resolveFor,
  templateInputFor,
} from "./utils";

export interface SetupOptions {
  readonly settings: RunSettings;
  readonly format: LogFormat;
}

const emptyReport: ApplyReport = { applied: [], skipped: [], warnings: [], reloginGroups: [] };

const reconcileHost = (
  settings: RunSettings,
  host: ProbedHost,
  resolved: ResolvedVersion,
  format: LogFormat
): Effect.Effect<ApplyReport, ProvisionError, AppServices> =>
  Effect.gen(function* () {
    const steps = planHost(host.profile, host.observations, settings.host);

    if (settings.dryRun) {
      yield* printPlan("host", hostPlanEntries(steps), format);
      return emptyReport;
    }

    yield* Effect.logInfo(`Reconciling host (${host.profile.packageFamily})`);
    return yield* applyPlan(steps, {
      profile: host.profile,
      observations: host.observations,
      resolved,
      fallbackVersion: settings.rocm.default,
      repoBaseUrl: settings.rocm.repoBaseUrl,
    });
  });

const generateArtifacts = (
  settings: RunSettings,
  host: ProbedHost,
  resolved: ResolvedVersion,
  identity: HostIdentity,
  format: LogFormat
): Effect.Effect<void, ArtifactError, AppServices> =>
  Effect.gen(function* () {
    const input = yield* templateInputFor(settings, resolved, identity);
    const context = {
      dir: devcontainerDir(settings.projectDir),
      force: settings.force,
      packageFamily: host.profile.packageFamily,
    };

    if (settings.dryRun) {
      const plans = yield* planAll(input, context);
      yield* printPlan(
        "artifacts",
        plans.map((plan) => ({ id: `artifact:${plan.artifact}`, action: plan.action })),
        format
      );
      return;
    }

    yield* Effect.logInfo(`Generating devcontainer in ${context.dir}`);
    yield* emitAll(input, context);
  });

const finalNotice = (settings: RunSettings, report: ApplyReport): Effect.Effect<void> =>
  Effect.gen(function* () {
    if (report.reloginGroups.length > 0) {
      yield* Effect.logWarning(
        `${settings.user} was added to ${report.reloginGroups.join(", ")}; log out and back in (or run 'newgrp') for the change to take effect`
      );
    }
    if (report.warnings.length > 0) {
      yield* Effect.logWarning(`Completed with ${report.warnings.length} warning(s):`);
      yield* Effect.forEach(report.warnings, (w) => Effect.logWarning(`  ${w}`), { discard: true });
    }
    if (settings.scope !== "host") {
      yield* logSuccess("Done. Open the project in the editor and choose 'Reopen in Container'.");
    } else {
      yield* logSuccess("Host setup complete.");
    }
  });

export const executeSetup = (
  options: SetupOptions
): Effect.Effect<void, VersionError | ProvisionError | ArtifactError, AppServices> =>
  Effect.gen(function* () {
    const { settings, format } = options;

    const host = yield* probeHost(settings.user);
    // Captured before reconciliation so the artifacts bind the ids the run started with.
    const identity = yield* Effect.when(captureIdentity(settings.user), () => settings.scope !== "host");
    const resolved = yield* resolveFor(settings, host.profile);

    const report =
      settings.scope === "container"
        ? emptyReport
        : yield* reconcileHost(settings, host, resolved, format);

    if (Option.isSome(identity)) {
      yield* generateArtifacts(settings, host, resolved, identity.value, format);
    }

    if (settings.dryRun) {
      yield* writeOutput(
        format === "json"
          ? JSON.stringify({ dryRun: true, rocm: resolved.version })
          : `Dry run: nothing was changed (ROCm ${resolved.version}).`
      );
      return;
    }

    yield* finalNotice(settings, report);
  });

/** `generate`: the container half of setup only. */
export const executeGenerate = (
  options: SetupOptions
): Effect.Effect<void, VersionError | ProvisionError | ArtifactError, AppServices> =>
  executeSetup({ ...options, settings: { ...options.settings, scope: "container" } });
