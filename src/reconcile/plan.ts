// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Host plan: the ordered managed resources, their observed and desired
 * states, and the action the policy picks for each.
 */

import { Match, pipe } from "effect";
import { REQUIRED_GROUPS } from "../config/field-values";
import { BASE_COMMANDS, type HostObservations, type HostProfile } from "../probe/types";
import { reconcile } from "./policy";
import {
  type Action,
  DesiredState,
  type HostPackage,
  type Resource,
  ResourceState,
  groupResource,
  packageResource,
} from "./types";

export interface HostPlanOptions {
  readonly installDrivers: boolean;
  readonly installHostRocm: boolean;
  readonly installEditor: boolean;
  /** Re-apply host resources that already match. */
  readonly reinstall: boolean;
}

export interface PlannedStep {
  readonly resource: Resource;
  readonly observed: ResourceState;
  readonly desired: DesiredState;
  readonly action: Action;
}

/**
 * Managed host resources in the order they are applied. Docker comes before
 * its daemon config and the docker group; drivers before the ROCm userland.
 */
export const hostResources = (options: HostPlanOptions, user: string): readonly Resource[] => [
  packageResource("base-packages", true),
  packageResource("docker-engine", true),
  packageResource("docker-daemon-config", false),
  packageResource("kernel-driver", false),
  ...REQUIRED_GROUPS.map((group) => groupResource(group, user)),
  packageResource("rocm-userland", options.installHostRocm),
  packageResource("editor", false),
];

const packageState = (name: HostPackage, obs: HostObservations): ResourceState =>
  pipe(
    Match.value(name),
    Match.when("base-packages", () => {
      const missing = BASE_COMMANDS.filter((c) => !obs.commands[c]);
      if (missing.length === 0) {
        return ResourceState.PresentMatching();
      }
      return missing.length === BASE_COMMANDS.length
        ? ResourceState.Absent()
        : ResourceState.PresentMismatched({ detail: `missing ${missing.join(", ")}` });
    }),
    Match.when("kernel-driver", () =>
      obs.kernelModules.loaded ? ResourceState.PresentMatching() : ResourceState.Absent()
    ),
    Match.when("rocm-userland", () =>
      pipe(
        Match.value(obs.rocm),
        Match.when("absent", () => ResourceState.Absent()),
        Match.when("healthy", () => ResourceState.PresentMatching()),
        Match.when("broken", () => ResourceState.PresentMismatched({ detail: "rocminfo fails to run" })),
        Match.exhaustive
      )
    ),
    Match.when("docker-engine", () =>
      obs.commands.docker ? ResourceState.PresentMatching() : ResourceState.Absent()
    ),
    Match.when("docker-daemon-config", () =>
      obs.dockerDaemonConfig ? ResourceState.PresentMatching() : ResourceState.Absent()
    ),
    Match.when("editor", () => {
      if (obs.editorSnap) {
        return ResourceState.PresentMismatched({ detail: "installed as a snap" });
      }
      return obs.commands.code ? ResourceState.PresentMatching() : ResourceState.Absent();
    }),
    Match.exhaustive
  );

/** Observed state of a host resource. Artifacts are observed by the emitter. */
export const observedState = (resource: Resource, obs: HostObservations): ResourceState =>
  pipe(
    Match.value(resource.kind),
    Match.tag("Package", ({ name }) => packageState(name, obs)),
    Match.tag("Group", ({ group }) =>
      obs.groups[group] ? ResourceState.PresentMatching() : ResourceState.Absent()
    ),
    Match.tag("Artifact", () => ResourceState.Absent()),
    Match.exhaustive
  );

export const desiredState = (resource: Resource, options: HostPlanOptions): DesiredState =>
  pipe(
    Match.value(resource.id),
    Match.when("kernel-driver", () =>
      options.installDrivers
        ? DesiredState.Present()
        : DesiredState.Unmanaged({ reason: "driver installation disabled (--no-install-drivers)" })
    ),
    Match.when("rocm-userland", () =>
      options.installHostRocm
        ? DesiredState.Present()
        : DesiredState.Unmanaged({
            reason: "full host ROCm userland not requested (use --install-host-rocm)",
          })
    ),
    Match.when("editor", () =>
      options.installEditor
        ? DesiredState.Present()
        : DesiredState.Unmanaged({ reason: "editor install disabled (--no-code)" })
    ),
    Match.orElse(() => DesiredState.Present())
  );

export const planHost = (
  profile: HostProfile,
  obs: HostObservations,
  options: HostPlanOptions
): readonly PlannedStep[] =>
  hostResources(options, obs.user).map((resource) => {
    const observed = observedState(resource, obs);
    const desired = desiredState(resource, options);
    return {
      resource,
      observed,
      desired,
      action: reconcile(resource, observed, desired, {
        force: options.reinstall,
        packageFamily: profile.packageFamily,
      }),
    };
  });
