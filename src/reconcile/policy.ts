// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The reconciliation decision. Pure: the same resource, observation, desired
 * state and context always give the same action, so a second run over an
 * unchanged host skips everything.
 */

import { Match, pipe } from "effect";
import type { PackageFamily } from "../config/field-values";
import { Action, type DesiredState, type Resource, type ResourceState } from "./types";

export interface ReconcileContext {
  /** Re-apply even when the observed state already matches. */
  readonly force: boolean;
  readonly packageFamily: PackageFamily;
}

const bringIntoPlace = (resource: Resource, observed: ResourceState): Action =>
  pipe(
    Match.value(resource.kind),
    Match.tag("Group", ({ group, user }) => Action.AddToGroup({ group, user })),
    Match.tag("Artifact", ({ path }) => Action.WriteFile({ path })),
    Match.tag("Package", () =>
      pipe(
        Match.value(observed),
        Match.tag("Absent", () => Action.Install()),
        Match.tag("PresentMismatched", ({ detail }) => Action.Reinstall({ reason: detail })),
        Match.tag("PresentMatching", () => Action.Reinstall({ reason: "forced" })),
        Match.exhaustive
      )
    ),
    Match.exhaustive
  );

/** Artifacts never overwrite an existing file unless forced, whatever its content. */
const existingArtifact = (resource: Resource, observed: ResourceState): boolean =>
  resource.kind._tag === "Artifact" && observed._tag !== "Absent";

/**
 * Decide the action for one resource.
 *
 * - Unmanaged desired state: skip.
 * - Host resources with no package family: skip with a warning.
 * - Matching state: skip, unless forced.
 * - Existing artifact: skip, unless forced.
 * - Otherwise the kind-specific action (install, reinstall, add to group, write).
 */
export const reconcile = (
  resource: Resource,
  observed: ResourceState,
  desired: DesiredState,
  context: ReconcileContext
): Action => {
  if (desired._tag === "Unmanaged") {
    return Action.Skip({ reason: desired.reason, warn: false });
  }
  if (resource.kind._tag !== "Artifact" && context.packageFamily === "none") {
    return Action.Skip({
      reason: "no supported package manager (apt, dnf, zypper); manage this resource manually",
      warn: true,
    });
  }
  if (!context.force && observed._tag === "PresentMatching") {
    return Action.Skip({ reason: "already in desired state", warn: false });
  }
  if (!context.force && existingArtifact(resource, observed)) {
    return Action.Skip({ reason: "exists; use --force to overwrite", warn: false });
  }
  return bringIntoPlace(resource, observed);
};
