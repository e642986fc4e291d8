// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Reconciliation vocabulary: managed resources, their observed states, the
 * operator's desired state, and the actions that close the gap.
 */

import { Data } from "effect";
import type { RequiredGroup } from "../config/field-values";

export const ARTIFACT_NAMES = ["Dockerfile", "devcontainer.json", "setup.sh"] as const;
export type ArtifactName = (typeof ARTIFACT_NAMES)[number];

export type HostPackage =
  | "base-packages"
  | "kernel-driver"
  | "rocm-userland"
  | "docker-engine"
  | "docker-daemon-config"
  | "editor";

export type ResourceId = HostPackage | `group:${RequiredGroup}` | `artifact:${ArtifactName}`;

/**
 * What a resource is, which decides the action that brings it into place:
 * packages are installed, groups are joined, artifacts are written.
 */
export type ResourceKind = Data.TaggedEnum<{
  Package: { readonly name: HostPackage };
  Group: { readonly group: RequiredGroup; readonly user: string };
  Artifact: { readonly name: ArtifactName; readonly path: string };
}>;

export const ResourceKind = Data.taggedEnum<ResourceKind>();

export interface Resource {
  readonly id: ResourceId;
  readonly kind: ResourceKind;
  /** Exhausting every install path for a required resource is fatal. */
  readonly required: boolean;
}

export type ResourceState = Data.TaggedEnum<{
  Absent: object;
  PresentMatching: object;
  PresentMismatched: { readonly detail: string };
}>;

export const ResourceState = Data.taggedEnum<ResourceState>();

export type DesiredState = Data.TaggedEnum<{
  Present: object;
  /** Operator opted out; the resource is left alone whatever its state. */
  Unmanaged: { readonly reason: string };
}>;

export const DesiredState = Data.taggedEnum<DesiredState>();

export type Action = Data.TaggedEnum<{
  /** `warn` marks skips the operator has to act on. */
  Skip: { readonly reason: string; readonly warn: boolean };
  Install: object;
  Reinstall: { readonly reason: string };
  AddToGroup: { readonly group: RequiredGroup; readonly user: string };
  WriteFile: { readonly path: string };
}>;

export const Action = Data.taggedEnum<Action>();

export const isMutating = (action: Action): boolean => action._tag !== "Skip";

export const packageResource = (name: HostPackage, required: boolean): Resource => ({
  id: name,
  kind: ResourceKind.Package({ name }),
  required,
});

export const groupResource = (group: RequiredGroup, user: string): Resource => ({
  id: `group:${group}`,
  kind: ResourceKind.Group({ group, user }),
  required: false,
});

export const artifactResource = (name: ArtifactName, path: string): Resource => ({
  id: `artifact:${name}`,
  kind: ResourceKind.Artifact({ name, path }),
  required: true,
});
