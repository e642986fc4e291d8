// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { Option } from "effect";
import type { PackageFamily, RequiredGroup } from "../config/field-values";

/** Commands whose presence on PATH the probe records. */
export const PROBED_COMMANDS = [
  "docker",
  "code",
  "amdgpu-install",
  "snap",
  "curl",
  "wget",
  "gpg",
  "jq",
  "git",
] as const;
export type ProbedCommand = (typeof PROBED_COMMANDS)[number];

/** Tools the base package set provides; all present means the set is installed. */
export const BASE_COMMANDS: readonly ProbedCommand[] = ["curl", "wget", "gpg", "jq", "git"];

/**
 * What kind of host this is. Created once per run and never changed.
 */
export interface HostProfile {
  readonly packageFamily: PackageFamily;
  readonly distroId: string;
  readonly distroVersion: string;
  /** UBUNTU_CODENAME, else VERSION_CODENAME. */
  readonly osCodename: Option.Option<string>;
}

export type RocmUserland = "absent" | "healthy" | "broken";

/**
 * Live state of everything the reconciler manages on the host.
 */
export interface HostObservations {
  readonly user: string;
  readonly commands: Readonly<Record<ProbedCommand, boolean>>;
  readonly kernelModules: {
    readonly loaded: boolean;
    readonly matched: readonly string[];
  };
  readonly deviceNodes: {
    readonly kfd: boolean;
    readonly dri: boolean;
  };
  readonly groups: Readonly<Record<RequiredGroup, boolean>>;
  readonly rocm: RocmUserland;
  /** The editor is installed as a snap, which breaks devcontainer integration. */
  readonly editorSnap: boolean;
  readonly dockerDaemonConfig: boolean;
}
