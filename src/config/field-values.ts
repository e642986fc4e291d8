// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

export const SCOPE_VALUES = ["all", "host", "container"] as const;
export type Scope = (typeof SCOPE_VALUES)[number];
export const SCOPE_DEFAULT: Scope = "all";

export const PACKAGE_FAMILY_VALUES = ["apt", "dnf", "zypper", "none"] as const;
export type PackageFamily = (typeof PACKAGE_FAMILY_VALUES)[number];

/** Groups the invoking user must belong to for GPU and container access. */
export const REQUIRED_GROUPS = ["render", "video", "docker"] as const;
export type RequiredGroup = (typeof REQUIRED_GROUPS)[number];

/** Kernel module names whose presence in lsmod output means a driver is loaded. */
export const DRIVER_MODULES = ["amdgpu", "kfd", "amdkfd"] as const;

export const ROCM_DEFAULT_VERSION = "6.4.3";
export const ROCM_MINIMUM_SERIES = "6.4";
export const ROCM_PREFERRED_LATEST = "7.0";
export const ROCM_REPO_BASE_URL = "https://repo.radeon.com";

export const CONTAINER_BASE_IMAGE = "rocm/dev-ubuntu-24.04";
export const CONTAINER_FALLBACK_TAG = "6.4";
export const CONTAINER_SHM_SIZE = "16g";
export const CONTAINER_USER_NAME = "devuser";
export const CONTAINER_EXTENSIONS: readonly string[] = [
  "ms-python.python",
  "ms-toolsai.jupyter",
  "ms-vscode-remote.remote-containers",
];
