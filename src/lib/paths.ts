// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Host paths read or written during a run.
 */

import { type AbsolutePath, path, pathJoin } from "./types";

export const SYSTEM_PATHS: {
  readonly osRelease: AbsolutePath;
  readonly kfd: AbsolutePath;
  readonly dri: AbsolutePath;
  readonly driCard0: AbsolutePath;
  readonly rocminfo: AbsolutePath;
  readonly dockerDaemonConfig: AbsolutePath;
  readonly aptKeyrings: AbsolutePath;
  readonly aptSourcesDir: AbsolutePath;
  readonly aptSourcesList: AbsolutePath;
  readonly aptPreferencesDir: AbsolutePath;
  readonly rocmKeyring: AbsolutePath;
  readonly dockerKeyring: AbsolutePath;
  readonly microsoftKeyring: AbsolutePath;
  readonly rocmPin: AbsolutePath;
} = {
  osRelease: path("/etc/os-release"),
  kfd: path("/dev/kfd"),
  dri: path("/dev/dri"),
  driCard0: path("/dev/dri/card0"),
  rocminfo: path("/opt/rocm/bin/rocminfo"),
  dockerDaemonConfig: path("/etc/docker/daemon.json"),
  aptKeyrings: path("/etc/apt/keyrings"),
  aptSourcesDir: path("/etc/apt/sources.list.d"),
  aptSourcesList: path("/etc/apt/sources.list"),
  aptPreferencesDir: path("/etc/apt/preferences.d"),
  rocmKeyring: path("/etc/apt/keyrings/rocm.gpg"),
  dockerKeyring: path("/etc/apt/keyrings/docker.gpg"),
  microsoftKeyring: path("/etc/apt/keyrings/microsoft.gpg"),
  rocmPin: path("/etc/apt/preferences.d/rocm-pin-600"),
};

/** Config file search order, most specific first; the first file found is used. */
export const configSearchPaths = (home: string, cwd: string): readonly string[] => [
  pathJoin(cwd, "rocmstrap.toml"),
  pathJoin(home, ".config", "rocmstrap", "rocmstrap.toml"),
  "/etc/rocmstrap/rocmstrap.toml",
];

/** Generated artifacts live under `<project>/.devcontainer`. */
export const devcontainerDir = (projectDir: string): string => pathJoin(projectDir, ".devcontainer");
