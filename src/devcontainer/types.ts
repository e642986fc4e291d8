// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option, pipe } from "effect";
import { seriesOf } from "../lib/version";
import type { ResolvedVersion } from "../rocm/resolver";
import type { HostIdentity } from "./identity";
import type { ContainerUser } from "./user-mapping";

export interface ContainerSettings {
  readonly baseImage: string;
  /** Image tag used when the resolved version has no parseable series. */
  readonly fallbackTag: string;
  readonly shmSize: string;
  readonly userName: string;
  readonly extensions: readonly string[];
}

/** Everything the three artifacts are rendered from. */
export interface TemplateInput {
  readonly resolved: ResolvedVersion;
  readonly identity: HostIdentity;
  readonly user: ContainerUser;
  readonly container: ContainerSettings;
}

/** major.minor image tag, e.g. "6.4" for 6.4.3. */
export const imageTag = (version: string, fallbackTag: string): string =>
  pipe(
    seriesOf(version),
    Option.getOrElse(() => fallbackTag)
  );

export const baseImageRef = (container: ContainerSettings, tag: string): string =>
  `${container.baseImage}:${tag}-complete`;

export const torchIndexUrl = (tag: string): string => `https://download.pytorch.org/whl/rocm${tag}`;
