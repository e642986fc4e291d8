// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Queries against the ROCm package repository layout:
 *
 *   <base>/rocm/apt/<series>/dists/<codename>/InRelease
 *   <base>/rocm/apt/                         (series index)
 *   <base>/amdgpu-install/<version>/ubuntu/<codename>/
 */

import { Array as Arr, Effect, Option, pipe } from "effect";
import type { NetworkError } from "../lib/errors";
import { RemoteFetcher } from "../system/services/remote";
import { parseSeriesIndex, pickInstaller } from "./listing";

export const DEFAULT_CODENAME = "noble";

/** Ubuntu codenames tried for installer packages after the host's own. */
const INSTALLER_CODENAMES: readonly string[] = ["noble", "jammy", "bookworm"];

export const rocmKeyUrl = (base: string): string => `${base}/rocm/rocm.gpg.key`;

export const seriesIndexUrl = (base: string): string => `${base}/rocm/apt/`;

export const inReleaseUrl = (base: string, series: string, codename: string): string =>
  `${base}/rocm/apt/${series}/dists/${codename}/InRelease`;

/** One line of an APT sources file for the given repository segment. */
export const aptSourceLine = (
  base: string,
  segment: string,
  codename: string,
  keyring: string
): string => `deb [arch=amd64 signed-by=${keyring}] ${base}/rocm/apt/${segment} ${codename} main`;

export const seriesExists = (
  base: string,
  series: string,
  codename: string
): Effect.Effect<boolean, NetworkError, RemoteFetcher> =>
  Effect.gen(function* () {
    const remote = yield* RemoteFetcher;
    return yield* remote.exists(inReleaseUrl(base, series, codename));
  });

export const listSeries = (base: string): Effect.Effect<readonly string[], NetworkError, RemoteFetcher> =>
  Effect.gen(function* () {
    const remote = yield* RemoteFetcher;
    return parseSeriesIndex(yield* remote.fetchText(seriesIndexUrl(base)));
  });

const installerDirs = (base: string, version: string, codename: string): readonly string[] =>
  pipe(
    Arr.dedupe([codename, ...INSTALLER_CODENAMES]),
    Arr.map((c) => `${base}/amdgpu-install/${version}/ubuntu/${c}/`)
  );

/**
 * URL of the newest `amdgpu-install` package for a version, trying the
 * host's codename and then the known Ubuntu ones. Unreachable directories are skipped.
 */
export const findInstaller = (
  base: string,
  version: string,
  codename: string
): Effect.Effect<Option.Option<string>, never, RemoteFetcher> =>
  Effect.gen(function* () {
    const remote = yield* RemoteFetcher;
    for (const dir of installerDirs(base, version, codename)) {
      const listing = yield* remote.fetchText(dir).pipe(
        Effect.map(Option.some),
        Effect.catchAll((e) =>
          Effect.logDebug(e.message).pipe(Effect.as(Option.none<string>()))
        )
      );
      const found = pipe(
        listing,
        Option.flatMap((html) => pickInstaller(html))
      );
      if (Option.isSome(found)) {
        return Option.some(`${dir}${found.value}`);
      }
    }
    return Option.none();
  });
