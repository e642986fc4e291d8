// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Pattern-matching parsers for the directory-style HTML listings served by
 * the ROCm repository. Nothing here fetches; input is the page body.
 */

import { Array as Arr, Option, Order, pipe } from "effect";
import { compareVersions, parseVersion } from "../lib/version";

const SERIES_LINK = /href="(\d+\.\d+(?:\.\d+)*)\/?"/g;

const INSTALLER_FILE = /amdgpu-install_[^"/<>\s]+_all\.deb/g;

const matchAll = (text: string, pattern: RegExp, group: number): readonly string[] =>
  Array.from(text.matchAll(pattern), (m) => m[group] ?? "").filter((s) => s.length > 0);

/**
 * Version directories linked from a repository index page, deduplicated, in
 * page order.
 *
 * @example
 * parseSeriesIndex('<a href="6.4/">6.4/</a> <a href="latest/">latest/</a>')
 * // ["6.4"]
 */
export const parseSeriesIndex = (html: string): readonly string[] =>
  Arr.dedupe(matchAll(html, SERIES_LINK, 1));

/** Dotted number embedded in an installer file name, e.g. "6.4.60403" from `amdgpu-install_6.4.60403-1_all.deb`. */
const embeddedVersion = (fileName: string): string =>
  pipe(
    Option.fromNullable(/(\d+(?:\.\d+)+)/.exec(fileName)),
    Option.flatMap((m) => Option.fromNullable(m[1])),
    Option.filter((v) => Option.isSome(parseVersion(v))),
    Option.getOrElse(() => "")
  );

const installerOrder: Order.Order<string> = Order.combine(
  Order.make((a: string, b: string) => compareVersions(embeddedVersion(a), embeddedVersion(b))),
  Order.string
);

/**
 * Newest `amdgpu-install` .deb named in a listing page.
 */
export const pickInstaller = (html: string): Option.Option<string> =>
  pipe(
    matchAll(html, INSTALLER_FILE, 0),
    Arr.match({
      onEmpty: (): Option.Option<string> => Option.none(),
      onNonEmpty: (names): Option.Option<string> => Option.some(Arr.max(names, installerOrder)),
    })
  );
