// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Numeric version comparison for ROCm-style versions ("6.4", "6.4.3", "7.0.1.2").
 * Fields are compared as integers left to right, so "6.10" sorts after "6.4";
 * a missing field counts as 0 ("6.4" equals "6.4.0").
 */

import { Array as Arr, Option, Order, pipe } from "effect";

export const ROCMSTRAP_VERSION = "0.1.0";

/** Parsed dotted version: at least major.minor, any number of further fields. */
export interface ParsedVersion {
  readonly major: number;
  readonly minor: number;
  readonly rest: readonly number[];
}

const VERSION_PATTERN = /^(\d+)\.(\d+)((?:\.\d+)*)$/;
const SERIES_PREFIX = /^(\d+)\.(\d+)(?=$|\.)/;

/**
 * Parse a full version string. Returns None for anything that is not
 * dot-separated non-negative integers with at least two fields.
 *
 * @example
 * parseVersion("6.4.3") // Some({ major: 6, minor: 4, rest: [3] })
 * parseVersion("latest") // None
 */
export const parseVersion = (input: string): Option.Option<ParsedVersion> =>
  pipe(
    Option.fromNullable(VERSION_PATTERN.exec(input.trim())),
    Option.map((m) => ({
      major: Number.parseInt(m[1] ?? "0", 10),
      minor: Number.parseInt(m[2] ?? "0", 10),
      rest: (m[3] ?? "")
        .split(".")
        .filter((s) => s.length > 0)
        .map((s) => Number.parseInt(s, 10)),
    }))
  );

const fields = (v: ParsedVersion): readonly number[] => [v.major, v.minor, ...v.rest];

/** Field-by-field numeric ordering; shorter versions are padded with zeros. */
export const compareParsed = (a: ParsedVersion, b: ParsedVersion): -1 | 0 | 1 => {
  const fa = fields(a);
  const fb = fields(b);
  const length = Math.max(fa.length, fb.length);
  for (let i = 0; i < length; i++) {
    const x = fa[i] ?? 0;
    const y = fb[i] ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return 0;
};

/**
 * Compare two version strings. Unparseable strings sort before every valid
 * version and equal to each other.
 *
 * @example
 * compareVersions("6.10", "6.4") // 1
 * compareVersions("6.4", "6.4.0") // 0
 */
export const compareVersions = (a: string, b: string): -1 | 0 | 1 => {
  const pa = parseVersion(a);
  const pb = parseVersion(b);
  if (Option.isNone(pa) || Option.isNone(pb)) {
    if (Option.isSome(pa)) {
      return 1;
    }
    if (Option.isSome(pb)) {
      return -1;
    }
    return 0;
  }
  return compareParsed(pa.value, pb.value);
};

export const versionOrder: Order.Order<string> = Order.make(compareVersions);

/**
 * Check that a version is at least a minimum.
 */
export const isAtLeast = (version: string, minimum: string): boolean =>
  compareVersions(version, minimum) >= 0;

/**
 * Extract the major.minor series prefix.
 *
 * @example
 * seriesOf("6.4.3") // Some("6.4")
 * seriesOf("7.0") // Some("7.0")
 * seriesOf("latest") // None
 */
export const seriesOf = (version: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(SERIES_PREFIX.exec(version.trim())),
    Option.map((m) => `${m[1] ?? "0"}.${m[2] ?? "0"}`)
  );

/**
 * Sort versions in ascending order. Does not mutate the input.
 */
export const sortVersions = (versions: readonly string[]): string[] =>
  Arr.sort(versions, versionOrder);

/**
 * Highest valid version in a list, ignoring unparseable entries.
 */
export const maxVersion = (versions: readonly string[]): Option.Option<string> =>
  pipe(
    versions,
    Arr.filter((v) => Option.isSome(parseVersion(v))),
    Arr.match({
      onEmpty: (): Option.Option<string> => Option.none(),
      onNonEmpty: (nonEmpty): Option.Option<string> => Option.some(Arr.max(nonEmpty, versionOrder)),
    })
  );
