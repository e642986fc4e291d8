// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * os-release(5) parsing. The file is shell-compatible KEY=value lines; values
 * may be wrapped in single or double quotes.
 */

import { Array as Arr, Option, pipe } from "effect";

const unquote = (raw: string): string => {
  const value = raw.trim();
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if (first === '"' && last === '"') {
      return value.slice(1, -1).replace(/\\(["\\$`])/g, "$1");
    }
    if (first === "'" && last === "'") {
      return value.slice(1, -1);
    }
  }
  return value;
};

const parseLine = (line: string): Option.Option<readonly [string, string]> => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) {
    return Option.none();
  }
  const eq = trimmed.indexOf("=");
  if (eq <= 0) {
    return Option.none();
  }
  return Option.some([trimmed.slice(0, eq).trim(), unquote(trimmed.slice(eq + 1))] as const);
};

/**
 * @example
 * parseOsRelease('ID=ubuntu\nVERSION_ID="24.04"')
 * // Map { "ID" => "ubuntu", "VERSION_ID" => "24.04" }
 */
export const parseOsRelease = (content: string): ReadonlyMap<string, string> =>
  new Map(pipe(content.split("\n"), Arr.filterMap(parseLine)));

const field = (fields: ReadonlyMap<string, string>, key: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(fields.get(key)),
    Option.filter((v) => v.length > 0)
  );

export interface OsIdentity {
  readonly distroId: string;
  readonly distroVersion: string;
  readonly osCodename: Option.Option<string>;
}

export const osIdentity = (fields: ReadonlyMap<string, string>): OsIdentity => ({
  distroId: pipe(
    field(fields, "ID"),
    Option.getOrElse(() => "")
  ),
  distroVersion: pipe(
    field(fields, "VERSION_ID"),
    Option.getOrElse(() => "")
  ),
  osCodename: pipe(
    field(fields, "UBUNTU_CODENAME"),
    Option.orElse(() => field(fields, "VERSION_CODENAME"))
  ),
});
