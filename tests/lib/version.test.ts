// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  compareVersions,
  isAtLeast,
  maxVersion,
  parseVersion,
  seriesOf,
  sortVersions,
} from "../../src/lib/version.ts";

describe("version", () => {
  describe("parseVersion", () => {
    test("parses major.minor and further fields", () => {
      expect(parseVersion("6.4.3")).toEqual(Option.some({ major: 6, minor: 4, rest: [3] }));
      expect(parseVersion("7.0")).toEqual(Option.some({ major: 7, minor: 0, rest: [] }));
      expect(parseVersion("6.4.1.2")).toEqual(Option.some({ major: 6, minor: 4, rest: [1, 2] }));
    });

    test("rejects non-numeric and single-field input", () => {
      expect(Option.isNone(parseVersion("latest"))).toBe(true);
      expect(Option.isNone(parseVersion("7"))).toBe(true);
      expect(Option.isNone(parseVersion("6.4-rc1"))).toBe(true);
      expect(Option.isNone(parseVersion(""))).toBe(true);
    });
  });

  describe("compareVersions", () => {
    test("compares fields numerically, not lexically", () => {
      expect(compareVersions("6.10", "6.4")).toBe(1);
      expect(compareVersions("6.4", "6.10")).toBe(-1);
      expect(compareVersions("10.0", "9.9")).toBe(1);
    });

    test("treats missing fields as zero", () => {
      expect(compareVersions("6.4", "6.4.0")).toBe(0);
      expect(compareVersions("6.4.1", "6.4")).toBe(1);
    });

    test("sorts unparseable strings before valid versions", () => {
      expect(compareVersions("latest", "6.4")).toBe(-1);
      expect(compareVersions("6.4", "latest")).toBe(1);
      expect(compareVersions("foo", "bar")).toBe(0);
    });
  });

  describe("isAtLeast", () => {
    test("checks against a floor", () => {
      expect(isAtLeast("6.4.3", "6.4")).toBe(true);
      expect(isAtLeast("6.4", "6.4")).toBe(true);
      expect(isAtLeast("6.3.9", "6.4")).toBe(false);
      expect(isAtLeast("latest", "6.4")).toBe(false);
    });
  });

  describe("seriesOf", () => {
    test("extracts major.minor", () => {
      expect(seriesOf("6.4.3")).toEqual(Option.some("6.4"));
      expect(seriesOf("7.0")).toEqual(Option.some("7.0"));
      expect(seriesOf("6.10.1")).toEqual(Option.some("6.10"));
    });

    test("returns None without a numeric prefix", () => {
      expect(Option.isNone(seriesOf("latest"))).toBe(true);
      expect(Option.isNone(seriesOf("6"))).toBe(true);
    });
  });

  describe("sortVersions", () => {
    test("sorts ascending without mutating the input", () => {
      const versions = ["7.0", "6.10", "6.4.3", "6.4"];
      expect(sortVersions(versions)).toEqual(["6.4", "6.4.3", "6.10", "7.0"]);
      expect(versions).toEqual(["7.0", "6.10", "6.4.3", "6.4"]);
    });
  });

  describe("maxVersion", () => {
    test("ignores unparseable entries", () => {
      expect(maxVersion(["6.4", "latest", "6.10", "6.4.3"])).toEqual(Option.some("6.10"));
    });

    test("returns None when nothing parses", () => {
      expect(Option.isNone(maxVersion(["latest", "misc"]))).toBe(true);
      expect(Option.isNone(maxVersion([]))).toBe(true);
    });
  });
});
