// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Layer } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors.ts";
import { inReleaseUrl, seriesIndexUrl } from "../../src/rocm/repository.ts";
import { RequestedVersion, type VersionSpec, resolveVersion } from "../../src/rocm/resolver.ts";
import { makeFakeRemote, makeLogCapture } from "../helpers/fakes.ts";

const BASE = "https://repo.example.test";

const spec = (requested: RequestedVersion, overrides: Partial<VersionSpec> = {}): VersionSpec => ({
  requested,
  minimum: "6.4",
  fallback: "6.4.3",
  preferredLatest: "7.0",
  repoBaseUrl: BASE,
  codename: "noble",
  ...overrides,
});

const run = (versionSpec: VersionSpec, pages: Record<string, string> = {}, offline = false) => {
  const remote = makeFakeRemote({ pages, offline });
  const logs = makeLogCapture();
  const result = Effect.runPromise(
    resolveVersion(versionSpec).pipe(Effect.provide(Layer.merge(remote.layer, logs.layer)))
  );
  return { result, remote, logs };
};

describe("resolveVersion", () => {
  test("an explicit pin wins without remote queries", async () => {
    const { result, remote } = run(spec(RequestedVersion.Explicit({ version: "7.0" })));
    expect(await result).toEqual({
      version: "7.0",
      series: "7.0",
      repoSegment: "7.0",
      fallbackUsed: false,
      source: "explicit",
    });
    expect(remote.requested).toEqual([]);
  });

  test("a pin below the floor falls back to the default with a warning", async () => {
    const { result, logs } = run(spec(RequestedVersion.Explicit({ version: "6.0" })));
    expect(await result).toEqual({
      version: "6.4.3",
      series: "6.4",
      repoSegment: "6.4.3",
      fallbackUsed: true,
      source: "default",
    });
    expect(logs.warnings()).toEqual(["Chosen ROCm (6.0) < minimum (6.4); using 6.4.3"]);
  });

  test("an unparseable pin falls back to the default", async () => {
    const { result, logs } = run(spec(RequestedVersion.Explicit({ version: "newest" })));
    expect((await result).fallbackUsed).toBe(true);
    expect(logs.warnings()).toEqual(["Chosen ROCm (newest) is not a version number; using 6.4.3"]);
  });

  test("no request uses the default quietly", async () => {
    const { result, logs } = run(spec(RequestedVersion.Default()));
    expect(await result).toEqual({
      version: "6.4.3",
      series: "6.4",
      repoSegment: "6.4.3",
      fallbackUsed: false,
      source: "default",
    });
    expect(logs.warnings()).toEqual([]);
  });

  test("latest prefers the preferred series when published", async () => {
    const { result } = run(spec(RequestedVersion.Latest()), {
      [inReleaseUrl(BASE, "7.0", "noble")]: "signed",
    });
    expect(await result).toEqual({
      version: "7.0",
      series: "7.0",
      repoSegment: "7.0",
      fallbackUsed: false,
      source: "preferred",
    });
  });

  test("latest uses the alias directory and reads its version from the index", async () => {
    const { result } = run(spec(RequestedVersion.Latest()), {
      [inReleaseUrl(BASE, "latest", "noble")]: "signed",
      [seriesIndexUrl(BASE)]: '<a href="6.4/"> <a href="7.1/"> <a href="latest/">',
    });
    expect(await result).toEqual({
      version: "7.1",
      series: "7.1",
      repoSegment: "latest",
      fallbackUsed: false,
      source: "latest-alias",
    });
  });

  test("latest takes the highest indexed series when no alias exists", async () => {
    const { result } = run(spec(RequestedVersion.Latest()), {
      [seriesIndexUrl(BASE)]: '<a href="6.4/"> <a href="7.0.2/"> <a href="6.10/">',
    });
    expect(await result).toEqual({
      version: "7.0.2",
      series: "7.0",
      repoSegment: "7.0.2",
      fallbackUsed: false,
      source: "index",
    });
  });

  test("latest offline keeps the default and warns", async () => {
    const { result, logs } = run(spec(RequestedVersion.Latest()), {}, true);
    expect(await result).toEqual({
      version: "6.4.3",
      series: "6.4",
      repoSegment: "6.4.3",
      fallbackUsed: true,
      source: "default",
    });
    expect(logs.warnings().at(-1)).toBe("Could not determine the latest ROCm series; using 6.4.3");
  });

  test("an explicit pin at the floor resolves whatever the default is", async () => {
    const { result } = run(spec(RequestedVersion.Explicit({ version: "7.0" }), { fallback: "6.2" }));
    expect(await result).toEqual({
      version: "7.0",
      series: "7.0",
      repoSegment: "7.0",
      fallbackUsed: false,
      source: "explicit",
    });
  });

  test("only the series of the minimum is compared", async () => {
    const { result, logs } = run(
      spec(RequestedVersion.Explicit({ version: "6.4.3" }), { minimum: "6.4.1" })
    );
    expect(await result).toEqual({
      version: "6.4.3",
      series: "6.4",
      repoSegment: "6.4.3",
      fallbackUsed: false,
      source: "explicit",
    });
    expect(logs.warnings()).toEqual([]);
  });

  test("a default below the minimum is a configuration error", async () => {
    const error = await Effect.runPromise(
      Effect.flip(resolveVersion(spec(RequestedVersion.Default(), { fallback: "6.2" }))).pipe(
        Effect.provide(makeFakeRemote().layer)
      )
    );
    expect(error._tag).toBe("VersionError");
    expect(error.code).toBe(ErrorCode.VERSION_UNRESOLVABLE);
  });
});
