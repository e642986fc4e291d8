// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { parseSeriesIndex, pickInstaller } from "../../src/rocm/listing.ts";
import { aptSourceLine, findInstaller, inReleaseUrl } from "../../src/rocm/repository.ts";
import { makeFakeRemote } from "../helpers/fakes.ts";
import { runQuiet } from "../helpers/layers.ts";

const BASE = "https://repo.example.test";

describe("parseSeriesIndex", () => {
  test("collects numeric directories once, in page order", () => {
    const html = [
      '<a href="../">../</a>',
      '<a href="6.4/">6.4/</a>',
      '<a href="6.4.3/">6.4.3/</a>',
      '<a href="latest/">latest/</a>',
      '<a href="6.4/">6.4/</a>',
      '<a href="7.0">7.0</a>',
    ].join("\n");
    expect(parseSeriesIndex(html)).toEqual(["6.4", "6.4.3", "7.0"]);
  });
});

describe("pickInstaller", () => {
  test("chooses the newest deb by embedded version", () => {
    const html = [
      '<a href="amdgpu-install_6.4.60400-1_all.deb">',
      '<a href="amdgpu-install_6.4.60403-1_all.deb">',
      '<a href="amdgpu-install_6.4.60401-1_all.deb">',
    ].join("\n");
    expect(pickInstaller(html)).toEqual(Option.some("amdgpu-install_6.4.60403-1_all.deb"));
  });

  test("ignores packages other than the all-arch deb", () => {
    const html = '<a href="amdgpu-install-6.4.60403-1.noarch.rpm"> <a href="amdgpu-install_6.4.60403-1_amd64.deb">';
    expect(Option.isNone(pickInstaller(html))).toBe(true);
  });
});

describe("repository urls", () => {
  test("builds InRelease and source lines", () => {
    expect(inReleaseUrl(BASE, "6.4", "noble")).toBe(`${BASE}/rocm/apt/6.4/dists/noble/InRelease`);
    expect(aptSourceLine(BASE, "latest", "noble", "/etc/apt/keyrings/rocm.gpg")).toBe(
      `deb [arch=amd64 signed-by=/etc/apt/keyrings/rocm.gpg] ${BASE}/rocm/apt/latest noble main`
    );
  });
});

describe("findInstaller", () => {
  test("tries the host codename first, then the known codenames", async () => {
    const noble = `${BASE}/amdgpu-install/6.4.3/ubuntu/noble/`;
    const remote = makeFakeRemote({
      pages: { [noble]: '<a href="amdgpu-install_6.4.60403-1_all.deb">' },
    });
    const url = await runQuiet(findInstaller(BASE, "6.4.3", "jammy").pipe(Effect.provide(remote.layer)));
    expect(url).toEqual(Option.some(`${noble}amdgpu-install_6.4.60403-1_all.deb`));
    expect(remote.requested).toEqual([`${BASE}/amdgpu-install/6.4.3/ubuntu/jammy/`, noble]);
  });

  test("is none when every listing is unreachable", async () => {
    const remote = makeFakeRemote({ offline: true });
    const url = await runQuiet(findInstaller(BASE, "6.4.3", "noble").pipe(Effect.provide(remote.layer)));
    expect(Option.isNone(url)).toBe(true);
    expect(remote.requested).toEqual([
      `${BASE}/amdgpu-install/6.4.3/ubuntu/noble/`,
      `${BASE}/amdgpu-install/6.4.3/ubuntu/jammy/`,
      `${BASE}/amdgpu-install/6.4.3/ubuntu/bookworm/`,
    ]);
  });
});
