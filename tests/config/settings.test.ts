// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  DebugModeConfig,
  HomeConfig,
  LogLevelOptionConfig,
  ProjectDirConfig,
  TargetUserConfig,
  createTestConfigProvider,
} from "../../src/config/env.ts";
import { resolve } from "../../src/config/resolve.ts";
import { defaultFileConfig } from "../../src/config/schema.ts";
import {
  type SetupFlags,
  buildRunSettings,
  defaultSetupFlags,
  requestedVersion,
  versionSpec,
} from "../../src/config/settings.ts";
import { ErrorCode } from "../../src/lib/errors.ts";
import { RequestedVersion } from "../../src/rocm/resolver.ts";
import { failureOf, runQuiet, runQuietExit } from "../helpers/layers.ts";

const noEnv = { projectDir: Option.none<string>(), user: Option.none<string>() };
const defaults = { cwd: "/srv/project", user: "fallback" };

const settingsFor = (flags: Partial<SetupFlags>, env = noEnv) =>
  runQuiet(buildRunSettings({ ...defaultSetupFlags, ...flags }, defaultFileConfig(), env, defaults));

describe("resolve", () => {
  test("prefers the command line, then the environment, then the file", () => {
    expect(resolve({ cli: Option.some("a"), env: Option.some("b"), toml: "c" })).toBe("a");
    expect(resolve({ cli: Option.none(), env: Option.some("b"), toml: "c" })).toBe("b");
    expect(resolve({ cli: Option.none(), env: Option.none(), toml: "c" })).toBe("c");
  });
});

describe("requestedVersion", () => {
  test("maps flags to a request", async () => {
    expect(await runQuiet(requestedVersion(Option.some(" 7.0 "), false))).toEqual(
      RequestedVersion.Explicit({ version: "7.0" })
    );
    expect(await runQuiet(requestedVersion(Option.none(), true))).toEqual(RequestedVersion.Latest());
    expect(await runQuiet(requestedVersion(Option.none(), false))).toEqual(RequestedVersion.Default());
  });

  test("rejects --rocm together with --latest", async () => {
    const failure = failureOf(await runQuietExit(requestedVersion(Option.some("7.0"), true)));
    expect(Option.map(failure, (e) => e.code)).toEqual(Option.some(ErrorCode.INVALID_ARGS));
    expect(Option.map(failure, (e) => e.message)).toEqual(
      Option.some("--rocm and --latest cannot be used together")
    );
  });
});

describe("buildRunSettings", () => {
  test("turns the negative flags into host plan options", async () => {
    const settings = await settingsFor({ noInstallDrivers: true, noCode: true, reinstall: true });
    expect(settings.host).toEqual({
      installDrivers: false,
      installHostRocm: false,
      installEditor: false,
      reinstall: true,
    });
  });

  test("project directory comes from the flag, then the environment, then the cwd", async () => {
    expect((await settingsFor({})).projectDir).toBe("/srv/project");
    expect((await settingsFor({}, { ...noEnv, projectDir: Option.some("/env/project") })).projectDir).toBe(
      "/env/project"
    );
    expect(
      (await settingsFor({ project: Option.some("/cli/project") }, { ...noEnv, projectDir: Option.some("/env") }))
        .projectDir
    ).toBe("/cli/project");
  });

  test("the user comes from the environment before the fallback", async () => {
    expect((await settingsFor({})).user).toBe("fallback");
    expect((await settingsFor({}, { ...noEnv, user: Option.some("dev") })).user).toBe("dev");
  });

  test("versionSpec reads the rocm section and defaults the codename", async () => {
    const settings = await settingsFor({ latest: true });
    expect(versionSpec(settings, Option.none())).toEqual({
      requested: RequestedVersion.Latest(),
      minimum: "6.4",
      fallback: "6.4.3",
      preferredLatest: "7.0",
      repoBaseUrl: "https://repo.radeon.com",
      codename: "noble",
    });
    expect(versionSpec(settings, Option.some("jammy")).codename).toBe("jammy");
  });
});

describe("environment", () => {
  const read = <A>(config: Effect.Effect<A, unknown>, overrides: Parameters<typeof createTestConfigProvider>[0]) =>
    Effect.runPromise(Effect.withConfigProvider(Effect.orDie(config), createTestConfigProvider(overrides)));

  test("SUDO_USER names the target user before USER", async () => {
    expect(await read(TargetUserConfig, {})).toEqual(Option.some("testuser"));
    expect(await read(TargetUserConfig, { sudoUser: "alice" })).toEqual(Option.some("alice"));
  });

  test("prefixed settings are optional", async () => {
    expect(await read(LogLevelOptionConfig, {})).toEqual(Option.none());
    expect(await read(LogLevelOptionConfig, { logLevel: "debug" })).toEqual(Option.some("debug"));
    expect(await read(ProjectDirConfig, { projectDir: "/srv/other" })).toEqual(Option.some("/srv/other"));
    expect(await read(DebugModeConfig, {})).toBe(false);
    expect(await read(DebugModeConfig, { debug: "true" })).toBe(true);
  });

  test("HOME comes from the provider", async () => {
    expect(await read(HomeConfig, {})).toBe("/home/testuser");
  });
});
