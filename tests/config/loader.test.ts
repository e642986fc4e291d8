// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option, Schema } from "effect";
import { describe, expect, test } from "vitest";
import { loadFileConfig } from "../../src/config/loader.ts";
import { defaultFileConfig, fileConfigSchema } from "../../src/config/schema.ts";
import { ErrorCode } from "../../src/lib/errors.ts";
import { fakeFileSystem } from "../helpers/fakes.ts";
import { failureOf, runQuiet, runQuietExit } from "../helpers/layers.ts";

const PROJECT = "/srv/project/rocmstrap.toml";
const USER = "/home/dev/.config/rocmstrap/rocmstrap.toml";
const SEARCH = [PROJECT, USER, "/etc/rocmstrap/rocmstrap.toml"];

const load = (files: Record<string, string>, explicit: Option.Option<string> = Option.none()) =>
  loadFileConfig(explicit, SEARCH).pipe(Effect.provide(fakeFileSystem({ files })));

describe("fileConfigSchema", () => {
  test("an empty document decodes to the built-in defaults", () => {
    expect(defaultFileConfig()).toEqual({
      rocm: {
        default: "6.4.3",
        minimum: "6.4",
        preferredLatest: "7.0",
        repoBaseUrl: "https://repo.radeon.com",
      },
      container: {
        baseImage: "rocm/dev-ubuntu-24.04",
        fallbackTag: "6.4",
        shmSize: "16g",
        userName: "devuser",
        extensions: ["ms-python.python", "ms-toolsai.jupyter", "ms-vscode-remote.remote-containers"],
      },
      logging: { level: "info", format: "pretty" },
    });
  });

  test("fills the fields a section leaves out", () => {
    const config = Schema.decodeUnknownSync(fileConfigSchema)({ rocm: { default: "7.0" } });
    expect(config.rocm).toEqual({
      default: "7.0",
      minimum: "6.4",
      preferredLatest: "7.0",
      repoBaseUrl: "https://repo.radeon.com",
    });
  });

  test("rejects malformed values", () => {
    const decode = Schema.decodeUnknownEither(fileConfigSchema);
    expect(decode({ rocm: { default: "latest" } })._tag).toBe("Left");
    expect(decode({ container: { shmSize: "lots" } })._tag).toBe("Left");
    expect(decode({ container: { userName: "Dev User" } })._tag).toBe("Left");
    expect(decode({ rocm: { repoBaseUrl: "ftp://mirror.example.test" } })._tag).toBe("Left");
    expect(decode({ logging: { level: "trace" } })._tag).toBe("Left");
    expect(decode({ container: { shmSize: "512m", userName: "dev_1" } })._tag).toBe("Right");
  });

  test("the minimum is a major.minor series", () => {
    const decode = Schema.decodeUnknownEither(fileConfigSchema);
    expect(decode({ rocm: { minimum: "6.4.1" } })._tag).toBe("Left");
    expect(decode({ rocm: { minimum: "6" } })._tag).toBe("Left");
    expect(decode({ rocm: { minimum: "6.3" } })._tag).toBe("Right");
  });

  test("the default must meet the minimum", () => {
    const decode = Schema.decodeUnknownEither(fileConfigSchema);
    expect(decode({ rocm: { default: "6.2.4" } })._tag).toBe("Left");
    expect(decode({ rocm: { default: "7.0", minimum: "7.1" } })._tag).toBe("Left");
    expect(decode({ rocm: { default: "6.4", minimum: "6.4" } })._tag).toBe("Right");
  });
});

describe("loadFileConfig", () => {
  test("uses defaults when no file exists", async () => {
    expect(await runQuiet(load({}))).toEqual(defaultFileConfig());
  });

  test("loads the first search path that exists", async () => {
    const config = await runQuiet(
      load({
        [PROJECT]: '[container]\nshmSize = "8g"\n',
        [USER]: '[container]\nshmSize = "32g"\n[rocm]\ndefault = "7.0"\n',
      })
    );
    expect(config.container.shmSize).toBe("8g");
    expect(config.rocm.default).toBe("6.4.3");
  });

  test("falls through to later search paths", async () => {
    const config = await runQuiet(load({ [USER]: '[rocm]\ndefault = "7.0.1"\n\n[logging]\nformat = "json"\n' }));
    expect(config.rocm.default).toBe("7.0.1");
    expect(config.logging).toEqual({ level: "info", format: "json" });
  });

  test("an explicit path must exist", async () => {
    const failure = failureOf(await runQuietExit(load({ [PROJECT]: "" }, Option.some("/tmp/custom.toml"))));
    expect(Option.map(failure, (e) => e.code)).toEqual(Option.some(ErrorCode.CONFIG_NOT_FOUND));
    expect(Option.map(failure, (e) => e.message)).toEqual(
      Option.some("Configuration file not found: /tmp/custom.toml")
    );
  });

  test("a TOML syntax error is reported with the file path", async () => {
    const failure = failureOf(await runQuietExit(load({ [PROJECT]: "[rocm\ndefault = 1" })));
    expect(Option.map(failure, (e) => e.code)).toEqual(Option.some(ErrorCode.CONFIG_PARSE_ERROR));
    expect(Option.exists(failure, (e) => e.message.startsWith(`Failed to parse TOML in ${PROJECT}: `))).toBe(true);
  });

  test("an invalid existing file is an error, not skipped", async () => {
    const failure = failureOf(
      await runQuietExit(load({ [PROJECT]: '[rocm]\nminimum = "six"\n', [USER]: "" }))
    );
    expect(Option.map(failure, (e) => e.code)).toEqual(Option.some(ErrorCode.CONFIG_VALIDATION_ERROR));
    expect(
      Option.exists(failure, (e) => e.message.startsWith(`Configuration validation failed for ${PROJECT}:\n`))
    ).toBe(true);
  });
});
