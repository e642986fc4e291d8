// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors.ts";
import { effectiveCommand, exec } from "../../src/system/exec.ts";
import { failureOf, runQuiet, runQuietExit } from "../helpers/layers.ts";

describe("effectiveCommand", () => {
  test("prefixes sudo for privileged commands run by a non-root user", () => {
    expect(effectiveCommand(["usermod", "-aG", "render", "dev"], true, false)).toEqual([
      "sudo",
      "--",
      "usermod",
      "-aG",
      "render",
      "dev",
    ]);
  });

  test("runs the command as is for root or unprivileged calls", () => {
    expect(effectiveCommand(["apt-get", "update"], true, true)).toEqual(["apt-get", "update"]);
    expect(effectiveCommand(["lsmod"], false, false)).toEqual(["lsmod"]);
  });
});

describe("exec", () => {
  test("rejects an empty command", async () => {
    const exit = await runQuietExit(exec([]));
    const failure = failureOf(exit);
    expect(Option.map(failure, (e) => e._tag)).toEqual(Option.some("GeneralError"));
    expect(Option.map(failure, (e) => e.code)).toEqual(Option.some(ErrorCode.INVALID_ARGS));
    expect(Option.map(failure, (e) => e.message)).toEqual(Option.some("Command array cannot be empty"));
  });

  test("completes when a command writes more than a pipe holds and output is not captured", async () => {
    const result = await runQuiet(
      exec(["sh", "-c", "head -c 1048576 /dev/zero; head -c 1048576 /dev/zero >&2; echo done"], {
        captureStdout: false,
        captureStderr: false,
      })
    );
    expect(result).toEqual({ exitCode: 0, stdout: "", stderr: "" });
  }, 20_000);

  test("captures stdout by default", async () => {
    const result = await runQuiet(exec(["sh", "-c", "printf 'a\\nb\\n'"]));
    expect(result.stdout).toBe("a\nb\n");
  });
});
