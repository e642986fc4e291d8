// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { ErrorCode, errorMessage, getErrorCodeName, toExitCode } from "../../src/lib/errors.ts";

describe("errors", () => {
  test("the code table holds only codes that some failure carries", () => {
    expect(Object.keys(ErrorCode)).toEqual([
      "SUCCESS",
      "GENERAL_ERROR",
      "INVALID_ARGS",
      "DEPENDENCY_MISSING",
      "CONFIG_NOT_FOUND",
      "CONFIG_PARSE_ERROR",
      "CONFIG_VALIDATION_ERROR",
      "EXEC_FAILED",
      "FILE_READ_FAILED",
      "FILE_WRITE_FAILED",
      "DIRECTORY_CREATE_FAILED",
      "NETWORK_FAILED",
      "VERSION_UNRESOLVABLE",
      "REQUIRED_RESOURCE_FAILED",
      "ARTIFACT_WRITE_FAILED",
    ]);
  });

  test("names a code by its table key", () => {
    expect(getErrorCodeName(ErrorCode.REQUIRED_RESOURCE_FAILED)).toBe("REQUIRED_RESOURCE_FAILED");
    expect(getErrorCodeName(ErrorCode.VERSION_UNRESOLVABLE)).toBe("VERSION_UNRESOLVABLE");
  });

  test("exit codes are the error codes", () => {
    expect(toExitCode(ErrorCode.ARTIFACT_WRITE_FAILED)).toBe(50);
    expect(toExitCode(ErrorCode.INVALID_ARGS)).toBe(2);
  });

  test("errorMessage reads errors, strings and anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
