// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Typed errors for rocmstrap. Every error carries a numeric code from
 * ErrorCode; the entry point turns that code into the process exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly DEPENDENCY_MISSING: 4;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly EXEC_FAILED: 20;
  readonly FILE_READ_FAILED: 21;
  readonly FILE_WRITE_FAILED: 22;
  readonly DIRECTORY_CREATE_FAILED: 23;
  readonly NETWORK_FAILED: 24;

  // Version (30-39)
  readonly VERSION_UNRESOLVABLE: 30;

  // Provisioning (40-49)
  readonly REQUIRED_RESOURCE_FAILED: 40;

  // Artifacts (50-59)
  readonly ARTIFACT_WRITE_FAILED: 50;
}

/**
 * Error codes for all rocmstrap operations, grouped by category.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  DEPENDENCY_MISSING: 4,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  EXEC_FAILED: 20,
  FILE_READ_FAILED: 21,
  FILE_WRITE_FAILED: 22,
  DIRECTORY_CREATE_FAILED: 23,
  NETWORK_FAILED: 24,

  VERSION_UNRESOLVABLE: 30,

  REQUIRED_RESOURCE_FAILED: 40,

  ARTIFACT_WRITE_FAILED: 50,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralCode = 0 | 1 | 2 | 4;
type ConfigCode = 10 | 11 | 12;
type SystemCode = 20 | 21 | 22 | 23;
type VersionCode = 30;
type ProvisionCode = 40;

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/**
 * A remote query that did not succeed. Always recoverable: callers treat it
 * as "this path is unavailable" and move to the next fallback.
 */
export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly code: 24;
  readonly message: string;
  readonly url: string;
  readonly cause?: Error;
}> {}

export class VersionError extends Data.TaggedError("VersionError")<{
  readonly code: VersionCode;
  readonly message: string;
}> {}

/** A required resource could not be brought to its desired state by any path. */
export class ProvisionError extends Data.TaggedError("ProvisionError")<{
  readonly code: ProvisionCode;
  readonly message: string;
  readonly resource: string;
  readonly cause?: Error;
}> {}

export class ArtifactError extends Data.TaggedError("ArtifactError")<{
  readonly code: 50;
  readonly message: string;
  readonly path: string;
  readonly cause?: Error;
}> {}

export type AppError =
  | GeneralError
  | ConfigError
  | SystemError
  | NetworkError
  | VersionError
  | ProvisionError
  | ArtifactError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
