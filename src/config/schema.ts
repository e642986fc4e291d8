// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for rocmstrap.toml. Every field is optional in the file and
 * falls back to the built-in default, so an empty document decodes to the
 * default configuration.
 */

import { Option, Schema, pipe } from "effect";
import { isAtLeast, parseVersion, seriesOf } from "../lib/version";
import {
  CONTAINER_BASE_IMAGE,
  CONTAINER_EXTENSIONS,
  CONTAINER_FALLBACK_TAG,
  CONTAINER_SHM_SIZE,
  CONTAINER_USER_NAME,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  ROCM_DEFAULT_VERSION,
  ROCM_MINIMUM_SERIES,
  ROCM_PREFERRED_LATEST,
  ROCM_REPO_BASE_URL,
} from "./field-values";

// Field schemas

export const versionStringSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.filter((s) => Option.isSome(parseVersion(s)), {
    message: () => "Version must be dotted integers with at least major.minor (e.g. 6.4.3)",
  })
);

/** A major.minor series such as "6.4"; the version floor is a series, not a release. */
export const seriesSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.pattern(/^\d+\.\d+$/, {
    message: () => "Series must be major.minor (e.g. 6.4)",
  })
);

export const urlSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.pattern(/^https?:\/\/[^\s/]+(\/[^\s]*)?$/, {
    message: () => "Must be an http(s) URL",
  })
);

export const imageNameSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.pattern(/^[\w./-]+$/, {
    message: () => "Invalid container image name (no tag; the tag is derived from the ROCm series)",
  })
);

/** Docker `--shm-size` value: a number with an optional b/k/m/g unit. */
export const shmSizeSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.pattern(/^\d+[bkmgBKMG]?$/, { message: () => "shmSize must look like 16g or 512m" })
);

export const containerUserNameSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.pattern(/^[a-z_][a-z0-9_-]*$/, { message: () => "userName must match [a-z_][a-z0-9_-]*" }),
  Schema.maxLength(32)
);

// Sections

export interface RocmConfig {
  readonly default: string;
  readonly minimum: string;
  readonly preferredLatest: string;
  readonly repoBaseUrl: string;
}

export interface RocmConfigInput {
  readonly default?: string | undefined;
  readonly minimum?: string | undefined;
  readonly preferredLatest?: string | undefined;
  readonly repoBaseUrl?: string | undefined;
}

export const rocmConfigSchema: Schema.Schema<RocmConfig, RocmConfigInput> = Schema.Struct({
  default: Schema.optionalWith(versionStringSchema, { default: (): string => ROCM_DEFAULT_VERSION }),
  minimum: Schema.optionalWith(seriesSchema, { default: (): string => ROCM_MINIMUM_SERIES }),
  preferredLatest: Schema.optionalWith(versionStringSchema, {
    default: (): string => ROCM_PREFERRED_LATEST,
  }),
  repoBaseUrl: Schema.optionalWith(urlSchema, { default: (): string => ROCM_REPO_BASE_URL }),
}).pipe(
  Schema.filter(
    (rocm) =>
      pipe(
        seriesOf(rocm.default),
        Option.exists((series) => isAtLeast(series, rocm.minimum))
      ),
    { message: () => "rocm.default must be at or above rocm.minimum" }
  )
);

export interface ContainerConfig {
  readonly baseImage: string;
  readonly fallbackTag: string;
  readonly shmSize: string;
  readonly userName: string;
  readonly extensions: readonly string[];
}

export interface ContainerConfigInput {
  readonly baseImage?: string | undefined;
  readonly fallbackTag?: string | undefined;
  readonly shmSize?: string | undefined;
  readonly userName?: string | undefined;
  readonly extensions?: readonly string[] | undefined;
}

export const containerConfigSchema: Schema.Schema<ContainerConfig, ContainerConfigInput> =
  Schema.Struct({
    baseImage: Schema.optionalWith(imageNameSchema, { default: (): string => CONTAINER_BASE_IMAGE }),
    fallbackTag: Schema.optionalWith(versionStringSchema, {
      default: (): string => CONTAINER_FALLBACK_TAG,
    }),
    shmSize: Schema.optionalWith(shmSizeSchema, { default: (): string => CONTAINER_SHM_SIZE }),
    userName: Schema.optionalWith(containerUserNameSchema, {
      default: (): string => CONTAINER_USER_NAME,
    }),
    extensions: Schema.optionalWith(Schema.Array(Schema.String), {
      default: (): readonly string[] => CONTAINER_EXTENSIONS,
    }),
  });

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface LoggingConfigInput {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
}

export const loggingConfigSchema: Schema.Schema<LoggingConfig, LoggingConfigInput> = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: (): LogLevel => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: (): LogFormat => LOG_FORMAT_DEFAULT,
  }),
});

// Whole file

export interface FileConfig {
  readonly rocm: RocmConfig;
  readonly container: ContainerConfig;
  readonly logging: LoggingConfig;
}

export interface FileConfigInput {
  readonly rocm?: RocmConfigInput | undefined;
  readonly container?: ContainerConfigInput | undefined;
  readonly logging?: LoggingConfigInput | undefined;
}

export const fileConfigSchema: Schema.Schema<FileConfig, FileConfigInput> = Schema.Struct({
  rocm: Schema.optionalWith(rocmConfigSchema, { default: () => Schema.decodeSync(rocmConfigSchema)({}) }),
  container: Schema.optionalWith(containerConfigSchema, {
    default: () => Schema.decodeSync(containerConfigSchema)({}),
  }),
  logging: Schema.optionalWith(loggingConfigSchema, {
    default: () => Schema.decodeSync(loggingConfigSchema)({}),
  }),
});

/** The configuration used when no file is found. */
export const defaultFileConfig = (): FileConfig => Schema.decodeSync(fileConfigSchema)({});
