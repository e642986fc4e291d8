// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Syntax errors and
 * schema violations are reported with the file path. Without --config the
 * search paths are tried in order and the first file that exists is used;
 * a file that exists but is invalid is an error, never skipped.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, type Schema, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, type SystemError } from "../lib/errors";
import { extractCauseProps, extractMessage } from "../lib/match-helpers";
import { decodeToEffect } from "../lib/schema-utils";
import { fileExists, readFileOption } from "../system/fs";
import { type FileConfig, defaultFileConfig, fileConfigSchema } from "./schema";

export const parseTomlContent = (
  content: string,
  filePath: string
): Effect.Effect<unknown, ConfigError> =>
  Effect.try({
    try: (): unknown => parseToml(content),
    catch: (e): ConfigError =>
      new ConfigError({
        code: ErrorCode.CONFIG_PARSE_ERROR,
        message: `Failed to parse TOML in ${filePath}: ${extractMessage(e)}`,
        path: filePath,
        ...extractCauseProps(e),
      }),
  });

export const loadTomlFile = <A, I = A>(
  filePath: string,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const content = yield* pipe(
      readFileOption(filePath),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<string, ConfigError> =>
            Effect.fail(
              new ConfigError({
                code: ErrorCode.CONFIG_NOT_FOUND,
                message: `Configuration file not found: ${filePath}`,
                path: filePath,
              })
            ),
          onSome: (text): Effect.Effect<string> => Effect.succeed(text),
        })
      )
    );
    const parsed = yield* parseTomlContent(content, filePath);
    return yield* decodeToEffect(schema, parsed, filePath);
  });

const firstExisting = (
  paths: readonly string[]
): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
  Effect.findFirst(paths, fileExists);

/**
 * Load the configuration file. An explicit path must exist; otherwise the
 * first existing search path is loaded, and built-in defaults apply when
 * none exists.
 */
export const loadFileConfig = (
  explicitPath: Option.Option<string>,
  searchPaths: readonly string[]
): Effect.Effect<FileConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  pipe(
    explicitPath,
    Option.match({
      onSome: (path): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
        Effect.succeed(Option.some(path)),
      onNone: (): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
        firstExisting(searchPaths),
    }),
    Effect.flatMap(
      Option.match({
        onNone: (): Effect.Effect<FileConfig> =>
          Effect.logDebug(`No config file found (searched ${searchPaths.join(", ")}); using defaults`).pipe(
            Effect.as(defaultFileConfig())
          ),
        onSome: (path): Effect.Effect<FileConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
          Effect.logDebug(`Loading config from ${path}`).pipe(
            Effect.zipRight(loadTomlFile(path, fileConfigSchema))
          ),
      })
    )
  );
