// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * File operations on top of the @effect/platform FileSystem service. Platform
 * errors are mapped into SystemError so callers see one error hierarchy.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ErrorCode, SystemError } from "../lib/errors";
import { extractCauseProps, extractMessage } from "../lib/match-helpers";
import { type GroupId, isGroupId } from "../lib/types";

type FileErrorCode =
  | typeof ErrorCode.FILE_READ_FAILED
  | typeof ErrorCode.FILE_WRITE_FAILED
  | typeof ErrorCode.DIRECTORY_CREATE_FAILED;

const fsError =
  (code: FileErrorCode, action: string, target: string) =>
  (e: unknown): SystemError =>
    new SystemError({
      code,
      message: `Failed to ${action} ${target}: ${extractMessage(e)}`,
      ...extractCauseProps(e),
    });

export const readFile = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs
      .readFileString(path)
      .pipe(Effect.mapError(fsError(ErrorCode.FILE_READ_FAILED, "read", path)));
  });

/** None when the file does not exist; other read failures still fail. */
export const readFileOption = (
  path: string
): Effect.Effect<Option.Option<string>, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const exists = yield* fileExists(path);
    return exists ? Option.some(yield* readFile(path)) : Option.none();
  });

export const writeFile = (
  path: string,
  content: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFileString(path, content)
      .pipe(Effect.mapError(fsError(ErrorCode.FILE_WRITE_FAILED, "write", path)));
  });

export const writeBytes = (
  path: string,
  content: Uint8Array
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFile(path, content)
      .pipe(Effect.mapError(fsError(ErrorCode.FILE_WRITE_FAILED, "write", path)));
  });

/** Any stat failure counts as "does not exist". */
export const fileExists = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path).pipe(Effect.orElseSucceed(() => false));
  });

export const directoryExists = (
  path: string
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.stat(path).pipe(
      Effect.map((info) => info.type === "Directory"),
      Effect.orElseSucceed(() => false)
    );
  });

/** Entry names of a directory; empty when it is missing or unreadable. */
export const listDirectory = (
  path: string
): Effect.Effect<readonly string[], never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readDirectory(path).pipe(Effect.orElseSucceed((): string[] => []));
  });

export const ensureDirectory = (
  path: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .makeDirectory(path, { recursive: true })
      .pipe(Effect.mapError(fsError(ErrorCode.DIRECTORY_CREATE_FAILED, "create directory", path)));
  });

/** Owning group of a path, when the platform reports one. */
export const fileGroupId = (
  path: string
): Effect.Effect<Option.Option<GroupId>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.stat(path).pipe(
      Effect.map((info) => pipe(info.gid, Option.filter(isGroupId))),
      Effect.orElseSucceed(() => Option.none<GroupId>())
    );
  });

/**
 * Write content to a temp file beside the target, then rename over it. A
 * reader sees either the old file or the complete new one.
 */
export const atomicWrite = (
  path: string,
  content: string,
  options: { readonly mode?: number } = {}
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const tmp = `${path}.${process.pid}.tmp`;
    const toError = fsError(ErrorCode.FILE_WRITE_FAILED, "write", path);

    const write = Effect.gen(function* () {
      yield* fs.writeFileString(tmp, content);
      if (options.mode !== undefined) {
        yield* fs.chmod(tmp, options.mode);
      }
      yield* fs.rename(tmp, path);
    }).pipe(Effect.mapError(toError));

    yield* write.pipe(
      Effect.tapError(() =>
        fs.remove(tmp).pipe(
          Effect.catchAll((cleanup) =>
            Effect.logDebug(`Could not remove ${tmp}: ${extractMessage(cleanup)}`)
          )
        )
      )
    );
  });
