// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Host identity captured once at run start and bound into the container
 * user and its device group mappings.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { SYSTEM_PATHS } from "../lib/paths";
import {
  type GroupId,
  GroupIdSchema,
  type UserId,
  UserIdSchema,
  parseGroupId,
  parseUserId,
} from "../lib/types";
import { fileGroupId } from "../system/fs";
import { CommandExecutor } from "../system/services/executor";

export interface HostIdentity {
  readonly uid: UserId;
  readonly gid: GroupId;
  readonly username: string;
  readonly renderGid: Option.Option<GroupId>;
  readonly videoGid: Option.Option<GroupId>;
}

const FALLBACK_ID = 1000;

/** GID field of a `getent group` line (`name:x:gid:members`). */
export const parseGetentGroup = (line: string): Option.Option<GroupId> =>
  pipe(
    Option.fromNullable(line.trim().split(":")[2]),
    Option.flatMap(parseGroupId)
  );

const query = (command: readonly string[]): Effect.Effect<Option.Option<string>, never, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    return yield* executor.execOutput(command).pipe(
      Effect.map(Option.some),
      Effect.catchAll((e) =>
        Effect.logDebug(`${command.join(" ")}: ${e.message}`).pipe(Effect.as(Option.none<string>()))
      )
    );
  });

/** Numeric id of `user`, or the conventional first-user id 1000 with a warning. */
const numericId = <A>(
  flag: "-u" | "-g",
  user: string,
  parse: (s: string) => Option.Option<A>,
  fallback: A
): Effect.Effect<A, never, CommandExecutor> =>
  Effect.gen(function* () {
    const parsed = pipe(yield* query(["id", flag, user]), Option.flatMap(parse));
    if (Option.isSome(parsed)) {
      return parsed.value;
    }
    yield* Effect.logWarning(`Could not read id ${flag} for ${user}; using ${FALLBACK_ID}`);
    return fallback;
  });

/**
 * GID of a host group from the group database, falling back to the group
 * owner of the device node that group normally owns.
 */
const deviceGroupId = (
  group: string,
  deviceNode: string
): Effect.Effect<Option.Option<GroupId>, never, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fromGetent = pipe(yield* query(["getent", "group", group]), Option.flatMap(parseGetentGroup));
    if (Option.isSome(fromGetent)) {
      return fromGetent;
    }
    return yield* fileGroupId(deviceNode);
  });

export const captureIdentity = (
  user: string
): Effect.Effect<HostIdentity, never, CommandExecutor | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const uid = yield* numericId("-u", user, parseUserId, UserIdSchema.make(FALLBACK_ID));
    const gid = yield* numericId("-g", user, parseGroupId, GroupIdSchema.make(FALLBACK_ID));
    const renderGid = yield* deviceGroupId("render", SYSTEM_PATHS.kfd);
    const videoGid = yield* deviceGroupId("video", SYSTEM_PATHS.driCard0);
    yield* Effect.logInfo(`Using host UID:GID = ${uid}:${gid} for container user mapping`);
    return { uid, gid, username: user, renderGid, videoGid };
  });
