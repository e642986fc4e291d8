// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Container user selection. A base image that already has a user at the
 * host UID keeps that user (and gets the host groups grafted on); otherwise
 * a new user is created. The lookup needs a working container runtime and
 * degrades to "create" without one.
 */

import { Data, Effect, Either, Option, pipe } from "effect";
import type { UserId } from "../lib/types";
import { CommandExecutor } from "../system/services/executor";

export type ContainerUser = Data.TaggedEnum<{
  Existing: { readonly name: string };
  Create: { readonly name: string };
}>;

export const ContainerUser = Data.taggedEnum<ContainerUser>();

/** Login name from `getent passwd` output: first field of the first line. */
export const parsePasswdName = (output: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(output.split("\n").find((line) => line.trim().length > 0)),
    Option.flatMap((line) => Option.fromNullable(line.split(":")[0])),
    Option.map((name) => name.trim()),
    Option.filter((name) => name.length > 0)
  );

export const passwdLookupCommand = (image: string, uid: UserId): readonly string[] => [
  "docker",
  "run",
  "--rm",
  "--entrypoint",
  "sh",
  image,
  "-c",
  `getent passwd ${uid} || true`,
];

export const detectContainerUser = (
  image: string,
  uid: UserId,
  defaultName: string
): Effect.Effect<ContainerUser, never, CommandExecutor> =>
  Effect.gen(function* () {
    const executor = yield* CommandExecutor;
    const create = ContainerUser.Create({ name: defaultName });

    if (!(yield* executor.commandExists("docker"))) {
      yield* Effect.logWarning(
        `Docker not available to inspect base image; defaulting to create '${defaultName}'`
      );
      return create;
    }

    const result = yield* Effect.either(executor.exec(passwdLookupCommand(image, uid)));
    if (Either.isLeft(result) || result.right.exitCode !== 0) {
      const why = Either.isLeft(result)
        ? result.left.message
        : `exit code ${result.right.exitCode}`;
      yield* Effect.logWarning(
        `Could not inspect ${image} (${why}); defaulting to create '${defaultName}'`
      );
      return create;
    }

    return yield* pipe(
      parsePasswdName(result.right.stdout),
      Option.match({
        onNone: () =>
          Effect.logInfo(
            `No existing user with UID ${uid} in base image; will create '${defaultName}'`
          ).pipe(Effect.as(create)),
        onSome: (name) =>
          Effect.logInfo(`Base image already has UID ${uid} as user '${name}'; reusing it`).pipe(
            Effect.as(ContainerUser.Existing({ name }))
          ),
      })
    );
  });
