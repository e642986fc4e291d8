// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution through the @effect/platform Command API. Arguments are
 * always passed as arrays; nothing here goes through a shell except
 * `commandExists`, which needs the shell builtin `command -v`.
 *
 * `privileged` commands are prefixed with `sudo` unless the process already
 * runs as root.
 */

import { Command } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, errorMessage } from "../lib/errors";

export interface ExecOptions {
  readonly env?: Record<string, string>;
  readonly cwd?: string;
  readonly stdin?: string;
  readonly privileged?: boolean;
  readonly captureStdout?: boolean;
  readonly captureStderr?: boolean;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't need an R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...(e instanceof Error ? { cause: e } : {}),
  });

interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const isRoot = (): boolean => process.getuid?.() === 0;

/** The argv actually run, after the sudo prefix is applied. */
export const effectiveCommand = (
  command: readonly string[],
  privileged: boolean,
  root: boolean
): readonly string[] => (privileged && !root ? ["sudo", "--", ...command] : command);

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

/** Uncaptured output is still read, or a chatty child blocks on a full pipe. */
const discard = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  Stream.runDrain(stream).pipe(Effect.as(""));

export const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const { cmd, args } = yield* validateCommand(command);
    const [first = cmd, ...rest] = effectiveCommand(
      [cmd, ...args],
      options.privileged === true,
      isRoot()
    );
    const commandStr = [first, ...rest].join(" ");

    yield* Effect.logDebug(`exec: ${commandStr}`);

    return yield* withExecutor(
      Effect.gen(function* () {
        const configured = pipe(
          Command.make(first, ...rest),
          (c) => (options.env !== undefined ? Command.env(c, options.env) : c),
          (c) => (options.cwd !== undefined ? Command.workingDirectory(c, options.cwd) : c),
          (c) => (options.stdin !== undefined ? Command.feed(c, options.stdin) : c)
        );

        const proc = yield* Command.start(configured);

        const [exitCode, stdout, stderr] = yield* Effect.all(
          [
            proc.exitCode,
            options.captureStdout !== false ? streamToString(proc.stdout) : discard(proc.stdout),
            options.captureStderr !== false ? streamToString(proc.stderr) : discard(proc.stderr),
          ],
          { concurrency: 3 }
        );

        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));
  });

/** Fails if exit code is non-zero. Use exec() when exit code matters but isn't fatal. */
export const execSuccess = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  pipe(
    exec(command, options),
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = result.stderr.trim();
        return new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Command failed with exit code ${result.exitCode}: ${command.join(" ")}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );

export const execOutput = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<string, SystemError | GeneralError> =>
  Effect.map(execSuccess(command, { ...options, captureStdout: true }), (r) => r.stdout);

export const execLines = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<readonly string[], SystemError | GeneralError> =>
  Effect.map(execOutput(command, options), (stdout) =>
    stdout
      .split("\n")
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0)
  );

/** PATH lookup. Any failure to run the lookup counts as "not found". */
export const commandExists = (name: string): Effect.Effect<boolean> =>
  pipe(
    exec(["sh", "-c", 'command -v "$1"', "sh", name]),
    Effect.map((r) => r.exitCode === 0 && r.stdout.trim().length > 0),
    Effect.orElseSucceed(() => false)
  );
