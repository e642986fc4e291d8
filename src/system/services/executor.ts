// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CommandExecutor service using Context.Tag pattern.
 * Every probe query and every host mutation goes through this tag, so tests
 * can script the host by providing a fake layer.
 */

import { Context, type Effect, Layer } from "effect";
import type { GeneralError, SystemError } from "../../lib/errors";
import {
  type ExecOptions,
  type ExecResult,
  commandExists,
  exec,
  execLines,
  execOutput,
  execSuccess,
} from "../exec";

export interface CommandExecutorService {
  readonly exec: (
    command: readonly string[],
    options?: ExecOptions
  ) => Effect.Effect<ExecResult, SystemError | GeneralError>;
  readonly execSuccess: (
    command: readonly string[],
    options?: ExecOptions
  ) => Effect.Effect<ExecResult, SystemError | GeneralError>;
  readonly execOutput: (
    command: readonly string[],
    options?: ExecOptions
  ) => Effect.Effect<string, SystemError | GeneralError>;
  readonly execLines: (
    command: readonly string[],
    options?: ExecOptions
  ) => Effect.Effect<readonly string[], SystemError | GeneralError>;
  readonly commandExists: (name: string) => Effect.Effect<boolean>;
}

export interface CommandExecutor {
  readonly _tag: "CommandExecutor";
}

/**
 * Use with `yield* CommandExecutor` to access the service in Effect generators.
 */
export const CommandExecutor: Context.Tag<CommandExecutor, CommandExecutorService> =
  Context.GenericTag<CommandExecutor, CommandExecutorService>("rocmstrap/CommandExecutor");

export const CommandExecutorLive: Layer.Layer<CommandExecutor> = Layer.succeed(CommandExecutor, {
  exec,
  execSuccess,
  execOutput,
  execLines,
  commandExists,
});
