#!/usr/bin/env tsx
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * rocmstrap: ROCm host provisioning and devcontainer generation.
 *
 * Main entry point. This is the only place the Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Layer, Match, Option, pipe } from "effect";
import { cli } from "./cli/index";
import { type ErrorCodeValue, toExitCode } from "./lib/errors";
import { CommandExecutorLive } from "./system/services/executor";
import { RemoteFetcherLive } from "./system/services/remote";

const MainLive = Layer.mergeAll(CommandExecutorLive, RemoteFetcherLive).pipe(
  Layer.provideMerge(NodeContext.layer)
);

export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(argv).pipe(Effect.provide(MainLive));

const hasErrorCode = (v: unknown): v is { readonly code: ErrorCodeValue } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(hasErrorCode, (v) => toExitCode(v.code)),
            Match.orElse(() => 1)
          ),
      }),
  });

/** Typed failures were already reported by the command; only defects are printed here. */
const logDefect = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => {
          if (!Cause.isInterruptedOnly(cause)) {
            console.error("Unexpected error:", Cause.pretty(cause));
          }
        },
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logDefect(exit);
  process.exit(exitCodeFromExit(exit));
}

main().catch((e: unknown) => {
  console.error("Unexpected error:", e);
  process.exit(1);
});
