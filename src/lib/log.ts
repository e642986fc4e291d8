// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled log calls. Call sites attach annotations; effect-logger.ts decides
 * how they look.
 */

import { Data, Effect, Match, SynchronizedRef, pipe } from "effect";

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  fail: object;
  skip: object;
  manual: object;
}>;

const { step, success, fail, skip, manual } = Data.taggedEnum<LogStyle>();

export type LogStyleTag = LogStyle["_tag"];

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.orElse(({ _tag }) => ({ logStyle: _tag }))
  );

const logStyled = (
  style: LogStyle,
  message: string,
  log: (message: string) => Effect.Effect<void> = Effect.log
): Effect.Effect<void> => log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

export const logFail = (message: string): Effect.Effect<void> =>
  logStyled(fail(), message, Effect.logError);

/** A resource left as it is: already in place, or kept on purpose. */
export const logSkipped = (message: string): Effect.Effect<void> => logStyled(skip(), message);

/** Something the operator has to finish by hand. Logged at warning level. */
export const logManual = (message: string): Effect.Effect<void> =>
  logStyled(manual(), message, Effect.logWarning);

/** Tag every log line of an effect with the managed resource it concerns. */
export const forResource =
  (resource: string) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(self, "resource", resource);

/** Raw program output (probe reports, resolved versions), not a log line. */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

export interface StepCounter {
  readonly next: (message: string) => Effect.Effect<void>;
  readonly current: Effect.Effect<number>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.gen(function* () {
    const ref = yield* SynchronizedRef.make(0);

    return {
      next: (message: string): Effect.Effect<void> =>
        SynchronizedRef.updateAndGetEffect(ref, (n) =>
          Effect.gen(function* () {
            const current = n + 1;
            yield* logStep(current, total, message);
            return current;
          })
        ).pipe(Effect.asVoid),

      current: SynchronizedRef.get(ref),
    };
  });
