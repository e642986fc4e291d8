// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Applies a host plan one step at a time. Each step finishes before the next
 * starts. A required resource whose paths are all exhausted stops the run
 * with a ProvisionError; an optional one leaves a warning.
 */

import { Effect, Either, Option } from "effect";
import type { RequiredGroup } from "../config/field-values";
import { ErrorCode, ProvisionError } from "../lib/errors";
import { createStepCounter, forResource, logFail, logManual, logSkipped, logSuccess } from "../lib/log";
import { extractMessage } from "../lib/match-helpers";
import { type InstallContext, type InstallPath, installPaths } from "./install";
import type { InstallEnv } from "./operations";
import type { PlannedStep } from "./plan";
import { type Action, type ResourceId, isMutating } from "./types";

export interface ApplyReport {
  readonly applied: readonly ResourceId[];
  readonly skipped: readonly ResourceId[];
  readonly warnings: readonly string[];
  /** Groups the user joined; membership needs a new login session. */
  readonly reloginGroups: readonly RequiredGroup[];
}

export type PathSelector = (
  step: PlannedStep,
  ctx: InstallContext
) => Option.Option<readonly InstallPath[]>;

const defaultSelector: PathSelector = (step, ctx) =>
  installPaths(step.resource, step.action, ctx);

const describeAction = (action: Action, id: ResourceId): string => {
  switch (action._tag) {
    case "Install":
      return `Installing ${id}`;
    case "Reinstall":
      return `Reinstalling ${id} (${action.reason})`;
    case "AddToGroup":
      return `Adding ${action.user} to group ${action.group}`;
    case "WriteFile":
      return `Writing ${action.path}`;
    case "Skip":
      return `Left as is: ${action.reason}`;
  }
};

/** First path that succeeds, or the names of every path that failed. */
const firstSuccessful = (
  paths: readonly InstallPath[]
): Effect.Effect<Either.Either<string, readonly string[]>, never, InstallEnv> =>
  Effect.gen(function* () {
    const failed: string[] = [];
    for (const candidate of paths) {
      yield* Effect.logDebug(`Trying ${candidate.name}`);
      const outcome = yield* Effect.either(candidate.run);
      if (Either.isRight(outcome)) {
        return Either.right(candidate.name);
      }
      yield* Effect.logWarning(`${candidate.name} failed: ${extractMessage(outcome.left)}`);
      failed.push(candidate.name);
    }
    return Either.left(failed);
  });

export const applyPlan = (
  steps: readonly PlannedStep[],
  ctx: InstallContext,
  selectPaths: PathSelector = defaultSelector
): Effect.Effect<ApplyReport, ProvisionError, InstallEnv> =>
  Effect.gen(function* () {
    const applied: ResourceId[] = [];
    const skipped: ResourceId[] = [];
    const warnings: string[] = [];
    const reloginGroups: RequiredGroup[] = [];

    const warn = (message: string): Effect.Effect<void> =>
      Effect.sync(() => {
        warnings.push(message);
      }).pipe(Effect.zipRight(logManual(message)));

    const counter = yield* createStepCounter(steps.filter((s) => isMutating(s.action)).length);

    for (const step of steps) {
      const { resource, action } = step;
      const id = resource.id;

      if (action._tag === "Skip") {
        skipped.push(id);
        yield* (action.warn
          ? warn(`${id}: ${action.reason}`)
          : logSkipped(describeAction(action, id))
        ).pipe(forResource(id));
        continue;
      }

      yield* counter.next(describeAction(action, id));

      const paths = selectPaths(step, ctx);
      if (Option.isNone(paths)) {
        skipped.push(id);
        yield* warn(
          `No automated install for ${id} on ${ctx.profile.packageFamily}; install it manually`
        ).pipe(forResource(id));
        continue;
      }

      const outcome = yield* firstSuccessful(paths.value).pipe(forResource(id));

      if (Either.isRight(outcome)) {
        applied.push(id);
        yield* logSuccess(`${id} via ${outcome.right}`);
        if (action._tag === "AddToGroup") {
          reloginGroups.push(action.group);
        }
        continue;
      }

      const tried = outcome.left.join(", ") || "no paths";
      if (resource.required) {
        yield* logFail(`${id}: every install path failed`);
        return yield* Effect.fail(
          new ProvisionError({
            code: ErrorCode.REQUIRED_RESOURCE_FAILED,
            message: `Required resource ${id} could not be installed (tried: ${tried})`,
            resource: id,
          })
        );
      }
      skipped.push(id);
      yield* warn(
        action._tag === "AddToGroup"
          ? `Failed to add ${action.user} to ${action.group}; please add manually`
          : `Optional resource ${id} could not be installed (tried: ${tried}); please complete it manually`
      ).pipe(forResource(id));
    }

    return { applied, skipped, warnings, reloginGroups };
  });
