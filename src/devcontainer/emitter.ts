// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Writes the generated artifacts. Each artifact is rendered in full, then
 * reconciled against the file on disk on its own: an existing file is left
 * alone unless forced, whatever the other artifacts do.
 */

import type { FileSystem } from "@effect/platform";
import { Data, Effect, Match, Option, pipe } from "effect";
import type { PackageFamily } from "../config/field-values";
import { ArtifactError, ErrorCode, type SystemError } from "../lib/errors";
import { forResource, logSkipped, logSuccess } from "../lib/log";
import { pathJoin } from "../lib/types";
import { reconcile } from "../reconcile/policy";
import {
  ARTIFACT_NAMES,
  type Action,
  type ArtifactName,
  DesiredState,
  ResourceState,
  artifactResource,
} from "../reconcile/types";
import { atomicWrite, ensureDirectory, readFileOption } from "../system/fs";
import { renderDescriptor } from "./descriptor";
import { renderDockerfile } from "./dockerfile";
import type { TemplateInput } from "./types";
import { renderVerifyScript } from "./verify-script";

export type WriteResult = Data.TaggedEnum<{
  Written: { readonly path: string };
  Skipped: { readonly path: string; readonly reason: string };
}>;

export const WriteResult = Data.taggedEnum<WriteResult>();

export interface EmitContext {
  /** Target directory, normally `<project>/.devcontainer`. */
  readonly dir: string;
  readonly force: boolean;
  readonly packageFamily: PackageFamily;
}

export interface ArtifactPlan {
  readonly artifact: ArtifactName;
  readonly path: string;
  readonly content: string;
  readonly action: Action;
}

export const renderArtifact = (artifact: ArtifactName, input: TemplateInput): string =>
  pipe(
    Match.value(artifact),
    Match.when("Dockerfile", () => renderDockerfile(input)),
    Match.when("devcontainer.json", () => renderDescriptor(input)),
    Match.when("setup.sh", () => renderVerifyScript()),
    Match.exhaustive
  );

export const artifactMode = (artifact: ArtifactName): number =>
  artifact === "setup.sh" ? 0o755 : 0o644;

const toArtifactError =
  (path: string) =>
  (e: SystemError): ArtifactError =>
    new ArtifactError({
      code: ErrorCode.ARTIFACT_WRITE_FAILED,
      message: e.message,
      path,
      ...(e.cause !== undefined ? { cause: e.cause } : {}),
    });

/**
 * Render one artifact and decide what to do with it. Identical content on
 * disk observes as matching; different content as mismatched.
 */
export const planArtifact = (
  artifact: ArtifactName,
  input: TemplateInput,
  context: EmitContext
): Effect.Effect<ArtifactPlan, ArtifactError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const path = pathJoin(context.dir, artifact);
    const content = renderArtifact(artifact, input);
    const existing = yield* readFileOption(path).pipe(Effect.mapError(toArtifactError(path)));

    const observed = pipe(
      existing,
      Option.match({
        onNone: (): ResourceState => ResourceState.Absent(),
        onSome: (current): ResourceState =>
          current === content
            ? ResourceState.PresentMatching()
            : ResourceState.PresentMismatched({ detail: "content differs" }),
      })
    );

    const action = reconcile(artifactResource(artifact, path), observed, DesiredState.Present(), {
      force: context.force,
      packageFamily: context.packageFamily,
    });

    return { artifact, path, content, action };
  });

const applyArtifact = (
  plan: ArtifactPlan,
  context: EmitContext
): Effect.Effect<WriteResult, ArtifactError, FileSystem.FileSystem> =>
  pipe(
    Match.value(plan.action),
    Match.tag("Skip", ({ reason }) =>
      logSkipped(`Kept ${plan.path}: ${reason}`).pipe(
        Effect.as(WriteResult.Skipped({ path: plan.path, reason }))
      )
    ),
    Match.orElse(() =>
      Effect.gen(function* () {
        yield* ensureDirectory(context.dir).pipe(Effect.mapError(toArtifactError(context.dir)));
        yield* atomicWrite(plan.path, plan.content, { mode: artifactMode(plan.artifact) }).pipe(
          Effect.mapError(toArtifactError(plan.path))
        );
        yield* logSuccess(`Wrote ${plan.path}`);
        return WriteResult.Written({ path: plan.path });
      })
    )
  );

export const emit = (
  artifact: ArtifactName,
  input: TemplateInput,
  context: EmitContext
): Effect.Effect<WriteResult, ArtifactError, FileSystem.FileSystem> =>
  planArtifact(artifact, input, context).pipe(
    Effect.flatMap((plan) => applyArtifact(plan, context)),
    forResource(`artifact:${artifact}`)
  );

/** All artifacts, in a fixed order. */
export const emitAll = (
  input: TemplateInput,
  context: EmitContext
): Effect.Effect<ReadonlyArray<readonly [ArtifactName, WriteResult]>, ArtifactError, FileSystem.FileSystem> =>
  Effect.forEach(ARTIFACT_NAMES, (artifact) =>
    emit(artifact, input, context).pipe(Effect.map((result) => [artifact, result] as const))
  );

/** Plans only, for dry runs. */
export const planAll = (
  input: TemplateInput,
  context: EmitContext
): Effect.Effect<readonly ArtifactPlan[], ArtifactError, FileSystem.FileSystem> =>
  Effect.forEach(ARTIFACT_NAMES, (artifact) => planArtifact(artifact, input, context));
