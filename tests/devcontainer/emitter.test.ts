// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { describe, expect, test } from "vitest";
import { WriteResult, emitAll, planAll, renderArtifact } from "../../src/devcontainer/emitter.ts";
import { Action } from "../../src/reconcile/types.ts";
import { runTest } from "../helpers/layers.ts";
import { templateInput } from "../helpers/templates.ts";

const withProject = <A, E>(
  body: (dir: string, fs: FileSystem.FileSystem) => Effect.Effect<A, E, FileSystem.FileSystem>
) =>
  Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const project = yield* fs.makeTempDirectoryScoped({ prefix: "rocmstrap-emit-" });
      return yield* body(`${project}/.devcontainer`, fs);
    })
  );

const context = (dir: string, force = false) => ({ dir, force, packageFamily: "apt" as const });

describe("emitAll", () => {
  test("writes all three artifacts into a fresh directory", async () => {
    const input = templateInput();
    const { results, dockerfile, setupMode } = await runTest(
      withProject((dir, fs) =>
        Effect.gen(function* () {
          const results = yield* emitAll(input, context(dir));
          const dockerfile = yield* fs.readFileString(`${dir}/Dockerfile`);
          const setupMode = (yield* fs.stat(`${dir}/setup.sh`)).mode & 0o777;
          return { results, dockerfile, setupMode };
        })
      )
    );
    expect(results.map(([name, r]) => [name, r._tag])).toEqual([
      ["Dockerfile", "Written"],
      ["devcontainer.json", "Written"],
      ["setup.sh", "Written"],
    ]);
    expect(dockerfile).toBe(renderArtifact("Dockerfile", input));
    expect(setupMode).toBe(0o755);
  });

  test("a second run skips every artifact and leaves the files untouched", async () => {
    const input = templateInput();
    const { second, json } = await runTest(
      withProject((dir, fs) =>
        Effect.gen(function* () {
          yield* emitAll(input, context(dir));
          const second = yield* emitAll(input, context(dir));
          const json = yield* fs.readFileString(`${dir}/devcontainer.json`);
          return { second, json };
        })
      )
    );
    expect(second.map(([, r]) => r)).toEqual([
      WriteResult.Skipped({ path: expect.stringMatching(/\/Dockerfile$/), reason: "exists; use --force to overwrite" }),
      WriteResult.Skipped({
        path: expect.stringMatching(/\/devcontainer\.json$/),
        reason: "exists; use --force to overwrite",
      }),
      WriteResult.Skipped({ path: expect.stringMatching(/\/setup\.sh$/), reason: "exists; use --force to overwrite" }),
    ]);
    expect(json).toBe(renderArtifact("devcontainer.json", input));
  });

  test("keeps a hand-edited artifact unless forced", async () => {
    const input = templateInput();
    const { kept, restored, forcedTags } = await runTest(
      withProject((dir, fs) =>
        Effect.gen(function* () {
          yield* emitAll(input, context(dir));
          yield* fs.writeFileString(`${dir}/Dockerfile`, "FROM scratch\n");
          yield* emitAll(input, context(dir));
          const kept = yield* fs.readFileString(`${dir}/Dockerfile`);
          const forced = yield* emitAll(input, context(dir, true));
          const restored = yield* fs.readFileString(`${dir}/Dockerfile`);
          return { kept, restored, forcedTags: forced.map(([, r]) => r._tag) };
        })
      )
    );
    expect(kept).toBe("FROM scratch\n");
    expect(restored).toBe(renderArtifact("Dockerfile", input));
    expect(forcedTags).toEqual(["Written", "Written", "Written"]);
  });

  test("decides each artifact on its own", async () => {
    const input = templateInput();
    const tags = await runTest(
      withProject((dir, fs) =>
        Effect.gen(function* () {
          yield* emitAll(input, context(dir));
          yield* fs.remove(`${dir}/devcontainer.json`);
          const results = yield* emitAll(input, context(dir));
          return results.map(([, r]) => r._tag);
        })
      )
    );
    expect(tags).toEqual(["Skipped", "Written", "Skipped"]);
  });
});

describe("planAll", () => {
  test("plans writes without touching the disk", async () => {
    const { actions, created } = await runTest(
      withProject((dir, fs) =>
        Effect.gen(function* () {
          const plans = yield* planAll(templateInput(), context(dir));
          return { actions: plans.map((p) => p.action), created: yield* fs.exists(dir) };
        })
      )
    );
    expect(actions.map((a) => a._tag)).toEqual(["WriteFile", "WriteFile", "WriteFile"]);
    expect(actions[2]).toEqual(Action.WriteFile({ path: expect.stringMatching(/\/\.devcontainer\/setup\.sh$/) }));
    expect(created).toBe(false);
  });
});
