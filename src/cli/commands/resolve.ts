// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Print the ROCm version a setup run would use.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { RunSettings } from "../../config/settings";
import type { VersionError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { probe } from "../../probe";
import type { CommandExecutor } from "../../system/services/executor";
import type { RemoteFetcher } from "../../system/services/remote";
import { resolveFor, resolvedToJson } from "./utils";

export interface ResolveOptions {
  readonly settings: RunSettings;
  readonly format: LogFormat;
}

export const executeResolve = (
  options: ResolveOptions
): Effect.Effect<void, VersionError, CommandExecutor | RemoteFetcher | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const profile = yield* probe();
    const resolved = yield* resolveFor(options.settings, profile);
    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(JSON.stringify(resolvedToJson(resolved)))),
      Match.when("pretty", () => writeOutput(resolved.version)),
      Match.exhaustive
    );
  });
