// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ROCm version resolution.
 *
 * Order: an explicit pin wins; `latest` tries the preferred series, then the
 * repository's `latest` alias, then the highest series in the index; with no
 * request the configured default is used. Whatever is chosen must have a
 * series at or above the minimum. A below-floor or unparseable choice is
 * replaced by the default with a warning rather than failing the run.
 *
 * Remote queries are best-effort: a NetworkError is logged and the next
 * fallback is tried.
 */

import { Data, Effect, Match, Option, pipe } from "effect";
import { ErrorCode, type NetworkError, VersionError } from "../lib/errors";
import { isAtLeast, maxVersion, seriesOf } from "../lib/version";
import type { RemoteFetcher } from "../system/services/remote";
import { listSeries, seriesExists } from "./repository";

export type RequestedVersion = Data.TaggedEnum<{
  Explicit: { readonly version: string };
  Latest: object;
  Default: object;
}>;

export const RequestedVersion = Data.taggedEnum<RequestedVersion>();

export interface VersionSpec {
  readonly requested: RequestedVersion;
  /** Lowest acceptable series, e.g. "6.4". */
  readonly minimum: string;
  /** Used when nothing else resolves; must itself satisfy `minimum`. */
  readonly fallback: string;
  /** Series tried first for `latest`. */
  readonly preferredLatest: string;
  readonly repoBaseUrl: string;
  readonly codename: string;
}

export type VersionSource = "explicit" | "preferred" | "latest-alias" | "index" | "default";

export interface ResolvedVersion {
  /** Concrete version, e.g. "6.4.3" or "7.0". */
  readonly version: string;
  /** major.minor of `version`. */
  readonly series: string;
  /** Directory under `rocm/apt/` to install from: the version, or `latest` for the alias. */
  readonly repoSegment: string;
  readonly fallbackUsed: boolean;
  readonly source: VersionSource;
}

interface Candidate {
  readonly version: string;
  readonly repoSegment: string;
  readonly source: VersionSource;
}

const LATEST_ALIAS = "latest";

const floorSeries = (minimum: string): string =>
  pipe(
    seriesOf(minimum),
    Option.getOrElse(() => minimum)
  );

/** A failed query means "this path is unavailable". */
const orUnavailable = <A>(
  effect: Effect.Effect<A, NetworkError, RemoteFetcher>,
  fallback: A
): Effect.Effect<A, never, RemoteFetcher> =>
  effect.pipe(
    Effect.catchAll((e) =>
      Effect.logWarning(`${e.message}; trying next source`).pipe(Effect.as(fallback))
    )
  );

const highestIndexed = (spec: VersionSpec): Effect.Effect<Option.Option<string>, never, RemoteFetcher> =>
  pipe(
    orUnavailable(listSeries(spec.repoBaseUrl), []),
    Effect.map(maxVersion)
  );

const latestCandidate = (
  spec: VersionSpec
): Effect.Effect<Option.Option<Candidate>, never, RemoteFetcher> =>
  Effect.gen(function* () {
    const exists = (series: string): Effect.Effect<boolean, never, RemoteFetcher> =>
      orUnavailable(seriesExists(spec.repoBaseUrl, series, spec.codename), false);

    if (yield* exists(spec.preferredLatest)) {
      return Option.some<Candidate>({
        version: spec.preferredLatest,
        repoSegment: spec.preferredLatest,
        source: "preferred",
      });
    }

    if (yield* exists(LATEST_ALIAS)) {
      // The alias has no version of its own; read it from the index.
      const concrete = yield* highestIndexed(spec);
      return Option.some<Candidate>({
        version: pipe(
          concrete,
          Option.getOrElse(() => LATEST_ALIAS)
        ),
        repoSegment: LATEST_ALIAS,
        source: "latest-alias",
      });
    }

    return pipe(
      yield* highestIndexed(spec),
      Option.map((version): Candidate => ({ version, repoSegment: version, source: "index" }))
    );
  });

const candidateFor = (
  spec: VersionSpec
): Effect.Effect<Option.Option<Candidate>, never, RemoteFetcher> =>
  pipe(
    Match.value(spec.requested),
    Match.tag("Explicit", ({ version }) =>
      Effect.succeed(Option.some<Candidate>({ version, repoSegment: version, source: "explicit" }))
    ),
    Match.tag("Latest", () => latestCandidate(spec)),
    Match.tag("Default", () => Effect.succeed(Option.none<Candidate>())),
    Match.exhaustive
  );

/**
 * Series of a version when it parses and meets the floor. Only the
 * major.minor of `minimum` counts, so a floor of "6.4.1" admits "6.4".
 */
export const seriesAtFloor = (version: string, minimum: string): Option.Option<string> =>
  pipe(
    seriesOf(version),
    Option.filter((series) => isAtLeast(series, floorSeries(minimum)))
  );

const fallbackResolution = (
  spec: VersionSpec,
  fallbackUsed: boolean
): Effect.Effect<ResolvedVersion, VersionError> =>
  pipe(
    seriesAtFloor(spec.fallback, spec.minimum),
    Option.match({
      onNone: (): Effect.Effect<ResolvedVersion, VersionError> =>
        Effect.fail(
          new VersionError({
            code: ErrorCode.VERSION_UNRESOLVABLE,
            message: `Default ROCm version ${spec.fallback} does not satisfy the minimum ${spec.minimum}; check the [rocm] configuration`,
          })
        ),
      onSome: (series): Effect.Effect<ResolvedVersion, VersionError> =>
        Effect.succeed({
          version: spec.fallback,
          series,
          repoSegment: spec.fallback,
          fallbackUsed,
          source: "default",
        }),
    })
  );

/**
 * Resolve a version request to one concrete version whose series is at or
 * above `spec.minimum`. Fails only when the request falls back to a default
 * that is itself below the floor.
 */
export const resolveVersion = (
  spec: VersionSpec
): Effect.Effect<ResolvedVersion, VersionError, RemoteFetcher> =>
  Effect.gen(function* () {
    const candidate = yield* candidateFor(spec);

    if (Option.isNone(candidate)) {
      if (spec.requested._tag === "Latest") {
        yield* Effect.logWarning(
          `Could not determine the latest ROCm series; using ${spec.fallback}`
        );
        return yield* fallbackResolution(spec, true);
      }
      return yield* fallbackResolution(spec, false);
    }

    const chosen = candidate.value;
    const series = seriesOf(chosen.version);
    if (Option.isNone(series)) {
      yield* Effect.logWarning(
        `Chosen ROCm (${chosen.version}) is not a version number; using ${spec.fallback}`
      );
      return yield* fallbackResolution(spec, true);
    }
    if (!isAtLeast(series.value, floorSeries(spec.minimum))) {
      yield* Effect.logWarning(
        `Chosen ROCm (${chosen.version}) < minimum (${spec.minimum}); using ${spec.fallback}`
      );
      return yield* fallbackResolution(spec, true);
    }

    return {
      version: chosen.version,
      series: series.value,
      repoSegment: chosen.repoSegment,
      fallbackUsed: false,
      source: chosen.source,
    };
  });
