// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * RemoteFetcher service: the HTTP side of the upstream repositories (ROCm
 * index and installer listings, signing keys, installer packages).
 * Every failure surfaces as NetworkError, which callers treat as "this path
 * is unavailable".
 */

import {
  FetchHttpClient,
  FileSystem,
  HttpClient,
  HttpClientRequest,
  type HttpClientResponse,
} from "@effect/platform";
import { Context, Duration, Effect, Layer } from "effect";
import { ErrorCode, NetworkError, type SystemError } from "../../lib/errors";
import { extractCauseProps, extractMessage } from "../../lib/match-helpers";
import { writeBytes } from "../fs";

const REQUEST_TIMEOUT: Duration.Duration = Duration.seconds(20);

export interface RemoteFetcherService {
  /** HEAD request; true for a 2xx status, false for any other status. */
  readonly exists: (url: string) => Effect.Effect<boolean, NetworkError>;
  /** GET body as text; a non-2xx status is a NetworkError. */
  readonly fetchText: (url: string) => Effect.Effect<string, NetworkError>;
  readonly download: (url: string, dest: string) => Effect.Effect<void, NetworkError | SystemError>;
}

export interface RemoteFetcher {
  readonly _tag: "RemoteFetcher";
}

export const RemoteFetcher: Context.Tag<RemoteFetcher, RemoteFetcherService> =
  Context.GenericTag<RemoteFetcher, RemoteFetcherService>("rocmstrap/RemoteFetcher");

const networkError =
  (url: string) =>
  (e: unknown): NetworkError =>
    new NetworkError({
      code: ErrorCode.NETWORK_FAILED,
      message: `Request to ${url} failed: ${extractMessage(e)}`,
      url,
      ...extractCauseProps(e),
    });

const statusError = (url: string, status: number): NetworkError =>
  new NetworkError({
    code: ErrorCode.NETWORK_FAILED,
    message: `Request to ${url} returned HTTP ${status}`,
    url,
  });

const isOk = (status: number): boolean => status >= 200 && status < 300;

const make = Effect.gen(function* () {
  const client = yield* HttpClient.HttpClient;
  const fs = yield* FileSystem.FileSystem;

  const exists = (url: string): Effect.Effect<boolean, NetworkError> =>
    client.execute(HttpClientRequest.head(url)).pipe(
      Effect.map((response) => isOk(response.status)),
      Effect.scoped,
      Effect.timeout(REQUEST_TIMEOUT),
      Effect.mapError(networkError(url))
    );

  const fetchBody = <A>(
    url: string,
    read: (response: HttpClientResponse.HttpClientResponse) => Effect.Effect<A, unknown>
  ): Effect.Effect<A, NetworkError> =>
    Effect.gen(function* () {
      const response = yield* client.execute(HttpClientRequest.get(url));
      if (!isOk(response.status)) {
        return yield* Effect.fail(statusError(url, response.status));
      }
      return yield* read(response);
    }).pipe(
      Effect.scoped,
      Effect.timeout(REQUEST_TIMEOUT),
      Effect.mapError((e) => (e instanceof NetworkError ? e : networkError(url)(e)))
    );

  const fetchText = (url: string): Effect.Effect<string, NetworkError> =>
    fetchBody(url, (response) => response.text);

  const download = (url: string, dest: string): Effect.Effect<void, NetworkError | SystemError> =>
    Effect.gen(function* () {
      const body = yield* fetchBody(url, (response) => response.arrayBuffer);
      yield* writeBytes(dest, new Uint8Array(body)).pipe(
        Effect.provideService(FileSystem.FileSystem, fs)
      );
    });

  return { exists, fetchText, download } satisfies RemoteFetcherService;
});

export const RemoteFetcherLive: Layer.Layer<RemoteFetcher, never, FileSystem.FileSystem> =
  Layer.effect(RemoteFetcher, make).pipe(Layer.provide(FetchHttpClient.layer));
