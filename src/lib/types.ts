// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types for host identity values. `UserId` and `GroupId` are both
 * numbers; the brand stops one being passed where the other is expected.
 */

import { type Brand, Option, Schema, pipe } from "effect";

export type UserId = number & Brand.Brand<"UserId">;
export type GroupId = number & Brand.Brand<"GroupId">;
export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;

const MAX_ID = 4294967294;

const userIdIntMsg = (): string => "UserId must be an integer";
const userIdRangeMsg = (): string => `UserId must be 0-${MAX_ID}`;
const groupIdIntMsg = (): string => "GroupId must be an integer";
const groupIdRangeMsg = (): string => `GroupId must be 0-${MAX_ID}`;

export const UserIdSchema: Schema.BrandSchema<UserId, number, never> = Schema.Number.pipe(
  Schema.int({ message: userIdIntMsg }),
  Schema.between(0, MAX_ID, { message: userIdRangeMsg }),
  Schema.brand("UserId")
);

export const GroupIdSchema: Schema.BrandSchema<GroupId, number, never> = Schema.Number.pipe(
  Schema.int({ message: groupIdIntMsg }),
  Schema.between(0, MAX_ID, { message: groupIdRangeMsg }),
  Schema.brand("GroupId")
);

export const isUserId: (u: unknown) => u is UserId = Schema.is(UserIdSchema);
export const isGroupId: (u: unknown) => u is GroupId = Schema.is(GroupIdSchema);

const decimalField = (s: string): Option.Option<number> =>
  pipe(
    Option.some(s.trim()),
    Option.filter((t) => /^\d+$/.test(t)),
    Option.map((t) => Number.parseInt(t, 10))
  );

/** Parse a decimal id field (`id -u`, passwd output) into a UserId. */
export const parseUserId = (s: string): Option.Option<UserId> =>
  pipe(decimalField(s), Option.filter(isUserId));

/** Parse a decimal id field (getent, stat output) into a GroupId. */
export const parseGroupId = (s: string): Option.Option<GroupId> =>
  pipe(decimalField(s), Option.filter(isGroupId));

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * For dynamic paths, use `pathJoin` on a branded base.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : [base, ...segments].join("/").replace(/\/{2,}/g, "/");
}
