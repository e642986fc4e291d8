// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Template input for artifact rendering tests.
 */

import { Option } from "effect";
import {
  CONTAINER_BASE_IMAGE,
  CONTAINER_EXTENSIONS,
  CONTAINER_FALLBACK_TAG,
  CONTAINER_SHM_SIZE,
  CONTAINER_USER_NAME,
} from "../../src/config/field-values.ts";
import type { HostIdentity } from "../../src/devcontainer/identity.ts";
import type { TemplateInput } from "../../src/devcontainer/types.ts";
import { ContainerUser } from "../../src/devcontainer/user-mapping.ts";
import { GroupIdSchema, UserIdSchema } from "../../src/lib/types.ts";
import { resolvedVersion } from "./hosts.ts";

export const testIdentity = (overrides: Partial<HostIdentity> = {}): HostIdentity => ({
  uid: UserIdSchema.make(1000),
  gid: GroupIdSchema.make(1000),
  username: "dev",
  renderGid: Option.some(GroupIdSchema.make(992)),
  videoGid: Option.none(),
  ...overrides,
});

export const templateInput = (overrides: Partial<TemplateInput> = {}): TemplateInput => ({
  resolved: resolvedVersion(),
  identity: testIdentity(),
  user: ContainerUser.Create({ name: CONTAINER_USER_NAME }),
  container: {
    baseImage: CONTAINER_BASE_IMAGE,
    fallbackTag: CONTAINER_FALLBACK_TAG,
    shmSize: CONTAINER_SHM_SIZE,
    userName: CONTAINER_USER_NAME,
    extensions: CONTAINER_EXTENSIONS,
  },
  ...overrides,
});
