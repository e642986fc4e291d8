// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * devcontainer.json. Device groups are bound by numeric GID when the host
 * reported one, since group names need not match between host and image.
 */

import { Option, pipe } from "effect";
import type { GroupId } from "../lib/types";
import { type TemplateInput, imageTag } from "./types";

export interface Descriptor {
  readonly name: string;
  readonly build: {
    readonly dockerfile: string;
    readonly args: Readonly<Record<string, string>>;
  };
  readonly workspaceMount: string;
  readonly workspaceFolder: string;
  readonly runArgs: readonly string[];
  readonly containerEnv: Readonly<Record<string, string>>;
  readonly remoteUser: string;
  readonly postCreateCommand: string;
  readonly overrideCommand: boolean;
  readonly customizations: {
    readonly vscode: {
      readonly settings: Readonly<Record<string, string>>;
      readonly extensions: readonly string[];
    };
  };
}

/** `--group-add` value: the numeric GID when known, else the group name. */
export const groupAddValue = (gid: Option.Option<GroupId>, name: string): string =>
  pipe(
    gid,
    Option.match({
      onNone: (): string => name,
      onSome: (id): string => String(id),
    })
  );

export const buildDescriptor = (input: TemplateInput): Descriptor => {
  const tag = imageTag(input.resolved.version, input.container.fallbackTag);
  return {
    name: `ROCm ${tag} Dev`,
    build: {
      dockerfile: "Dockerfile",
      args: {
        USER_UID: String(input.identity.uid),
        USER_GID: String(input.identity.gid),
      },
    },
    workspaceMount:
      "source=${localWorkspaceFolder},target=/workspace,type=bind,consistency=cached",
    workspaceFolder: "/workspace",
    runArgs: [
      "--device=/dev/kfd",
      "--device=/dev/dri",
      `--group-add=${groupAddValue(input.identity.renderGid, "render")}`,
      `--group-add=${groupAddValue(input.identity.videoGid, "video")}`,
      "--ipc=host",
      `--shm-size=${input.container.shmSize}`,
    ],
    containerEnv: { VLLM_USE_ROCM: "1" },
    remoteUser: input.user.name,
    postCreateCommand: "bash ${containerWorkspaceFolder}/.devcontainer/setup.sh",
    overrideCommand: true,
    customizations: {
      vscode: {
        settings: {
          "terminal.integrated.defaultProfile.linux": "bash",
        },
        extensions: input.container.extensions,
      },
    },
  };
};

export const renderDescriptor = (input: TemplateInput): string =>
  `${JSON.stringify(buildDescriptor(input), null, 2)}\n`;
