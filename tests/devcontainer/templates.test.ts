// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { buildDescriptor, groupAddValue, renderDescriptor } from "../../src/devcontainer/descriptor.ts";
import { renderDockerfile } from "../../src/devcontainer/dockerfile.ts";
import { baseImageRef, imageTag } from "../../src/devcontainer/types.ts";
import { ContainerUser } from "../../src/devcontainer/user-mapping.ts";
import { VERIFY_SCRIPT } from "../../src/devcontainer/verify-script.ts";
import { GroupIdSchema } from "../../src/lib/types.ts";
import { resolvedVersion } from "../helpers/hosts.ts";
import { templateInput, testIdentity } from "../helpers/templates.ts";

describe("imageTag", () => {
  test("uses the major.minor series of the version", () => {
    expect(imageTag("6.4.3", "6.4")).toBe("6.4");
    expect(imageTag("7.0", "6.4")).toBe("7.0");
  });

  test("falls back for a non-numeric version", () => {
    expect(imageTag("latest", "6.4")).toBe("6.4");
  });

  test("baseImageRef names the complete variant", () => {
    expect(baseImageRef(templateInput().container, "6.4")).toBe("rocm/dev-ubuntu-24.04:6.4-complete");
  });
});

describe("devcontainer.json", () => {
  test("binds device groups by GID when known and by name otherwise", () => {
    expect(groupAddValue(Option.some(GroupIdSchema.make(992)), "render")).toBe("992");
    expect(groupAddValue(Option.none(), "video")).toBe("video");
    expect(buildDescriptor(templateInput()).runArgs).toEqual([
      "--device=/dev/kfd",
      "--device=/dev/dri",
      "--group-add=992",
      "--group-add=video",
      "--ipc=host",
      "--shm-size=16g",
    ]);
  });

  test("passes the host ids as string build args", () => {
    const descriptor = buildDescriptor(templateInput({ identity: testIdentity({ gid: GroupIdSchema.make(1001) }) }));
    expect(descriptor.build).toEqual({ dockerfile: "Dockerfile", args: { USER_UID: "1000", USER_GID: "1001" } });
    expect(descriptor.name).toBe("ROCm 6.4 Dev");
    expect(descriptor.remoteUser).toBe("devuser");
  });

  test("sets only the ROCm switch in the container environment", () => {
    expect(buildDescriptor(templateInput()).containerEnv).toEqual({ VLLM_USE_ROCM: "1" });
  });

  test("uses the existing image user as remote user", () => {
    const descriptor = buildDescriptor(templateInput({ user: ContainerUser.Existing({ name: "ubuntu" }) }));
    expect(descriptor.remoteUser).toBe("ubuntu");
  });

  test("renders pretty JSON with a trailing newline", () => {
    const input = templateInput();
    const text = renderDescriptor(input);
    expect(text.endsWith("}\n")).toBe(true);
    expect(JSON.parse(text)).toEqual(buildDescriptor(input));
    expect(text).toContain('\n  "workspaceFolder": "/workspace",\n');
  });
});

describe("Dockerfile", () => {
  test("pins version, tag, torch index and host ids in build args", () => {
    const text = renderDockerfile(templateInput({ resolved: resolvedVersion({ version: "7.0", series: "7.0" }) }));
    const lines = text.split("\n");
    expect(lines.slice(0, 6)).toEqual([
      "# ROCm Dev Container (AI/LLM focus)",
      "ARG ROCM_SERIES=7.0",
      "ARG ROCM_MM=7.0",
      "ARG TORCH_INDEX=https://download.pytorch.org/whl/rocm7.0",
      "ARG USER_UID=1000",
      "ARG USER_GID=1000",
    ]);
    expect(lines).toContain("FROM rocm/dev-ubuntu-24.04:${ROCM_MM}-complete");
  });

  test("creates a new user when the image has none at the host UID", () => {
    const text = renderDockerfile(templateInput());
    expect(text).toContain(" && useradd --uid ${USER_UID} --gid ${USER_GID} -m devuser \\\n");
    expect(text).not.toContain("host_render");
    expect(text.endsWith('\nUSER devuser\nWORKDIR /workspace\nCMD ["/bin/bash"]\n')).toBe(true);
  });

  test("reuses an existing user and grafts only the known device groups", () => {
    const text = renderDockerfile(templateInput({ user: ContainerUser.Existing({ name: "ubuntu" }) }));
    expect(text).not.toContain("useradd");
    expect(text).toContain("RUN (getent group 992 >/dev/null || groupadd --gid 992 host_render) \\\n");
    expect(text).not.toContain("host_video");
    expect(text).toContain("RUN echo 'ubuntu ALL=(ALL) NOPASSWD:ALL' > /etc/sudoers.d/99-ubuntu \\\n");
    expect(text.endsWith('\nUSER ubuntu\nWORKDIR /workspace\nCMD ["/bin/bash"]\n')).toBe(true);
  });
});

describe("setup.sh", () => {
  test("is a strict bash script that fails without a HIP build", () => {
    const lines = VERIFY_SCRIPT.split("\n");
    expect(lines[0]).toBe("#!/usr/bin/env bash");
    expect(lines[1]).toBe("set -euo pipefail");
    expect(lines).toContain("if not hip:");
    expect(lines).toContain('print("OK: ROCm + PyTorch + vLLM container ready.")');
  });
});
