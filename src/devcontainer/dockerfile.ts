// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Dockerfile for the ROCm development container. `\${...}` in the templates
 * is Dockerfile/shell syntax and is left for the build to expand.
 */

import { Match, Option, pipe } from "effect";
import type { GroupId } from "../lib/types";
import { type TemplateInput, imageTag, torchIndexUrl } from "./types";

const header = (input: TemplateInput, tag: string): string => `# ROCm Dev Container (AI/LLM focus)
ARG ROCM_SERIES=${input.resolved.version}
ARG ROCM_MM=${tag}
ARG TORCH_INDEX=${torchIndexUrl(tag)}
ARG USER_UID=${input.identity.uid}
ARG USER_GID=${input.identity.gid}

FROM ${input.container.baseImage}:\${ROCM_MM}-complete
ARG TORCH_INDEX
ARG USER_UID
ARG USER_GID
ENV DEBIAN_FRONTEND=noninteractive \\
    UV_NO_MODIFY_PATH=1 \\
    PIP_DISABLE_PIP_VERSION_CHECK=1 \\
    PYTHONDONTWRITEBYTECODE=1 \\
    VLLM_USE_ROCM=1

RUN apt-get update && apt-get install -y --no-install-recommends \\
    git build-essential cmake ninja-build \\
    python3 python3-venv python3-pip \\
    clang wget curl ca-certificates pkg-config sudo \\
  && rm -rf /var/lib/apt/lists/*
`;

const PYTHON_STACK = `
# uv
RUN curl -LsSf https://astral.sh/uv/install.sh | bash && ln -sf /root/.local/bin/uv /usr/local/bin/uv

WORKDIR /workspace

RUN uv venv /opt/venv && \\
    /opt/venv/bin/python -m ensurepip --upgrade && \\
    /opt/venv/bin/python -m pip install --upgrade pip wheel setuptools
ENV PATH="/opt/venv/bin:\${PATH}"

# PyTorch ROCm wheels
RUN /opt/venv/bin/python -m pip install "torch>=2.5" torchvision torchaudio --index-url "\${TORCH_INDEX}"

# vLLM (ROCm)
RUN /opt/venv/bin/python -m pip install --no-cache-dir "vllm>=0.6.4"
`;

const createUser = (name: string): string => `
# Non-root user matching the host UID/GID so bind-mounted files stay writable
RUN groupadd --gid \${USER_GID} ${name} \\
 && useradd --uid \${USER_UID} --gid \${USER_GID} -m ${name} \\
 && echo '${name} ALL=(ALL) NOPASSWD:ALL' > /etc/sudoers.d/${name} \\
 && chmod 0440 /etc/sudoers.d/${name}
`;

const graftGroup = (group: string, gid: Option.Option<GroupId>, user: string): string =>
  pipe(
    gid,
    Option.match({
      onNone: (): string => "",
      onSome: (id): string =>
        `RUN (getent group ${id} >/dev/null || groupadd --gid ${id} ${group}) \\
 && usermod -aG "$(getent group ${id} | cut -d: -f1)" ${user}
`,
    })
  );

const reuseUser = (input: TemplateInput, name: string): string => `
# The base image already has a user at the host UID; reuse it and graft the
# host primary group and GPU device groups onto it
RUN (getent group \${USER_GID} >/dev/null || groupadd --gid \${USER_GID} hostgroup) \\
 && usermod -aG "$(getent group \${USER_GID} | cut -d: -f1)" ${name}
${graftGroup("host_render", input.identity.renderGid, name)}${graftGroup("host_video", input.identity.videoGid, name)}RUN echo '${name} ALL=(ALL) NOPASSWD:ALL' > /etc/sudoers.d/99-${name} \\
 && chmod 0440 /etc/sudoers.d/99-${name}
`;

const footer = (name: string): string => `
USER ${name}
WORKDIR /workspace
CMD ["/bin/bash"]
`;

export const renderDockerfile = (input: TemplateInput): string => {
  const tag = imageTag(input.resolved.version, input.container.fallbackTag);
  return pipe(
    Match.value(input.user),
    Match.tag(
      "Create",
      ({ name }) => `${header(input, tag)}${createUser(name)}${PYTHON_STACK}${footer(name)}`
    ),
    Match.tag(
      "Existing",
      ({ name }) => `${header(input, tag)}${PYTHON_STACK}${reuseUser(input, name)}${footer(name)}`
    ),
    Match.exhaustive
  );
};
