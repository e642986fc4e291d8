// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Post-create check run inside the container. Exits non-zero when torch
 * cannot be imported or is not a ROCm (HIP) build.
 */
export const VERIFY_SCRIPT = `#!/usr/bin/env bash
set -euo pipefail
python - <<'PY'
import sys

try:
    import torch
except Exception as exc:
    print("torch import failed:", exc)
    sys.exit(1)

hip = getattr(getattr(torch, "version", None), "hip", None)
print("torch:", torch.__version__)
print("torch.version.hip:", hip)
print("GPU visible to torch:", torch.cuda.is_available())
if not hip:
    print("torch is not a ROCm build (torch.version.hip is unset)")
    sys.exit(1)
print("OK: ROCm + PyTorch + vLLM container ready.")
PY
`;

export const renderVerifyScript = (): string => VERIFY_SCRIPT;
