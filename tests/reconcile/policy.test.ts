// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { reconcile } from "../../src/reconcile/policy.ts";
import {
  Action,
  DesiredState,
  ResourceState,
  artifactResource,
  groupResource,
  packageResource,
} from "../../src/reconcile/types.ts";

const apt = { force: false, packageFamily: "apt" } as const;
const forced = { force: true, packageFamily: "apt" } as const;
const docker = packageResource("docker-engine", true);

describe("reconcile", () => {
  test("installs an absent package", () => {
    expect(reconcile(docker, ResourceState.Absent(), DesiredState.Present(), apt)).toEqual(Action.Install());
  });

  test("skips a matching package, so a second run changes nothing", () => {
    const action = reconcile(docker, ResourceState.PresentMatching(), DesiredState.Present(), apt);
    expect(action).toEqual(Action.Skip({ reason: "already in desired state", warn: false }));
  });

  test("reinstalls a mismatched package with the mismatch as reason", () => {
    const action = reconcile(
      docker,
      ResourceState.PresentMismatched({ detail: "installed as a snap" }),
      DesiredState.Present(),
      apt
    );
    expect(action).toEqual(Action.Reinstall({ reason: "installed as a snap" }));
  });

  test("force reinstalls a matching package", () => {
    expect(reconcile(docker, ResourceState.PresentMatching(), DesiredState.Present(), forced)).toEqual(
      Action.Reinstall({ reason: "forced" })
    );
  });

  test("unmanaged resources are skipped whatever their state", () => {
    const action = reconcile(
      packageResource("kernel-driver", false),
      ResourceState.Absent(),
      DesiredState.Unmanaged({ reason: "opted out" }),
      forced
    );
    expect(action).toEqual(Action.Skip({ reason: "opted out", warn: false }));
  });

  test("host resources skip with a warning when there is no package family", () => {
    const action = reconcile(groupResource("render", "dev"), ResourceState.Absent(), DesiredState.Present(), {
      force: false,
      packageFamily: "none",
    });
    expect(action).toEqual(
      Action.Skip({
        reason: "no supported package manager (apt, dnf, zypper); manage this resource manually",
        warn: true,
      })
    );
  });

  test("adds a missing group membership", () => {
    expect(
      reconcile(groupResource("video", "dev"), ResourceState.Absent(), DesiredState.Present(), apt)
    ).toEqual(Action.AddToGroup({ group: "video", user: "dev" }));
  });

  describe("artifacts", () => {
    const dockerfile = artifactResource("Dockerfile", "/srv/app/.devcontainer/Dockerfile");

    test("writes an absent artifact even without a package family", () => {
      const action = reconcile(dockerfile, ResourceState.Absent(), DesiredState.Present(), {
        force: false,
        packageFamily: "none",
      });
      expect(action).toEqual(Action.WriteFile({ path: "/srv/app/.devcontainer/Dockerfile" }));
    });

    test("leaves an existing artifact alone unless forced", () => {
      const differs = ResourceState.PresentMismatched({ detail: "content differs" });
      expect(reconcile(dockerfile, differs, DesiredState.Present(), apt)).toEqual(
        Action.Skip({ reason: "exists; use --force to overwrite", warn: false })
      );
      expect(reconcile(dockerfile, differs, DesiredState.Present(), forced)).toEqual(
        Action.WriteFile({ path: "/srv/app/.devcontainer/Dockerfile" })
      );
    });

    test("rewrites a matching artifact when forced", () => {
      expect(reconcile(dockerfile, ResourceState.PresentMatching(), DesiredState.Present(), forced)).toEqual(
        Action.WriteFile({ path: "/srv/app/.devcontainer/Dockerfile" })
      );
    });
  });
});
