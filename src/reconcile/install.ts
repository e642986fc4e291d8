// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Ordered install paths per resource and package family. The first path
 * that succeeds wins. `None` means the family has no automated path and the
 * operator has to install the resource by hand.
 */

import { Array as Arr, Effect, Match, Option, pipe } from "effect";
import type { PackageFamily } from "../config/field-values";
import { ErrorCode, GeneralError, SystemError } from "../lib/errors";
import { SYSTEM_PATHS } from "../lib/paths";
import { pathJoin } from "../lib/types";
import type { HostObservations, HostProfile } from "../probe/types";
import {
  DEFAULT_CODENAME,
  aptSourceLine,
  findInstaller,
  rocmKeyUrl,
  seriesExists,
} from "../rocm/repository";
import type { ResolvedVersion } from "../rocm/resolver";
import { CommandExecutor } from "../system/services/executor";
import { RemoteFetcher } from "../system/services/remote";
import {
  type InstallEnv,
  type InstallFailure,
  aptInstall,
  aptUpdate,
  bestEffort,
  dpkgArchitecture,
  enableService,
  installKeyring,
  normalizeMicrosoftSources,
  privileged,
  writeRootFile,
} from "./operations";
import type { Action, HostPackage, Resource } from "./types";

export interface InstallContext {
  readonly profile: HostProfile;
  readonly observations: HostObservations;
  readonly resolved: ResolvedVersion;
  /** Configured default version, the second choice for ROCm packages. */
  readonly fallbackVersion: string;
  readonly repoBaseUrl: string;
}

export interface InstallPath {
  readonly name: string;
  readonly run: Effect.Effect<void, InstallFailure, InstallEnv>;
}

const DOCKER_APT_KEY = "https://download.docker.com/linux/ubuntu/gpg";
const DOCKER_APT_REPO = "https://download.docker.com/linux/ubuntu";
const DOCKER_DNF_REPO = "https://download.docker.com/linux/centos/docker-ce.repo";
const DOCKER_CE_PACKAGES = [
  "docker-ce",
  "docker-ce-cli",
  "containerd.io",
  "docker-buildx-plugin",
  "docker-compose-plugin",
];
const MICROSOFT_KEY = "https://packages.microsoft.com/keys/microsoft.asc";
const VSCODE_REPO = "https://packages.microsoft.com/repos/code";

const ROCM_PIN = "Package: *\nPin: release o=repo.radeon.com\nPin-Priority: 600\n";

const path = (
  name: string,
  run: Effect.Effect<void, InstallFailure, InstallEnv>
): InstallPath => ({ name, run });

const fail = (message: string): Effect.Effect<never, GeneralError> =>
  Effect.fail(new GeneralError({ code: ErrorCode.DEPENDENCY_MISSING, message }));

const codename = (ctx: InstallContext): string =>
  pipe(
    ctx.profile.osCodename,
    Option.getOrElse(() => DEFAULT_CODENAME)
  );

// --- base packages ---------------------------------------------------------

const basePackagePaths = (family: PackageFamily): Option.Option<readonly InstallPath[]> =>
  pipe(
    Match.value(family),
    Match.when("apt", () =>
      Option.some([
        path(
          "apt",
          Effect.gen(function* () {
            yield* bestEffort("Normalizing Microsoft APT sources", normalizeMicrosoftSources);
            yield* aptUpdate;
            yield* aptInstall(
              [
                "curl",
                "wget",
                "gnupg",
                "ca-certificates",
                "lsb-release",
                "jq",
                "git",
                "build-essential",
              ],
              { noRecommends: true }
            );
          })
        ),
      ])
    ),
    Match.when("dnf", () =>
      Option.some([
        path(
          "dnf",
          privileged([
            "dnf",
            "-y",
            "install",
            "curl",
            "wget",
            "gnupg2",
            "ca-certificates",
            "jq",
            "git",
            "make",
            "gcc",
            "gcc-c++",
          ])
        ),
      ])
    ),
    Match.when("zypper", () =>
      Option.some([
        path(
          "zypper",
          Effect.gen(function* () {
            yield* privileged(["zypper", "--non-interactive", "ref"]);
            yield* privileged([
              "zypper",
              "--non-interactive",
              "in",
              "curl",
              "wget",
              "gpg2",
              "ca-certificates",
              "jq",
              "git",
              "gcc",
              "gcc-c++",
              "make",
            ]);
          })
        ),
      ])
    ),
    Match.when("none", () => Option.none()),
    Match.exhaustive
  );

// --- docker ----------------------------------------------------------------

const dockerPaths = (ctx: InstallContext): Option.Option<readonly InstallPath[]> =>
  pipe(
    Match.value(ctx.profile.packageFamily),
    Match.when("apt", () =>
      Option.some([
        path(
          "docker-ce (Docker APT repository)",
          Effect.gen(function* () {
            yield* bestEffort("Normalizing Microsoft APT sources", normalizeMicrosoftSources);
            yield* aptUpdate;
            yield* aptInstall(["ca-certificates", "curl", "gnupg"]);
            yield* installKeyring(DOCKER_APT_KEY, SYSTEM_PATHS.dockerKeyring);
            const arch = yield* dpkgArchitecture;
            const suite = pipe(
              ctx.profile.osCodename,
              Option.getOrElse(() => "stable")
            );
            yield* writeRootFile(
              pathJoin(SYSTEM_PATHS.aptSourcesDir, "docker.list"),
              `deb [arch=${arch} signed-by=${SYSTEM_PATHS.dockerKeyring}] ${DOCKER_APT_REPO} ${suite} stable\n`
            );
            yield* aptUpdate;
            yield* aptInstall(DOCKER_CE_PACKAGES);
          })
        ),
        path(
          "docker.io (distribution package)",
          Effect.gen(function* () {
            yield* aptUpdate;
            yield* aptInstall(["docker.io"]);
            yield* enableService("docker");
          })
        ),
      ])
    ),
    Match.when("dnf", () =>
      Option.some([
        path(
          "docker-ce (Docker RPM repository)",
          Effect.gen(function* () {
            yield* privileged(["dnf", "-y", "install", "dnf-plugins-core"]);
            yield* privileged(["dnf", "config-manager", "--add-repo", DOCKER_DNF_REPO]);
            yield* privileged(["dnf", "-y", "install", ...DOCKER_CE_PACKAGES]);
            yield* enableService("docker");
          })
        ),
        path(
          "moby-engine (distribution package)",
          Effect.gen(function* () {
            yield* privileged(["dnf", "-y", "install", "moby-engine"]);
            yield* enableService("docker");
          })
        ),
      ])
    ),
    Match.when("zypper", () =>
      Option.some([
        path(
          "docker (distribution package)",
          Effect.gen(function* () {
            yield* privileged(["zypper", "--non-interactive", "in", "docker", "docker-compose"]);
            yield* enableService("docker");
          })
        ),
      ])
    ),
    Match.when("none", () => Option.none()),
    Match.exhaustive
  );

const daemonConfigPaths = (family: PackageFamily): Option.Option<readonly InstallPath[]> =>
  family === "none"
    ? Option.none()
    : Option.some([
        path(
          "empty daemon.json",
          Effect.gen(function* () {
            yield* privileged(["install", "-m", "0755", "-d", "/etc/docker"]);
            yield* writeRootFile(SYSTEM_PATHS.dockerDaemonConfig, "{}\n");
            yield* bestEffort(
              "Restarting docker",
              privileged(["systemctl", "restart", "docker"])
            );
          })
        ),
      ]);

// --- AMD installer -----------------------------------------------------------

/**
 * Download and install the `amdgpu-install` package for a version, leaving
 * the `amdgpu-install` command available.
 */
const installInstaller = (
  ctx: InstallContext,
  version: string
): Effect.Effect<void, InstallFailure, InstallEnv> =>
  Effect.gen(function* () {
    const remote = yield* RemoteFetcher;
    const executor = yield* CommandExecutor;
    const url = yield* findInstaller(ctx.repoBaseUrl, version, codename(ctx));
    if (Option.isNone(url)) {
      return yield* fail(`No amdgpu-install package published for ROCm ${version}`);
    }
    const fileName = pipe(
      Arr.last(url.value.split("/")),
      Option.getOrElse(() => "amdgpu-install.deb")
    );
    const local = pathJoin("/tmp", fileName);
    yield* remote.download(url.value, local);
    // dpkg may stop on unmet dependencies; apt-get update below sorts them out.
    yield* bestEffort(`Installing ${fileName}`, privileged(["dpkg", "-i", local]));
    yield* aptUpdate;
    if (!(yield* executor.commandExists("amdgpu-install"))) {
      return yield* Effect.fail(
        new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `amdgpu-install is missing after installing ${fileName}`,
        })
      );
    }
  });

const amdgpuInstall = (usecase: string, extra: readonly string[] = []): readonly string[] => [
  "amdgpu-install",
  `--usecase=${usecase}`,
  "--accept-eula",
  "-y",
  ...extra,
];

const driverPaths = (ctx: InstallContext): Option.Option<readonly InstallPath[]> =>
  ctx.profile.packageFamily !== "apt"
    ? Option.none()
    : Option.some(
        Arr.dedupe([ctx.resolved.version, ctx.fallbackVersion]).map((version) =>
          path(
            `amdgpu-install ${version} (hip,opencl)`,
            Effect.gen(function* () {
              yield* installInstaller(ctx, version);
              yield* privileged(amdgpuInstall("hip,opencl"));
              yield* Effect.logInfo("Driver install attempted; reboot if kernel modules were updated");
            })
          )
        )
      );

// --- ROCm userland ---------------------------------------------------------

const rocmSourceFile = (segment: string): string =>
  pathJoin(
    SYSTEM_PATHS.aptSourcesDir,
    segment === "latest" ? "rocm.list" : `rocm-${segment}.list`
  );

const rocmAptPath = (ctx: InstallContext, segment: string): InstallPath =>
  path(
    `ROCm APT repository ${segment}`,
    Effect.gen(function* () {
      const suite = codename(ctx);
      if (!(yield* seriesExists(ctx.repoBaseUrl, segment, suite))) {
        return yield* fail(`ROCm APT series ${segment} is not published for ${suite}`);
      }
      yield* installKeyring(rocmKeyUrl(ctx.repoBaseUrl), SYSTEM_PATHS.rocmKeyring);
      yield* writeRootFile(
        rocmSourceFile(segment),
        `${aptSourceLine(ctx.repoBaseUrl, segment, suite, SYSTEM_PATHS.rocmKeyring)}\n`
      );
      yield* writeRootFile(SYSTEM_PATHS.rocmPin, ROCM_PIN);
      yield* aptUpdate;
      yield* aptInstall(["rocm"]);
    })
  );

const rocmInstallerPath = (ctx: InstallContext, version: string): InstallPath =>
  path(
    `amdgpu-install ${version} (rocm,hip,opencl)`,
    Effect.gen(function* () {
      yield* installInstaller(ctx, version);
      yield* privileged(amdgpuInstall("rocm,hip,opencl")).pipe(
        Effect.catchAll((e) =>
          Effect.logWarning(`${e.message}; retrying without DKMS`).pipe(
            Effect.zipRight(privileged(amdgpuInstall("rocm,hip,opencl", ["--no-dkms"])))
          )
        )
      );
    })
  );

const rocmPaths = (ctx: InstallContext): Option.Option<readonly InstallPath[]> => {
  if (ctx.profile.packageFamily !== "apt") {
    return Option.none();
  }
  const segments = Arr.dedupe([ctx.resolved.repoSegment, ctx.fallbackVersion]);
  const versions = Arr.dedupe([ctx.resolved.version, ctx.fallbackVersion]);
  return Option.some([
    ...segments.map((segment) => rocmAptPath(ctx, segment)),
    ...versions.map((version) => rocmInstallerPath(ctx, version)),
  ]);
};

// --- editor ----------------------------------------------------------------

const editorPaths = (ctx: InstallContext): Option.Option<readonly InstallPath[]> =>
  ctx.profile.packageFamily !== "apt"
    ? Option.none()
    : Option.some([
        path(
          "code (Microsoft APT repository)",
          Effect.gen(function* () {
            if (ctx.observations.editorSnap) {
              yield* Effect.logWarning("Removing snap 'code' to avoid devcontainer issues");
              yield* bestEffort("Removing snap 'code'", privileged(["snap", "remove", "code"]));
            }
            yield* bestEffort("Normalizing Microsoft APT sources", normalizeMicrosoftSources);
            yield* privileged([
              "rm",
              "-f",
              pathJoin(SYSTEM_PATHS.aptSourcesDir, "vscode.list"),
              pathJoin(SYSTEM_PATHS.aptSourcesDir, "microsoft-prod.list"),
            ]);
            yield* installKeyring(MICROSOFT_KEY, SYSTEM_PATHS.microsoftKeyring);
            yield* writeRootFile(
              pathJoin(SYSTEM_PATHS.aptSourcesDir, "vscode.list"),
              `deb [arch=amd64 signed-by=${SYSTEM_PATHS.microsoftKeyring}] ${VSCODE_REPO} stable main\n`
            );
            yield* aptUpdate;
            yield* aptInstall(["code"]);
          })
        ),
      ]);

const packagePaths = (
  name: HostPackage,
  ctx: InstallContext
): Option.Option<readonly InstallPath[]> =>
  pipe(
    Match.value(name),
    Match.when("base-packages", () => basePackagePaths(ctx.profile.packageFamily)),
    Match.when("docker-engine", () => dockerPaths(ctx)),
    Match.when("docker-daemon-config", () => daemonConfigPaths(ctx.profile.packageFamily)),
    Match.when("kernel-driver", () => driverPaths(ctx)),
    Match.when("rocm-userland", () => rocmPaths(ctx)),
    Match.when("editor", () => editorPaths(ctx)),
    Match.exhaustive
  );

/**
 * Install paths for a mutating action on a host resource. Group adds are
 * always `usermod -aG`, which appends to the user's supplementary groups.
 */
export const installPaths = (
  resource: Resource,
  action: Action,
  ctx: InstallContext
): Option.Option<readonly InstallPath[]> =>
  pipe(
    Match.value(action),
    Match.tag("AddToGroup", ({ group, user }) =>
      Option.some([path(`usermod -aG ${group}`, privileged(["usermod", "-aG", group, user]))])
    ),
    Match.tag("Install", "Reinstall", () =>
      resource.kind._tag === "Package" ? packagePaths(resource.kind.name, ctx) : Option.none()
    ),
    Match.tag("WriteFile", "Skip", () => Option.none<readonly InstallPath[]>()),
    Match.exhaustive
  );
