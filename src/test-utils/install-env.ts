/**
 * Test utilities - InstallEnv built from in-memory mocks
 */

import { createPrivilegedShell, type PrivilegeMode } from "#/core";
import type { InstallEnv } from "#/environment";
import { createGitClient } from "#/git";
import { GitHubReleasesClient } from "#/github";
import { layoutFor } from "#/layout";
import { createPackageManager } from "#/package-manager";
import { buildJobs, cargoJobs, type PlatformInfo } from "#/platform";
import type { Settings } from "#/schemas";
import { createTestContext, type TestContext } from "./mocks";

export interface TestInstallEnv extends InstallEnv {
  ctx: TestContext;
}

/**
 * Debian on x86_64 with 4 CPUs, running as root, prefix /opt/local.
 */
export function createTestInstallEnv(
  options: {
    ctx?: TestContext;
    mode?: PrivilegeMode;
    platform?: Partial<PlatformInfo>;
    prefix?: string;
    settings?: Partial<Settings>;
  } = {}
): TestInstallEnv {
  const ctx = options.ctx ?? createTestContext();
  const privileged = createPrivilegedShell(ctx.shell, options.mode ?? "root");
  const platform: PlatformInfo = {
    osType: "linux",
    distroId: "debian",
    packageManager: "apt",
    adminGroup: "staff",
    arch: "x86_64",
    goArch: "amd64",
    cpuCount: 4,
    ...options.platform,
  };
  const settings: Settings = { tools: [], ...options.settings };

  return {
    ctx,
    privileged,
    platform,
    layout: layoutFor(options.prefix ?? "/opt/local"),
    packages: createPackageManager(ctx, privileged, platform.packageManager),
    git: createGitClient(ctx.fs, privileged, ctx.logger),
    github: new GitHubReleasesClient(ctx.http, settings.githubToken),
    settings,
    jobs: buildJobs(platform, settings.jobs),
    cargoJobs: cargoJobs(platform, settings.jobs),
  };
}
