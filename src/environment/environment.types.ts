/**
 * Install environment types
 */

import type { EngineContext, PrivilegedShell, PrivilegeMode } from "#/core";
import type { GitClient } from "#/git";
import type { GitHubReleasesClient } from "#/github";
import type { InstallLayout } from "#/layout";
import type { PackageManagerClient } from "#/package-manager";
import type { PlatformInfo } from "#/platform";
import type { Settings } from "#/schemas";

/**
 * Everything a toolchain or tool installer needs, resolved once per run.
 */
export interface InstallEnv {
  ctx: EngineContext;
  privileged: PrivilegedShell;
  platform: PlatformInfo;
  layout: InstallLayout;
  packages: PackageManagerClient;
  git: GitClient;
  github: GitHubReleasesClient;
  settings: Settings;
  /** Parallel jobs for make-style builds */
  jobs: number;
  /** Parallel jobs for cargo */
  cargoJobs: number;
}

export interface InstallEnvOptions {
  settings: Settings;
  /** Skip detection (tests, --no-sudo style callers) */
  privilegeMode?: PrivilegeMode;
}
