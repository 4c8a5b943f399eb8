/**
 * Install environment
 *
 * Detects privileges and platform, resolves the prefix and wires the clients
 * every installer shares.
 */

import { join } from "path";
import { createPrivilegedShell, detectPrivilegeMode, type EngineContext } from "#/core";
import { createGitClient } from "#/git";
import { GitHubReleasesClient } from "#/github";
import { layoutFor, resolvePrefix } from "#/layout";
import { createPackageManager } from "#/package-manager";
import { buildJobs, cargoJobs, detectPlatform } from "#/platform";
import type { InstallEnv, InstallEnvOptions } from "./environment.types";

export function createInstallEnv(ctx: EngineContext, options: InstallEnvOptions): InstallEnv {
  const { settings } = options;
  const mode = options.privilegeMode ?? detectPrivilegeMode(ctx.shell, ctx.system);
  const privileged = createPrivilegedShell(ctx.shell, mode);
  ctx.logger.debug(`Privilege mode: ${mode}`);

  const platform = detectPlatform(ctx, { adminGroup: settings.adminGroup });
  const layout = layoutFor(resolvePrefix(ctx, privileged, settings.prefix));

  return {
    ctx,
    privileged,
    platform,
    layout,
    packages: createPackageManager(ctx, privileged, platform.packageManager),
    git: createGitClient(ctx.fs, privileged, ctx.logger),
    github: new GitHubReleasesClient(ctx.http, settings.githubToken),
    settings,
    jobs: buildJobs(platform, settings.jobs),
    cargoJobs: cargoJobs(platform, settings.jobs),
  };
}

export function toolchainDir(env: InstallEnv, name: string): string {
  return join(env.layout.toolchainsDir, name);
}

/**
 * PATH for build commands: the prefix bin directory first, so freshly
 * installed toolchains win over system copies.
 */
export function buildPath(env: InstallEnv): string {
  const inherited = env.ctx.system.env.PATH ?? "/usr/bin:/bin";
  return `${env.layout.bin}:${inherited}`;
}

/**
 * Environment for rustup and cargo: both homes live inside the toolchain dir.
 */
export function rustEnv(env: InstallEnv): Record<string, string> {
  const rustDir = toolchainDir(env, "rust");
  return {
    RUSTUP_HOME: join(rustDir, "rustup"),
    CARGO_HOME: join(rustDir, "cargo"),
    PATH: buildPath(env),
  };
}
