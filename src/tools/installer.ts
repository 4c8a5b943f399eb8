/**
 * Tool installer
 *
 * Drives one recipe through the install/update state machine:
 *
 *   tools.conf mode → skip | package manager | release binary | source build
 *   → install into <prefix>/bin → verify
 *
 * Source builds are idempotent through the build stamp: a cache repository
 * whose target commit equals the recorded installed commit is not rebuilt.
 * Errors never escape; they become a `failed` result and the previous
 * installation stays in place.
 */

import { join } from "path";
import { commandExists, errorMessage, which, whichAll } from "#/core";
import type { InstallEnv } from "#/environment";
import { createManagedSymlink } from "#/layout";
import { probeVersion } from "#/toolchains";
import type { ToolConfig } from "#/tools-conf";
import { selectLatestTag } from "#/version";
import { buildTool } from "./builders";
import { installPrebuilt } from "./prebuilt";
import type { InstallMethod, ToolOptions, ToolRecipe, ToolResult } from "./tools.types";

export interface BuildTarget {
  /** Commit that will be built */
  commit: string;
  /** Tag, pinned ref or branch, for messages */
  label: string;
}

export function repoDirFor(env: InstallEnv, recipe: ToolRecipe): string {
  return join(env.layout.cacheDir, recipe.name);
}

export function installedBinaryPath(env: InstallEnv, recipe: ToolRecipe): string {
  return join(env.layout.bin, recipe.binary);
}

/**
 * Check out the ref to build and return its commit.
 * `stable` takes the pinned ref, else the highest matching tag, else the
 * default branch; `head` always takes the default branch.
 */
export function resolveTarget(env: InstallEnv, recipe: ToolRecipe, config: ToolConfig, repoDir: string): BuildTarget {
  const { git, ctx } = env;
  let label: string | null = null;

  if (config.versionType === "stable" && !recipe.followsBranch) {
    const ref = recipe.stableRef ?? selectLatestTag(git.listTags(repoDir), recipe.tagPattern);
    if (ref) {
      git.checkout(repoDir, ref);
      label = ref;
    } else {
      ctx.logger.info(`No version tags found for ${recipe.name}, using the default branch`);
    }
  }

  if (!label) {
    label = git.checkoutDefaultBranch(repoDir, recipe.branches);
  }

  const commit = git.revParse(repoDir, "HEAD");
  if (!commit) {
    throw new Error(`Cannot resolve ${label} in ${repoDir}`);
  }
  return { commit, label };
}

function installedResult(
  recipe: ToolRecipe,
  wasInstalled: boolean,
  method: InstallMethod,
  version: string | null
): ToolResult {
  return { name: recipe.name, status: wasInstalled ? "updated" : "installed", method, version };
}

/**
 * Remove a package-manager copy that would shadow or collide with the
 * prefix build.
 */
function removeCompetingPackage(env: InstallEnv, recipe: ToolRecipe): void {
  const { fs, system, logger } = env.ctx;
  const competing = whichAll(fs, system, recipe.binary).filter(
    (path) => !path.startsWith(`${env.layout.bin}/`) && env.packages.isManagedBinary(path)
  );
  if (competing.length === 0) return;

  logger.info(`Removing package manager version of ${recipe.name} (${competing.join(", ")})...`);
  const result = env.packages.remove(env.packages.packagesFor(recipe.packages));
  if (!result.success) {
    logger.warn(`Could not remove package manager version of ${recipe.name}: ${result.error}`);
  }
}

function checkRequirements(env: InstallEnv, recipe: ToolRecipe): void {
  const { fs, system } = env.ctx;
  for (const command of recipe.requires ?? []) {
    if (!commandExists(fs, system, command, [env.layout.bin])) {
      throw new Error(`${command} must be installed first`);
    }
  }
}

function createExtraLinks(env: InstallEnv, recipe: ToolRecipe): void {
  for (const link of recipe.extraLinks ?? []) {
    if (link.when && !link.when(env.platform)) continue;
    createManagedSymlink(
      env.ctx,
      env.privileged,
      installedBinaryPath(env, recipe),
      join(env.layout.bin, link.name),
      env.platform.adminGroup
    );
  }
}

/**
 * Version of the freshly installed binary; warns when it cannot be run.
 */
function verifyInstall(env: InstallEnv, recipe: ToolRecipe): string | null {
  const version = probeVersion(env, installedBinaryPath(env, recipe), recipe.versionArgs);
  if (!version) {
    env.ctx.logger.warn(
      `Could not verify ${recipe.name}: \`${recipe.binary} ${recipe.versionArgs.join(" ")}\` reported no version`
    );
  }
  return version;
}

async function runAfterInstall(env: InstallEnv, recipe: ToolRecipe, repoDir: string | null): Promise<void> {
  if (!recipe.afterInstall) return;
  try {
    await recipe.afterInstall(env, { repoDir });
  } catch (err) {
    env.ctx.logger.warn(`${recipe.name} post-install step failed: ${errorMessage(err)}`);
  }
}

function prefersPackageManager(env: InstallEnv, config: ToolConfig): boolean {
  if (config.versionType === "managed") return true;
  return env.platform.osType === "macos" && env.platform.packageManager === "brew" && config.versionType !== "head";
}

/**
 * Package-manager install; null when it failed and the source path should
 * take over.
 */
function installFromPackage(env: InstallEnv, recipe: ToolRecipe): ToolResult | null {
  const { fs, system, logger } = env.ctx;
  const packages = env.packages.packagesFor(recipe.packages);
  if (packages.length === 0) {
    logger.warn(`${recipe.name} has no ${env.packages.kind} package, building from source`);
    return null;
  }

  logger.info(`Installing ${recipe.name} via package manager...`);
  const before = which(fs, system, recipe.binary);
  const previousVersion = before ? probeVersion(env, before, recipe.versionArgs) : null;
  const result = env.packages.install(packages);
  const binary = which(fs, system, recipe.binary);

  if (!result.success || !binary) {
    logger.warn(
      `Package manager installation of ${recipe.name} failed${result.error ? ` (${result.error})` : ""}, ` +
        "falling back to build from source"
    );
    return null;
  }

  const version = probeVersion(env, binary, recipe.versionArgs);
  if (before && version !== null && version === previousVersion) {
    logger.info(`${recipe.name} is up to date (${version})`);
    return { name: recipe.name, status: "current", method: "package", version };
  }
  return installedResult(recipe, before !== null, "package", version);
}

async function installFromSource(
  env: InstallEnv,
  recipe: ToolRecipe,
  config: ToolConfig,
  options: ToolOptions
): Promise<ToolResult> {
  const { fs, logger } = env.ctx;
  const binaryPath = installedBinaryPath(env, recipe);
  const wasInstalled = fs.isExecutable(binaryPath);

  if (recipe.replacesPackage) {
    removeCompetingPackage(env, recipe);
  }
  checkRequirements(env, recipe);

  const preferPrebuilt = recipe.prebuilt && (recipe.prebuilt.always || env.platform.osType === "raspberrypi");
  if (preferPrebuilt) {
    const prebuilt = await installPrebuilt(env, recipe, options);
    if (prebuilt.success) {
      if (prebuilt.current) {
        logger.info(`${recipe.name} is up to date (${prebuilt.version})`);
        return { name: recipe.name, status: "current", method: "prebuilt", version: prebuilt.version };
      }
      createExtraLinks(env, recipe);
      const version = verifyInstall(env, recipe) ?? prebuilt.version;
      await runAfterInstall(env, recipe, null);
      return installedResult(recipe, wasInstalled, "prebuilt", version);
    }
    if (recipe.build.kind === "release") {
      throw new Error(prebuilt.error ?? `Could not download ${recipe.name}`);
    }
    logger.warn(`Release binary for ${recipe.name} unavailable (${prebuilt.error}), building from source`);
  }

  const deps = env.packages.install(env.packages.packagesFor(recipe.dependencies));
  if (!deps.success) {
    logger.warn(`Could not install build dependencies for ${recipe.name}: ${deps.error}`);
  }

  const repoDir = repoDirFor(env, recipe);
  env.git.sync(recipe.repo, repoDir);
  env.git.reset(repoDir);

  const target = resolveTarget(env, recipe, config, repoDir);
  if (!options.force && wasInstalled && env.git.installedCommit(repoDir) === target.commit) {
    logger.info(`${recipe.name} is up to date (${target.label})`);
    return {
      name: recipe.name,
      status: "current",
      method: "source",
      version: probeVersion(env, binaryPath, recipe.versionArgs),
    };
  }

  logger.info(`Building ${recipe.name} ${target.label}...`);
  buildTool(env, recipe, repoDir);
  createExtraLinks(env, recipe);
  env.git.recordInstalled(repoDir, target.commit);

  const version = verifyInstall(env, recipe);
  await runAfterInstall(env, recipe, repoDir);
  return installedResult(recipe, wasInstalled, "source", version);
}

export async function installTool(
  env: InstallEnv,
  recipe: ToolRecipe,
  config: ToolConfig,
  options: ToolOptions = {}
): Promise<ToolResult> {
  const { logger } = env.ctx;

  if (config.versionType === "none") {
    logger.info(`Skipping ${recipe.name} as configured`);
    return { name: recipe.name, status: "skipped" };
  }

  try {
    if (prefersPackageManager(env, config)) {
      const viaPackage = installFromPackage(env, recipe);
      if (viaPackage) return viaPackage;
    }

    return await installFromSource(env, recipe, config, options);
  } catch (err) {
    logger.error(`${recipe.name}: ${errorMessage(err)}`);
    logger.warn(`${recipe.name} installation failed, continuing...`);
    return { name: recipe.name, status: "failed", error: errorMessage(err) };
  }
}
