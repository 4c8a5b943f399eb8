/**
 * Prefix layout
 *
 * Resolves the shared prefix and manages the root-owned tree below it.
 * Everything here goes through the privileged shell; the FileSystem is only
 * used to look before acting.
 */

import { basename, join } from "path";
import { errorMessage, type EngineContext, type PrivilegedShell } from "#/core";
import {
  BINARY_MODE,
  CACHE_SUBDIR,
  CONFIG_SUBDIR,
  DIRECTORY_MODE,
  FALLBACK_PREFIX,
  PREFERRED_PREFIX,
  SETTINGS_FILE,
  SHARE_SUBDIR,
  TOOLCHAINS_SUBDIR,
  TOOLS_CONF_FILE,
} from "#/constants";
import type { EnsureDirOptions, InstallLayout } from "./layout.types";

export function layoutFor(prefix: string): InstallLayout {
  const configDir = join(prefix, CONFIG_SUBDIR);
  return {
    prefix,
    bin: join(prefix, "bin"),
    lib: join(prefix, "lib"),
    configDir,
    toolsConf: join(configDir, TOOLS_CONF_FILE),
    settingsFile: join(configDir, SETTINGS_FILE),
    shareDir: join(prefix, SHARE_SUBDIR),
    cacheDir: join(prefix, CACHE_SUBDIR),
    toolchainsDir: join(prefix, TOOLCHAINS_SUBDIR),
  };
}

function createBinDir(privileged: PrivilegedShell, prefix: string): boolean {
  const bin = join(prefix, "bin");
  return privileged.tryRun("mkdir", ["-p", bin]) && privileged.tryRun("chmod", [DIRECTORY_MODE, bin]);
}

/**
 * Pick the prefix: an explicit override, an existing /opt/local/bin, an
 * existing /usr/local/bin, or whichever of the two can be created.
 */
export function resolvePrefix(ctx: EngineContext, privileged: PrivilegedShell, override?: string): string {
  if (override) {
    ctx.logger.debug(`Using configured prefix ${override}`);
    return override;
  }

  for (const prefix of [PREFERRED_PREFIX, FALLBACK_PREFIX]) {
    if (ctx.fs.isDirectory(join(prefix, "bin"))) {
      ctx.logger.debug(`Using existing prefix ${prefix}`);
      return prefix;
    }
  }

  for (const prefix of [PREFERRED_PREFIX, FALLBACK_PREFIX]) {
    if (createBinDir(privileged, prefix)) {
      ctx.logger.info(`Created ${join(prefix, "bin")}`);
      return prefix;
    }
  }

  throw new Error(
    `Could not create either ${join(PREFERRED_PREFIX, "bin")} or ${join(FALLBACK_PREFIX, "bin")}`
  );
}

/**
 * Prefix for steps that run without privileges: the override, an existing
 * prefix, or the preferred one.
 */
export function findExistingPrefix(ctx: EngineContext, override?: string): string {
  if (override) return override;
  return [PREFERRED_PREFIX, FALLBACK_PREFIX].find((prefix) => ctx.fs.isDirectory(prefix)) ?? PREFERRED_PREFIX;
}

/**
 * Create a directory with the given ownership and mode.
 * Returns false (after a warning) instead of throwing.
 */
export function ensureDir(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  dir: string,
  options: EnsureDirOptions = {}
): boolean {
  const { mode = DIRECTORY_MODE, group } = options;

  try {
    if (!ctx.fs.isDirectory(dir)) {
      privileged.run("mkdir", ["-p", dir]);
    }
    if (group) {
      privileged.run("chown", [`root:${group}`, dir]);
    }
    privileged.run("chmod", [mode, dir]);
    return true;
  } catch (err) {
    ctx.logger.warn(`Could not set up ${dir}: ${errorMessage(err)}`);
    return false;
  }
}

/**
 * Create the directory tree below the prefix. Safe to run repeatedly.
 * Returns the directories that could not be set up.
 */
export function ensureLayout(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  layout: InstallLayout,
  adminGroup: string
): string[] {
  const dirs = [layout.bin, layout.lib, layout.configDir, layout.shareDir, layout.cacheDir, layout.toolchainsDir];
  const failed = dirs.filter((dir) => !ensureDir(ctx, privileged, dir, { group: adminGroup }));

  if (failed.length > 0) {
    ctx.logger.warn(`Prefix layout incomplete (${failed.length} of ${dirs.length} directories), continuing...`);
  }
  return failed;
}

/**
 * `ln -sf source link`, owned by root:<group>.
 * A missing source is reported and skipped.
 */
export function createManagedSymlink(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  source: string,
  link: string,
  group: string
): boolean {
  if (!ctx.fs.exists(source)) {
    ctx.logger.warn(`Cannot link ${basename(link)}: ${source} does not exist`);
    return false;
  }

  try {
    privileged.run("ln", ["-sf", source, link]);
  } catch (err) {
    ctx.logger.warn(`Failed to link ${link} -> ${source}: ${errorMessage(err)}`);
    return false;
  }

  if (!privileged.tryRun("chown", ["-h", `root:${group}`, link])) {
    ctx.logger.debug(`Could not change ownership of ${link}`);
  }
  return true;
}

/**
 * Copy a built binary into `destDir` with mode 755.
 * Throws when the copy fails.
 */
export function installBinary(
  privileged: PrivilegedShell,
  source: string,
  destDir: string,
  name: string = basename(source)
): string {
  const dest = join(destDir, name);
  privileged.run("install", [`-m${BINARY_MODE}`, source, dest]);
  return dest;
}

/**
 * Write a root-owned file: the content is staged in a private temp dir and
 * copied into place with `install`. Throws when the copy fails.
 */
export function writeManagedFile(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  dest: string,
  content: string,
  options: { mode: string; group: string }
): void {
  const tmp = ctx.fs.makeTempDir(`dotstrap-${basename(dest)}-`);
  const staged = join(tmp, basename(dest));
  try {
    ctx.fs.writeFile(staged, content);
    privileged.run("install", [`-m${options.mode}`, staged, dest]);
    privileged.tryRun("chown", [`root:${options.group}`, dest]);
  } finally {
    removePath(privileged, tmp);
  }
}

export function removePath(privileged: PrivilegedShell, path: string): boolean {
  return privileged.tryRun("rm", ["-rf", path]);
}
