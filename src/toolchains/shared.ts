/**
 * Helpers shared by the toolchain installers.
 */

import { join } from "path";
import type { InstallEnv } from "#/environment";
import { createManagedSymlink, ensureDir, removePath } from "#/layout";
import { extractVersion } from "#/version";

/**
 * Run `binary args` and pull a version out of its output; null when the
 * binary is missing or fails.
 */
export function probeVersion(
  env: InstallEnv,
  binary: string,
  args: string[],
  execEnv?: Record<string, string>
): string | null {
  if (!env.ctx.fs.isExecutable(binary)) return null;
  try {
    return extractVersion(env.ctx.shell.execFile(binary, args, execEnv ? { env: execEnv } : {}));
  } catch {
    return null;
  }
}

/**
 * Link `<dir>/<source>` to `<prefix>/bin/<name>` for each pair.
 */
export function linkBinaries(env: InstallEnv, dir: string, links: [source: string, name: string][]): void {
  for (const [source, name] of links) {
    createManagedSymlink(
      env.ctx,
      env.privileged,
      join(dir, source),
      join(env.layout.bin, name),
      env.platform.adminGroup
    );
  }
}

/**
 * Remove a previous installation and recreate its directory.
 */
export function prepareFreshDir(env: InstallEnv, dir: string): void {
  if (env.ctx.fs.exists(dir)) {
    env.ctx.logger.info(`Removing existing installation in ${dir}...`);
    removePath(env.privileged, dir);
  }
  if (!ensureDir(env.ctx, env.privileged, dir, { group: env.platform.adminGroup })) {
    throw new Error(`Cannot create ${dir}`);
  }
}

/**
 * Fetch a URL and return its body, or null on any failure.
 */
export async function fetchText(env: InstallEnv, url: string): Promise<string | null> {
  try {
    const response = await env.ctx.http.fetch(url);
    return response.ok ? await response.text() : null;
  } catch {
    return null;
  }
}

/**
 * Fetch a URL and parse its JSON body, or null on any failure.
 */
export async function fetchJson(env: InstallEnv, url: string): Promise<unknown> {
  const body = await fetchText(env, url);
  if (body === null) return null;
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}
