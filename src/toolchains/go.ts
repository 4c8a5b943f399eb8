/**
 * Go toolchain: official tarball extracted to <toolchains>/go.
 */

import { join } from "path";
import { GO_DOWNLOAD_BASE, GO_FALLBACK_VERSION, GO_RELEASES_URL } from "#/constants";
import { downloadAndExtract } from "#/download";
import { toolchainDir, type InstallEnv } from "#/environment";
import { ensureDir } from "#/layout";
import { releaseOsName } from "#/platform";
import { GoReleasesSchema } from "#/schemas";
import { fetchJson, linkBinaries, prepareFreshDir, probeVersion } from "./shared";
import type { Toolchain, ToolchainResult } from "./toolchains.types";

/**
 * Newest stable release from the go.dev download index, without the "go" prefix.
 */
export async function latestGoVersion(env: InstallEnv): Promise<string | null> {
  const parsed = GoReleasesSchema.safeParse(await fetchJson(env, GO_RELEASES_URL));
  if (!parsed.success) return null;

  const stable = parsed.data.find((release) => release.stable);
  return stable ? stable.version.replace(/^go/, "") : null;
}

export function goArchiveUrl(env: InstallEnv, version: string): string {
  return `${GO_DOWNLOAD_BASE}/go${version}.${releaseOsName(env.platform)}-${env.platform.goArch}.tar.gz`;
}

export const goToolchain: Toolchain = {
  name: "go",
  label: "Go",

  async install(env, options): Promise<ToolchainResult> {
    const { fs, logger } = env.ctx;
    const goDir = toolchainDir(env, "go");
    const goBin = join(goDir, "bin", "go");

    logger.info("Processing Go toolchain...");
    const current = probeVersion(env, goBin, ["version"]);

    let version = await latestGoVersion(env);
    if (!version) {
      logger.warn(`Could not determine latest Go version. Using fallback version ${GO_FALLBACK_VERSION}`);
      version = GO_FALLBACK_VERSION;
    }

    if (!options.force && fs.isDirectory(goDir) && current === version) {
      return { name: "go", state: "current", version };
    }

    logger.info(`Downloading Go ${version} for ${env.platform.goArch}...`);
    prepareFreshDir(env, goDir);
    ensureDir(env.ctx, env.privileged, env.layout.toolchainsDir, { group: env.platform.adminGroup });

    // The archive holds a single top-level go/ directory
    const result = await downloadAndExtract(env.ctx, env.privileged, goArchiveUrl(env, version), env.layout.toolchainsDir);
    if (!result.success) {
      throw new Error(result.error ?? "Go download failed");
    }

    linkBinaries(env, goDir, [
      ["bin/go", "go"],
      ["bin/gofmt", "gofmt"],
    ]);

    if (!fs.exists(goBin)) {
      logger.warn("Go installation may not have completed successfully");
      return { name: "go", state: "failed", version: null, error: `Go binary not found at ${goBin}` };
    }
    return { name: "go", state: current ? "updated" : "installed", version };
  },
};
