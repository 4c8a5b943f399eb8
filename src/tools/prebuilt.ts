/**
 * Release binaries
 *
 * Installs a tool from its latest GitHub release instead of building it.
 * Failures are returned so the installer can fall back to a source build.
 */

import { join } from "path";
import { errorMessage } from "#/core";
import { downloadToFile, extractArchive } from "#/download";
import type { InstallEnv } from "#/environment";
import { buildLatestAssetUrl, parseRepoUrl } from "#/github";
import { installBinary } from "#/layout";
import { probeVersion } from "#/toolchains";
import { normalizeTag, sameVersion } from "#/version";
import type { ToolOptions, ToolRecipe } from "./tools.types";

export interface PrebuiltResult {
  success: boolean;
  /** The installed binary already matches the latest release */
  current?: boolean;
  version: string | null;
  error?: string;
}

export async function installPrebuilt(
  env: InstallEnv,
  recipe: ToolRecipe,
  options: ToolOptions = {}
): Promise<PrebuiltResult> {
  const { fs, logger } = env.ctx;
  const spec = recipe.prebuilt;
  if (!spec) {
    return { success: false, version: null, error: `${recipe.name} has no release binaries` };
  }

  const assetName = spec.asset(env.platform);
  if (!assetName) {
    return {
      success: false,
      version: null,
      error: `No release binary for ${env.platform.osType} on ${env.platform.arch}`,
    };
  }

  const repo = parseRepoUrl(recipe.repo);
  if (!repo) {
    return { success: false, version: null, error: `Not a GitHub repository: ${recipe.repo}` };
  }

  const release = await env.github.getLatestRelease(repo.owner, repo.repo);
  const version = release ? normalizeTag(release.tag) : null;
  const installed = join(env.layout.bin, recipe.binary);

  if (!options.force && version && sameVersion(probeVersion(env, installed, recipe.versionArgs), version)) {
    return { success: true, current: true, version };
  }

  const url =
    release?.assets.find((asset) => asset.name === assetName)?.url ??
    buildLatestAssetUrl(repo.owner, repo.repo, assetName);
  logger.info(`Downloading ${recipe.name} ${version ?? "latest"} release binary...`);

  const tempDir = fs.makeTempDir(`dotstrap-${recipe.name}-`);
  try {
    const downloaded = join(tempDir, assetName);
    const download = await downloadToFile(env.ctx, url, downloaded);
    if (!download.success) {
      return { success: false, version, error: `Download of ${url} failed: ${download.error}` };
    }

    let source = downloaded;
    if (spec.format === "tar.gz") {
      const extractDir = join(tempDir, "extract");
      const extracted = extractArchive(env.ctx, env.privileged, downloaded, extractDir, {
        format: "tar.gz",
        stripComponents: spec.stripComponents,
      });
      if (!extracted.success) {
        return { success: false, version, error: extracted.error };
      }
      source = join(extractDir, recipe.binary);
    }

    installBinary(env.privileged, source, env.layout.bin, recipe.binary);
    return { success: true, version };
  } catch (err) {
    return { success: false, version, error: errorMessage(err) };
  } finally {
    // Extracted files belong to root after a privileged extraction
    env.privileged.tryRun("rm", ["-rf", tempDir]);
  }
}
