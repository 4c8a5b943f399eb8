/**
 * Python via Miniconda, installed in batch mode to <toolchains>/conda.
 */

import { join } from "path";
import { errorMessage } from "#/core";
import { MINICONDA_BASE } from "#/constants";
import { downloadToFile, fileNameFromUrl } from "#/download";
import { toolchainDir, type InstallEnv } from "#/environment";
import type { PlatformInfo } from "#/platform";
import { linkBinaries, prepareFreshDir, probeVersion } from "./shared";
import type { Toolchain, ToolchainResult } from "./toolchains.types";

export function minicondaInstallerUrl(platform: PlatformInfo): string {
  if (platform.arch === "armv7l") {
    throw new Error("Miniconda does not support 32-bit ARM");
  }
  if (platform.osType === "macos") {
    const arch = platform.arch === "aarch64" ? "arm64" : "x86_64";
    return `${MINICONDA_BASE}/Miniconda3-latest-MacOSX-${arch}.sh`;
  }
  return `${MINICONDA_BASE}/Miniconda3-latest-Linux-${platform.arch}.sh`;
}

async function installFresh(env: InstallEnv, condaDir: string): Promise<void> {
  const { fs, logger } = env.ctx;
  const url = minicondaInstallerUrl(env.platform);

  if (fs.exists(condaDir)) {
    logger.info("Conda directory exists but binary not found. Removing directory...");
  }
  prepareFreshDir(env, condaDir);

  const tempDir = fs.makeTempDir("dotstrap-conda-");
  try {
    const installer = join(tempDir, fileNameFromUrl(url));
    const download = await downloadToFile(env.ctx, url, installer);
    if (!download.success) {
      throw new Error(`Miniconda download failed: ${download.error}`);
    }
    // -u lets the installer reuse the (empty) directory created above
    env.privileged.run("bash", [installer, "-b", "-u", "-p", condaDir]);
  } finally {
    fs.rmdir(tempDir, { recursive: true });
  }
}

export const condaToolchain: Toolchain = {
  name: "conda",
  label: "Miniconda",

  async install(env, options): Promise<ToolchainResult> {
    const { fs, logger } = env.ctx;
    const condaDir = toolchainDir(env, "conda");
    const condaBin = join(condaDir, "bin", "conda");

    logger.info("Processing Miniconda installation...");

    if (options.force || !fs.exists(condaBin)) {
      await installFresh(env, condaDir);
      linkBinaries(env, condaDir, [
        ["bin/conda", "conda"],
        ["bin/python", "python3"],
      ]);

      if (!fs.exists(condaBin)) {
        throw new Error(`Miniconda installation failed. Binary not found at ${condaBin}`);
      }
      return { name: "conda", state: "installed", version: probeVersion(env, condaBin, ["--version"]) };
    }

    logger.info("Updating existing Miniconda installation...");
    const before = probeVersion(env, condaBin, ["--version"]);
    try {
      env.privileged.run(condaBin, ["update", "-n", "base", "-c", "defaults", "conda", "-y", "-q"]);
    } catch (err) {
      logger.warn(`Miniconda update failed: ${errorMessage(err)}`);
      return { name: "conda", state: "failed", version: before, error: errorMessage(err) };
    }

    const after = probeVersion(env, condaBin, ["--version"]);
    return { name: "conda", state: before !== null && before === after ? "current" : "updated", version: after };
  },
};
