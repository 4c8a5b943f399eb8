/**
 * Perl built from the CPAN source tarball into <toolchains>/perl.
 */

import { join } from "path";
import { commandExists } from "#/core";
import { PERL_DOWNLOAD_PAGE, PERL_FALLBACK_VERSION, PERL_SOURCE_BASE } from "#/constants";
import { downloadToFile, extractArchive } from "#/download";
import { buildPath, toolchainDir, type InstallEnv } from "#/environment";
import { fetchText, linkBinaries, prepareFreshDir, probeVersion } from "./shared";
import type { Toolchain, ToolchainResult } from "./toolchains.types";

const BUILD_PREREQUISITES = ["make", "gcc"];

/**
 * First `perl-X.Y.Z.tar.gz` link on the perl.org download page.
 */
export function parsePerlVersion(page: string): string | null {
  return page.match(/perl-(\d+\.\d+\.\d+)\.tar\.gz/)?.[1] ?? null;
}

function ensurePrerequisites(env: InstallEnv): void {
  const { fs, system, logger } = env.ctx;
  for (const command of BUILD_PREREQUISITES) {
    if (commandExists(fs, system, command)) continue;

    logger.info(`Installing ${command} for Perl build...`);
    const result = env.packages.install([command]);
    if (!result.success) {
      throw new Error(`Cannot install ${command}: ${result.error}`);
    }
  }
}

async function buildPerl(env: InstallEnv, version: string, perlDir: string): Promise<void> {
  const { fs, logger } = env.ctx;
  const tempDir = fs.makeTempDir("dotstrap-perl-");

  try {
    const archive = join(tempDir, "perl.tar.gz");
    const download = await downloadToFile(env.ctx, `${PERL_SOURCE_BASE}/perl-${version}.tar.gz`, archive);
    if (!download.success) {
      throw new Error(`Perl download failed: ${download.error}`);
    }

    const extracted = extractArchive(env.ctx, env.privileged, archive, tempDir);
    if (!extracted.success) {
      throw new Error(`Failed to extract Perl archive: ${extracted.error}`);
    }

    const sourceDir = join(tempDir, `perl-${version}`);
    prepareFreshDir(env, perlDir);

    const options = { cwd: sourceDir, env: { PATH: buildPath(env) } };
    logger.info("Configuring Perl build...");
    env.privileged.run("./Configure", ["-des", `-Dprefix=${perlDir}`], options);
    logger.info("Building Perl...");
    env.privileged.run("make", [`-j${env.jobs}`], options);
    logger.info("Installing Perl...");
    env.privileged.run("make", ["install"], options);
  } finally {
    // Build files are root-owned after a privileged build
    env.privileged.tryRun("rm", ["-rf", tempDir]);
  }
}

export const perlToolchain: Toolchain = {
  name: "perl",
  label: "Perl",

  async install(env, options): Promise<ToolchainResult> {
    const { fs, logger } = env.ctx;
    const perlDir = toolchainDir(env, "perl");
    const perlBin = join(perlDir, "bin", "perl");

    logger.info("Processing Perl toolchain...");
    ensurePrerequisites(env);

    const current = probeVersion(env, perlBin, ["-v"]);
    const page = await fetchText(env, PERL_DOWNLOAD_PAGE);
    let version = page ? parsePerlVersion(page) : null;
    if (!version) {
      logger.warn(`Could not determine latest Perl version. Using fallback version ${PERL_FALLBACK_VERSION}`);
      version = PERL_FALLBACK_VERSION;
    }

    if (!options.force && fs.isDirectory(perlDir) && current === version) {
      return { name: "perl", state: "current", version };
    }

    logger.info(`Downloading Perl ${version}...`);
    await buildPerl(env, version, perlDir);

    linkBinaries(env, perlDir, [
      ["bin/perl", "perl"],
      ["bin/cpan", "cpan"],
    ]);

    if (!fs.exists(perlBin)) {
      logger.warn("Perl installation may not have completed successfully");
      return { name: "perl", state: "failed", version: null, error: `Perl binary not found at ${perlBin}` };
    }
    return { name: "perl", state: current ? "updated" : "installed", version };
  },
};
