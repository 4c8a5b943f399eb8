/**
 * Zig toolchain: release tarball extracted (one level stripped) to <toolchains>/zig.
 */

import { join } from "path";
import { ZIG_DOWNLOAD_BASE, ZIG_FALLBACK_VERSION, ZIG_INDEX_URL } from "#/constants";
import { downloadAndExtract } from "#/download";
import { toolchainDir, type InstallEnv } from "#/environment";
import type { CpuArch, PlatformInfo } from "#/platform";
import { ZigIndexSchema, ZigTarballEntrySchema } from "#/schemas";
import { sortVersionsDesc } from "#/version";
import { fetchJson, linkBinaries, prepareFreshDir, probeVersion } from "./shared";
import type { Toolchain, ToolchainResult } from "./toolchains.types";

export interface ZigRelease {
  version: string;
  tarball: string;
}

const ZIG_ARCH: Record<CpuArch, string> = {
  x86_64: "x86_64",
  aarch64: "aarch64",
  armv7l: "armv7a",
};

function zigTarget(platform: PlatformInfo): { arch: string; os: string } {
  return { arch: ZIG_ARCH[platform.arch], os: platform.osType === "macos" ? "macos" : "linux" };
}

export function zigFallbackUrl(platform: PlatformInfo, version: string): string {
  const { arch, os } = zigTarget(platform);
  return `${ZIG_DOWNLOAD_BASE}/${version}/zig-${os}-${arch}-${version}.tar.xz`;
}

/**
 * Highest tagged release in the download index ("master" is a nightly and
 * skipped) and its tarball for this platform.
 */
export function selectZigRelease(index: unknown, platform: PlatformInfo): ZigRelease | null {
  const parsed = ZigIndexSchema.safeParse(index);
  if (!parsed.success) return null;

  const versions = Object.keys(parsed.data).filter((key) => key !== "master" && /^\d+\.\d+/.test(key));
  const version = sortVersionsDesc(versions)[0];
  if (!version) return null;

  const { arch, os } = zigTarget(platform);
  const entry = ZigTarballEntrySchema.safeParse(parsed.data[version]?.[`${arch}-${os}`]);
  return {
    version,
    tarball: entry.success ? entry.data.tarball : zigFallbackUrl(platform, version),
  };
}

export const zigToolchain: Toolchain = {
  name: "zig",
  label: "Zig",

  async install(env: InstallEnv, options): Promise<ToolchainResult> {
    const { fs, logger } = env.ctx;
    const zigDir = toolchainDir(env, "zig");
    const zigBin = join(zigDir, "zig");

    logger.info("Processing Zig toolchain...");
    const current = probeVersion(env, zigBin, ["version"]);

    let release = selectZigRelease(await fetchJson(env, ZIG_INDEX_URL), env.platform);
    if (!release) {
      logger.warn(`Could not determine latest Zig version. Using fallback version ${ZIG_FALLBACK_VERSION}`);
      release = { version: ZIG_FALLBACK_VERSION, tarball: zigFallbackUrl(env.platform, ZIG_FALLBACK_VERSION) };
    }
    const { version } = release;

    if (!options.force && fs.isDirectory(zigDir) && current === version) {
      return { name: "zig", state: "current", version };
    }

    logger.info(`Downloading Zig ${version} for ${env.platform.arch}...`);
    prepareFreshDir(env, zigDir);

    const result = await downloadAndExtract(env.ctx, env.privileged, release.tarball, zigDir, { stripComponents: 1 });
    if (!result.success) {
      throw new Error(result.error ?? "Zig download failed");
    }

    linkBinaries(env, zigDir, [["zig", "zig"]]);

    if (!fs.exists(zigBin)) {
      logger.warn("Zig installation may not have completed successfully");
      return { name: "zig", state: "failed", version: null, error: `Zig binary not found at ${zigBin}` };
    }
    return { name: "zig", state: current ? "updated" : "installed", version };
  },
};
