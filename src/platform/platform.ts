/**
 * Platform detection
 *
 * Inspects the host once at startup: OS flavour, package manager, the group
 * that owns the shared prefix, CPU architecture and core count.
 * Pure environment inspection, nothing is written.
 */

import type { EngineContext, FileSystem, SystemProbe } from "#/core";
import { commandExists } from "#/core";
import type {
  CpuArch,
  OsType,
  PackageManagerKind,
  PlatformInfo,
  PlatformOverrides,
} from "./platform.types";

const OS_RELEASE_PATH = "/etc/os-release";
const DEVICE_MODEL_PATH = "/proc/device-tree/model";
const GROUP_FILE = "/etc/group";

const DISTRO_PACKAGE_MANAGERS: Record<string, PackageManagerKind> = {
  debian: "apt",
  ubuntu: "apt",
  raspbian: "apt",
  fedora: "dnf",
  rhel: "dnf",
  centos: "dnf",
  arch: "pacman",
  manjaro: "pacman",
};

const LINUX_MANAGERS_BY_PREFERENCE: PackageManagerKind[] = ["apt", "dnf", "pacman"];

// Preferred owners of the prefix on Linux, first existing group wins
const ADMIN_GROUP_CANDIDATES = ["staff", "sudo", "wheel"];

const HOMEBREW_BIN_DIRS = ["/opt/homebrew/bin", "/usr/local/bin"];

/**
 * Parse /etc/os-release into a key → value map (quotes stripped).
 */
export function parseOsRelease(content: string): Record<string, string> {
  const values: Record<string, string> = {};

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) continue;

    const key = line.slice(0, eq);
    let value = line.slice(eq + 1).trim();
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    values[key] = value;
  }

  return values;
}

/**
 * Map an os-release ID (then ID_LIKE entries) to a package manager.
 */
export function packageManagerForDistro(id: string, idLike: string[] = []): PackageManagerKind | null {
  for (const candidate of [id, ...idLike]) {
    const manager = DISTRO_PACKAGE_MANAGERS[candidate.toLowerCase()];
    if (manager) return manager;
  }
  return null;
}

export function mapCpuArch(nodeArch: string): CpuArch {
  switch (nodeArch) {
    case "x64":
      return "x86_64";
    case "arm64":
      return "aarch64";
    case "arm":
      return "armv7l";
    default:
      throw new Error(`Unsupported architecture: ${nodeArch}`);
  }
}

export function goArchFor(arch: CpuArch): string {
  switch (arch) {
    case "x86_64":
      return "amd64";
    case "aarch64":
      return "arm64";
    case "armv7l":
      return "armv6l";
  }
}

/**
 * First of the candidate groups present in /etc/group, "root" otherwise.
 */
export function detectAdminGroup(fs: FileSystem, system: SystemProbe): string {
  if (system.platform === "darwin") return "staff";
  if (!fs.exists(GROUP_FILE)) return "root";

  const groups = new Set(
    fs.readFile(GROUP_FILE)
      .split("\n")
      .map((line) => line.split(":")[0]?.trim())
      .filter((name): name is string => Boolean(name))
  );

  return ADMIN_GROUP_CANDIDATES.find((group) => groups.has(group)) ?? "root";
}

function isRaspberryPi(fs: FileSystem, distroId: string): boolean {
  if (distroId === "raspbian") return true;
  if (!fs.exists(DEVICE_MODEL_PATH)) return false;
  return fs.readFile(DEVICE_MODEL_PATH).includes("Raspberry Pi");
}

function detectLinux(ctx: EngineContext): { osType: OsType; distroId: string; packageManager: PackageManagerKind } {
  const { fs, system } = ctx;
  const osRelease = fs.exists(OS_RELEASE_PATH) ? parseOsRelease(fs.readFile(OS_RELEASE_PATH)) : null;
  const distroId = osRelease?.ID ?? "unknown";
  const idLike = (osRelease?.ID_LIKE ?? "").split(/\s+/).filter(Boolean);

  let packageManager = packageManagerForDistro(distroId, idLike);
  if (!packageManager) {
    packageManager = LINUX_MANAGERS_BY_PREFERENCE.find((manager) => commandExists(fs, system, manager)) ?? null;
  }

  if (!packageManager) {
    throw new Error(osRelease ? `Unsupported distribution: ${distroId}` : "Cannot determine distribution type");
  }

  return {
    osType: isRaspberryPi(fs, distroId) ? "raspberrypi" : "linux",
    distroId,
    packageManager,
  };
}

/**
 * Detect the host platform.
 * Throws for unsupported operating systems and distributions without a
 * known package manager.
 */
export function detectPlatform(ctx: EngineContext, overrides: PlatformOverrides = {}): PlatformInfo {
  const { fs, system, logger } = ctx;
  const arch = mapCpuArch(system.arch);

  let base: { osType: OsType; distroId: string; packageManager: PackageManagerKind };
  if (system.platform === "darwin") {
    if (!commandExists(fs, system, "brew", HOMEBREW_BIN_DIRS)) {
      logger.warn("Homebrew not found; package installs will fail until it is installed");
    }
    base = { osType: "macos", distroId: "macos", packageManager: "brew" };
  } else if (system.platform === "linux") {
    base = detectLinux(ctx);
  } else {
    throw new Error(`Unsupported platform: ${system.platform}`);
  }

  const info: PlatformInfo = {
    ...base,
    adminGroup: overrides.adminGroup ?? detectAdminGroup(fs, system),
    arch,
    goArch: goArchFor(arch),
    cpuCount: Math.max(1, system.cpuCount),
  };

  logger.debug(
    `Platform: ${info.osType} (${info.distroId}), package manager ${info.packageManager}, ` +
      `arch ${info.arch}, admin group ${info.adminGroup}, ${info.cpuCount} CPUs`
  );
  return info;
}

/**
 * Parallel jobs for make-style builds: one core is left free.
 */
export function buildJobs(platform: PlatformInfo, override?: number): number {
  if (override !== undefined) return Math.max(1, override);
  return Math.max(1, platform.cpuCount - 1);
}

/**
 * Cargo jobs: forced to 1 on Raspberry Pi, where parallel rustc runs out of memory.
 */
export function cargoJobs(platform: PlatformInfo, override?: number): number {
  if (platform.osType === "raspberrypi") return 1;
  return buildJobs(platform, override);
}

/**
 * Operating system name as used in release asset names.
 */
export function releaseOsName(platform: PlatformInfo): "linux" | "darwin" {
  return platform.osType === "macos" ? "darwin" : "linux";
}
