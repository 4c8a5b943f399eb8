/**
 * Platform types
 */

export type OsType = "macos" | "linux" | "raspberrypi";

export type PackageManagerKind = "brew" | "apt" | "dnf" | "pacman";

/** Architecture names as `uname -m` prints them. */
export type CpuArch = "x86_64" | "aarch64" | "armv7l";

export interface PlatformInfo {
  osType: OsType;
  /** os-release ID ("debian", "fedora", ...) or "macos" */
  distroId: string;
  packageManager: PackageManagerKind;
  /** Group that owns the shared prefix */
  adminGroup: string;
  arch: CpuArch;
  /** Go's name for the architecture (amd64, arm64, armv6l) */
  goArch: string;
  cpuCount: number;
}

export interface PlatformOverrides {
  adminGroup?: string;
}
