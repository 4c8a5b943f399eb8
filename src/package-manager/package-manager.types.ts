/**
 * Package manager types
 */

import type { PackageManagerKind } from "#/platform";

/** Package names per package manager; a missing key means "not packaged there" */
export type PackageSet = Partial<Record<PackageManagerKind, string[]>>;

export interface PackageResult {
  success: boolean;
  /** True when the operation was not attempted */
  skipped?: boolean;
  error?: string;
}

export interface PackageManagerClient {
  readonly kind: PackageManagerKind;
  /** Refresh the package index. Never throws. */
  update(): PackageResult;
  /** Install packages non-interactively. Never throws. */
  install(packages: string[]): PackageResult;
  /** Remove packages, best effort. Never throws. */
  remove(packages: string[]): PackageResult;
  /** True when `path` lives where this package manager installs binaries */
  isManagedBinary(path: string): boolean;
  /** Names from a PackageSet for this manager */
  packagesFor(set: PackageSet | undefined): string[];
}
