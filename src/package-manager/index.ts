/**
 * Package manager module
 */

export type { PackageSet, PackageResult, PackageManagerClient } from "./package-manager.types";
export { createPackageManager, isPackageManagedPath } from "./package-manager";
