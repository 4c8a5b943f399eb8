/**
 * Platform module
 *
 * Host detection: OS, package manager, admin group, architecture, build jobs.
 */

export type {
  OsType,
  PackageManagerKind,
  CpuArch,
  PlatformInfo,
  PlatformOverrides,
} from "./platform.types";

export {
  parseOsRelease,
  packageManagerForDistro,
  mapCpuArch,
  goArchFor,
  detectAdminGroup,
  detectPlatform,
  buildJobs,
  cargoJobs,
  releaseOsName,
} from "./platform";
