/**
 * Install environment module
 */

export type { InstallEnv, InstallEnvOptions } from "./environment.types";
export { createInstallEnv, toolchainDir, buildPath, rustEnv } from "./environment";
