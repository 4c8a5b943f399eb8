/**
 * Orchestrator module
 */

export type {
  DependenciesOptions,
  DependenciesReport,
  InstallOptions,
  OutputSink,
  Requirement,
} from "./orchestrator.types";

export {
  runDependencies,
  runInstall,
  checkRequirements,
  hasFailures,
  dependenciesExitCode,
  MIN_NODE_VERSION,
} from "./orchestrator";

export { installWrapper, wrapperScript, WRAPPER_NAME } from "./wrapper";
