/**
 * User setup module
 */

export type {
  UserSetupOptions,
  UserSetupReport,
  UserToolResult,
  ConfigRepoStatus,
} from "./user-setup.types";

export {
  runUserSetup,
  linkZshConfig,
  installToolConfig,
  runPostCommand,
  backupSuffix,
  configRepoUrl,
} from "./user-setup";
