/**
 * Settings module
 */

export {
  ENV_PREFIX,
  ENV_LOG_LEVEL,
  ENV_JOBS,
  ENV_GITHUB_TOKEN,
  readEnvOverrides,
  findSettingsFile,
  loadSettingsFile,
  loadSettings,
  type SettingsFlags,
  type LoadedSettings,
} from "./settings";
