/**
 * tools.conf module
 */

export type { ToolConfig, ToolsConf } from "./tools-conf.types";

export {
  splitFields,
  parseToolsConf,
  getToolConfig,
  hasFlag,
  formatToolConfig,
  serializeToolsConf,
  defaultToolsConf,
  loadToolsConf,
} from "./tools-conf";
