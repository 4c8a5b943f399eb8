/**
 * tools.conf types
 */

import type { VersionType } from "#/schemas";

export interface ToolConfig {
  name: string;
  versionType: VersionType;
  /** Bare fields after the version type, e.g. "config" */
  flags: string[];
  /** Command from `post="..."`, run by the user setup step */
  postCommand?: string;
  /** 1-based line number, absent for defaults */
  line?: number;
}

export interface ToolsConf {
  entries: Map<string, ToolConfig>;
  warnings: string[];
}
