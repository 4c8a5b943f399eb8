/**
 * User setup types
 */

import type { Settings } from "#/schemas";

export interface UserSetupOptions {
  /** Prefix whose tools.conf and bin directory are used */
  prefix: string;
  settings: Settings;
  /** Clock for backup names */
  now?: () => Date;
}

export type ConfigRepoStatus = "cloned" | "not-found" | "failed";

export interface UserToolResult {
  tool: string;
  /** The tool is not on PATH, nothing was done */
  skipped: boolean;
  config?: ConfigRepoStatus;
  /** Outcome of the `post="..."` command, when there is one */
  post?: "ok" | "failed";
}

export interface UserSetupReport {
  /** Dotfiles linked into the home directory */
  links: string[];
  /** Files or directories moved aside, as [original, backup] */
  backups: [string, string][];
  tools: UserToolResult[];
}
