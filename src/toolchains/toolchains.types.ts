/**
 * Toolchain types
 */

import type { InstallEnv } from "#/environment";
import type { ToolchainName } from "#/schemas";

export type ToolchainState = "installed" | "updated" | "current" | "failed" | "skipped";

export interface ToolchainResult {
  name: ToolchainName;
  state: ToolchainState;
  version: string | null;
  error?: string;
}

export interface ToolchainOptions {
  /** Reinstall even when the installed version is current */
  force?: boolean;
}

export interface Toolchain {
  name: ToolchainName;
  /** Display name for log messages */
  label: string;
  install(env: InstallEnv, options: ToolchainOptions): Promise<ToolchainResult>;
}
