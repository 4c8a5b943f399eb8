/**
 * Orchestrator types
 */

import type { PrivilegeMode } from "#/core";
import type { PackageResult } from "#/package-manager";
import type { Settings } from "#/schemas";
import type { ToolchainResult } from "#/toolchains";
import type { ToolResult } from "#/tools";

export type OutputSink = (line: string) => void;

export interface DependenciesOptions {
  /** Reinstall toolchains and rebuild tools even when current */
  force?: boolean;
  /** Restrict the tool run */
  only?: string[];
  skipToolchains?: boolean;
  /** Where summary tables go; the logger when absent */
  print?: OutputSink;
}

export interface DependenciesReport {
  /** Prefix directories that could not be set up */
  layoutFailures: string[];
  packageIndex: PackageResult;
  toolchains: ToolchainResult[];
  tools: ToolResult[];
}

export interface InstallOptions extends DependenciesOptions {
  settings: Settings;
  /** Version of the running Node.js */
  nodeVersion: string;
  privilegeMode?: PrivilegeMode;
  /** Executable the `dependencies` wrapper should exec; no wrapper when absent */
  selfPath?: string;
}

export interface Requirement {
  name: string;
  satisfied: boolean;
  detail?: string;
}
