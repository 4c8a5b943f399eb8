/**
 * Tools module
 *
 * Recipes for the CLI tool catalogue, their builders and the installer.
 */

export type {
  ToolRecipe,
  ToolResult,
  ToolStatus,
  ToolOptions,
  InstallMethod,
  BuildSpec,
  PrebuiltSpec,
  ExtraLink,
} from "./tools.types";

export { TOOL_RECIPES, TOOL_NAMES, getRecipe, fzfShellDir, poshThemesDir } from "./recipes";
export { buildTool, cargoEnv, goPath, findBuiltGem } from "./builders";
export { installPrebuilt, type PrebuiltResult } from "./prebuilt";
export { installTool, resolveTarget, repoDirFor, installedBinaryPath, type BuildTarget } from "./installer";
export { runTools, selectTools, type RunToolsOptions } from "./tools";
