/**
 * Tool runner
 *
 * Installs the selected tools in catalogue order; one tool's failure never
 * stops the next.
 */

import type { InstallEnv } from "#/environment";
import { getToolConfig, type ToolsConf } from "#/tools-conf";
import { installTool } from "./installer";
import { TOOL_RECIPES } from "./recipes";
import type { ToolOptions, ToolResult } from "./tools.types";

export interface RunToolsOptions extends ToolOptions {
  /** Restrict the run to these tools; otherwise settings.tools, otherwise all */
  only?: string[];
}

/**
 * Tools to run in catalogue order. Unknown names are reported and dropped.
 */
export function selectTools(env: InstallEnv, only?: string[]): string[] {
  const requested = only && only.length > 0 ? only : env.settings.tools;
  if (requested.length === 0) {
    return TOOL_RECIPES.map((recipe) => recipe.name);
  }

  for (const name of requested) {
    if (!TOOL_RECIPES.some((recipe) => recipe.name === name)) {
      env.ctx.logger.warn(`Unknown tool: ${name}`);
    }
  }
  return TOOL_RECIPES.filter((recipe) => requested.includes(recipe.name)).map((recipe) => recipe.name);
}

export async function runTools(
  env: InstallEnv,
  toolsConf: ToolsConf,
  options: RunToolsOptions = {}
): Promise<ToolResult[]> {
  const { only, ...toolOptions } = options;
  env.ctx.logger.info("Starting tool installations...");

  const selected = selectTools(env, only);
  const results: ToolResult[] = [];
  for (const recipe of TOOL_RECIPES) {
    if (!selected.includes(recipe.name)) continue;
    results.push(await installTool(env, recipe, getToolConfig(toolsConf, recipe.name), toolOptions));
  }
  return results;
}
