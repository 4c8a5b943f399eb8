/**
 * `install`, `dependencies`, `toolchains` and `tool <name>`.
 */

import type { Argv } from "yargs";
import { TOOLCHAIN_NAMES } from "#/constants";
import { createInstallEnv } from "#/environment";
import { formatToolchainSummary, formatToolSummary } from "#/formatters";
import { dependenciesExitCode, runDependencies, runInstall } from "#/orchestrator";
import { ToolchainNameSchema, type ToolchainName } from "#/schemas";
import { runToolchains } from "#/toolchains";
import { getRecipe, installTool } from "#/tools";
import { getToolConfig, loadToolsConf } from "#/tools-conf";
import { openSession, parseList, printLines, type CliDeps, type CliState, type GlobalArgs } from "../session";

function toolchainNames(only: string[] | undefined): ToolchainName[] | undefined {
  return only?.map((name) => {
    const parsed = ToolchainNameSchema.safeParse(name);
    if (!parsed.success) {
      throw new Error(`Unknown toolchain: ${name} (expected one of ${TOOLCHAIN_NAMES.join(", ")})`);
    }
    return parsed.data;
  });
}

export function registerDependencyCommands<T extends GlobalArgs>(
  parser: Argv<T>,
  deps: CliDeps,
  state: CliState
): Argv<T> {
  const print = (line: string) => deps.io.stdout(`${line}\n`);

  return parser
    .command(
      "install",
      "Check requirements, set up the prefix and install all dependencies",
      (y) =>
        y
          .option("force", { type: "boolean", default: false, describe: "Reinstall even when current" })
          .option("only", { type: "string", describe: "Comma-separated tools to install" })
          .option("skip-toolchains", { type: "boolean", default: false })
          .option("strict", { type: "boolean", default: false, describe: "Exit 1 when anything failed" })
          .option("wrapper", { type: "boolean", default: true, describe: "Install the dependencies wrapper" }),
      async (args) => {
        const { ctx, settings } = openSession(deps, args);
        const report = await runInstall(ctx, {
          settings,
          nodeVersion: deps.nodeVersion,
          selfPath: args.wrapper ? deps.selfPath : undefined,
          force: args.force,
          only: parseList(args.only),
          skipToolchains: args.skipToolchains,
          print,
        });
        state.exitCode = dependenciesExitCode(report, args.strict);
      }
    )
    .command(
      "dependencies",
      "Install or update toolchains and tools",
      (y) =>
        y
          .option("force", { type: "boolean", default: false, describe: "Reinstall even when current" })
          .option("only", { type: "string", describe: "Comma-separated tools to install" })
          .option("skip-toolchains", { type: "boolean", default: false })
          .option("strict", { type: "boolean", default: false, describe: "Exit 1 when anything failed" }),
      async (args) => {
        const { ctx, settings } = openSession(deps, args);
        const env = createInstallEnv(ctx, { settings });
        const report = await runDependencies(env, {
          force: args.force,
          only: parseList(args.only),
          skipToolchains: args.skipToolchains,
          print,
        });
        state.exitCode = dependenciesExitCode(report, args.strict);
      }
    )
    .command(
      "toolchains",
      "Install or update language toolchains only",
      (y) =>
        y
          .option("force", { type: "boolean", default: false, describe: "Reinstall even when current" })
          .option("only", { type: "string", describe: `Comma-separated subset of ${TOOLCHAIN_NAMES.join(", ")}` }),
      async (args) => {
        const { ctx, settings } = openSession(deps, args);
        const names = toolchainNames(parseList(args.only)) ?? settings.toolchains ?? TOOLCHAIN_NAMES;
        const env = createInstallEnv(ctx, { settings });
        const results = await runToolchains(env, names, { force: args.force });
        printLines(deps.io, formatToolchainSummary(results));
        state.exitCode = results.some((result) => result.state === "failed") ? 1 : 0;
      }
    )
    .command(
      "tool <name>",
      "Install or update one tool",
      (y) =>
        y
          .positional("name", { type: "string", demandOption: true })
          .option("force", { type: "boolean", default: false, describe: "Rebuild even when current" }),
      async (args) => {
        const recipe = getRecipe(args.name);
        if (!recipe) {
          throw new Error(`Unknown tool: ${args.name}`);
        }
        const { ctx, settings } = openSession(deps, args);
        const env = createInstallEnv(ctx, { settings });
        const config = getToolConfig(loadToolsConf(ctx, env.layout.toolsConf), recipe.name);
        const result = await installTool(env, recipe, config, { force: args.force });
        printLines(deps.io, formatToolSummary([result]));
        state.exitCode = result.status === "failed" ? 1 : 0;
      }
    );
}
