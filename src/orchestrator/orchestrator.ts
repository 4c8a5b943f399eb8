/**
 * Orchestrator
 *
 * `install`: requirements, prefix bootstrap, then the dependency run.
 * `dependencies`: layout, package index, toolchains, tools, summaries.
 * Toolchain and tool failures are recorded in the report; only a broken
 * bootstrap throws.
 */

import { commandExists, errorMessage, type EngineContext } from "#/core";
import { TOOLCHAIN_NAMES } from "#/constants";
import { createInstallEnv, type InstallEnv } from "#/environment";
import { formatToolchainSummary, formatToolSummary } from "#/formatters";
import { ensureLayout } from "#/layout";
import { runToolchains } from "#/toolchains";
import { loadToolsConf } from "#/tools-conf";
import { runTools } from "#/tools";
import { compareVersions } from "#/version";
import type {
  DependenciesOptions,
  DependenciesReport,
  InstallOptions,
  OutputSink,
  Requirement,
} from "./orchestrator.types";
import { installWrapper } from "./wrapper";

export const MIN_NODE_VERSION = "20.0.0";
const REQUIRED_COMMANDS = ["git", "tar"];

export function hasFailures(report: DependenciesReport): boolean {
  return (
    report.toolchains.some((result) => result.state === "failed") ||
    report.tools.some((result) => result.status === "failed")
  );
}

/**
 * 0 unless `strict` and a toolchain or tool failed.
 */
export function dependenciesExitCode(report: DependenciesReport, strict = false): number {
  return strict && hasFailures(report) ? 1 : 0;
}

export function checkRequirements(ctx: EngineContext, nodeVersion: string): Requirement[] {
  const { fs, system } = ctx;
  const commands: Requirement[] = REQUIRED_COMMANDS.map((name) => ({
    name,
    satisfied: commandExists(fs, system, name),
  }));

  const nodeOk = compareVersions(nodeVersion, MIN_NODE_VERSION) >= 0;
  return [
    ...commands,
    {
      name: "node",
      satisfied: nodeOk,
      detail: nodeOk ? undefined : `Node.js ${nodeVersion} found, ${MIN_NODE_VERSION} or newer required`,
    },
  ];
}

function printLines(print: OutputSink, lines: string[]): void {
  for (const line of lines) print(line);
}

export async function runDependencies(
  env: InstallEnv,
  options: DependenciesOptions = {}
): Promise<DependenciesReport> {
  const { ctx, layout, platform, settings } = env;
  const print = options.print ?? ((line: string) => ctx.logger.info(line));

  ctx.logger.info(`Installing dependencies into ${layout.prefix}`);
  const layoutFailures = ensureLayout(ctx, env.privileged, layout, platform.adminGroup);
  const packageIndex = env.packages.update();

  const toolchains = options.skipToolchains
    ? []
    : await runToolchains(env, settings.toolchains ?? TOOLCHAIN_NAMES, { force: options.force });

  const toolsConf = loadToolsConf(ctx, layout.toolsConf);
  const tools = await runTools(env, toolsConf, { force: options.force, only: options.only });

  if (!options.skipToolchains) {
    printLines(print, formatToolchainSummary(toolchains));
  }
  printLines(print, formatToolSummary(tools));

  const report: DependenciesReport = { layoutFailures, packageIndex, toolchains, tools };
  if (hasFailures(report)) {
    ctx.logger.warn("Some installations failed; see the summary above");
  } else {
    ctx.logger.success("Dependencies installed");
  }
  return report;
}

/**
 * Full bootstrap. Throws when requirements are missing or the prefix cannot
 * be set up.
 */
export async function runInstall(ctx: EngineContext, options: InstallOptions): Promise<DependenciesReport> {
  const { settings, nodeVersion, privilegeMode, selfPath, ...dependencyOptions } = options;

  const missing = checkRequirements(ctx, nodeVersion).filter((requirement) => !requirement.satisfied);
  for (const requirement of missing) {
    ctx.logger.error(requirement.detail ?? `${requirement.name} is required but not installed`);
  }
  if (missing.length > 0) {
    throw new Error(`Missing requirements: ${missing.map((requirement) => requirement.name).join(", ")}`);
  }

  let env: InstallEnv;
  try {
    env = createInstallEnv(ctx, { settings, privilegeMode });
  } catch (err) {
    throw new Error(`Dependencies installation failed: ${errorMessage(err)}`);
  }

  if (selfPath) {
    try {
      installWrapper(env, selfPath);
    } catch (err) {
      ctx.logger.warn(errorMessage(err));
    }
  }

  return runDependencies(env, dependencyOptions);
}
