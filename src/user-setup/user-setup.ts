/**
 * Per-user post-install
 *
 * Runs as the invoking user, never through sudo: links the zsh dotfiles,
 * clones per-tool configuration repositories and runs the `post="..."`
 * commands from tools.conf.
 */

import { join } from "path";
import { createPrivilegedShell, errorMessage, which, type EngineContext } from "#/core";
import { createGitClient, type GitClient } from "#/git";
import { layoutFor } from "#/layout";
import { getRecipe } from "#/tools";
import { hasFlag, loadToolsConf, type ToolConfig } from "#/tools-conf";
import type { ConfigRepoStatus, UserSetupOptions, UserSetupReport, UserToolResult } from "./user-setup.types";

const CONFIG_FLAG = "config";

// [link in $HOME, file in ~/.config/zsh]
const ZSH_LINKS: [string, string][] = [
  [".zshenv", "zshenv"],
  [".zshrc", "zshrc"],
];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `.backup.<YYYYmmddHHMMSS>` in local time.
 */
export function backupSuffix(date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `.backup.${stamp}`;
}

export function configRepoUrl(template: string, tool: string): string {
  return template.replaceAll("{tool}", tool);
}

/**
 * Point ~/.zshenv and ~/.zshrc at ~/.config/zsh. Regular files are moved to a
 * backup first; existing links are replaced.
 */
export function linkZshConfig(ctx: EngineContext, now: Date, report: UserSetupReport): void {
  const { fs, system, logger } = ctx;
  logger.info("Setting up ZSH configuration symlinks...");

  for (const [name, source] of ZSH_LINKS) {
    const link = join(system.homeDir, name);
    const target = join(system.homeDir, ".config", "zsh", source);

    if (fs.isSymlink(link)) {
      fs.unlink(link);
    } else if (fs.exists(link)) {
      const backup = `${link}${backupSuffix(now)}`;
      fs.rename(link, backup);
      report.backups.push([link, backup]);
      logger.info(`Backed up existing ${link}`);
    }

    fs.symlink(target, link);
    report.links.push(link);
  }
}

/**
 * Clone `<template with tool>` into ~/.config/<tool>, moving an existing
 * directory aside.
 */
export function installToolConfig(
  ctx: EngineContext,
  git: GitClient,
  tool: string,
  template: string,
  now: Date,
  report: UserSetupReport
): ConfigRepoStatus {
  const { fs, system, logger } = ctx;
  const url = configRepoUrl(template, tool);
  const configDir = join(system.homeDir, ".config", tool);

  logger.info(`Checking configuration for ${tool}...`);
  if (!git.remoteExists(url)) {
    logger.info(`No configuration found for ${tool}`);
    return "not-found";
  }

  if (fs.exists(configDir)) {
    logger.info(`Configuration already exists for ${tool}, creating backup...`);
    const backup = `${configDir}${backupSuffix(now)}`;
    fs.rename(configDir, backup);
    report.backups.push([configDir, backup]);
  }

  try {
    git.clone(url, configDir);
  } catch (err) {
    logger.warn(`Failed to clone configuration for ${tool}: ${errorMessage(err)}`);
    return "failed";
  }

  logger.info(`Configuration installed for ${tool}`);
  return "cloned";
}

export function runPostCommand(ctx: EngineContext, tool: string, command: string): "ok" | "failed" {
  ctx.logger.info(`Executing post-installation command for ${tool}...`);
  try {
    ctx.shell.execFile("sh", ["-c", command], { stdio: "inherit" });
    return "ok";
  } catch (err) {
    ctx.logger.warn(`Post-installation command for ${tool} failed: ${errorMessage(err)}`);
    return "failed";
  }
}

function processTool(
  ctx: EngineContext,
  git: GitClient,
  config: ToolConfig,
  options: UserSetupOptions,
  now: Date,
  report: UserSetupReport
): UserToolResult {
  const { fs, system, logger } = ctx;
  const tool = config.name;
  const binary = getRecipe(tool)?.binary ?? tool;

  logger.debug(`Processing user setup for ${tool}...`);
  if (!which(fs, system, binary, [layoutFor(options.prefix).bin])) {
    logger.info(`${tool} is not installed, skipping user setup`);
    return { tool, skipped: true };
  }

  const result: UserToolResult = { tool, skipped: false };

  if (hasFlag(config, CONFIG_FLAG)) {
    const template = options.settings.configRepoTemplate;
    if (template) {
      result.config = installToolConfig(ctx, git, tool, template, now, report);
    } else {
      logger.warn(`${tool} asks for a configuration repository but configRepoTemplate is not set`);
    }
  }

  if (config.postCommand) {
    result.post = runPostCommand(ctx, tool, config.postCommand);
  }
  return result;
}

export function runUserSetup(ctx: EngineContext, options: UserSetupOptions): UserSetupReport {
  const { fs, system, logger } = ctx;
  if (system.uid === 0) {
    throw new Error("This step should not be run as root or with sudo");
  }

  const now = (options.now ?? (() => new Date()))();
  const report: UserSetupReport = { links: [], backups: [], tools: [] };
  logger.info("Starting user-specific post-installation setup...");

  linkZshConfig(ctx, now, report);

  const toolsConfPath = layoutFor(options.prefix).toolsConf;
  if (!fs.exists(toolsConfPath)) {
    logger.warn(`Configuration file not found: ${toolsConfPath}`);
  } else {
    // Config repositories are the user's own, so git runs without sudo
    const git = createGitClient(fs, createPrivilegedShell(ctx.shell, "unprivileged"), logger);
    for (const config of loadToolsConf(ctx, toolsConfPath).entries.values()) {
      report.tools.push(processTool(ctx, git, config, options, now, report));
    }
  }

  logger.success("User-specific post-installation setup complete");
  return report;
}
