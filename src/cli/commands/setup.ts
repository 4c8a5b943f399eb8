/**
 * `user-setup`, `detect`, `config show|init` and `wrapper`.
 */

import type { Argv } from "yargs";
import { detectPrivilegeMode } from "#/core";
import { CONFIG_FILE_MODE } from "#/constants";
import { createInstallEnv } from "#/environment";
import { ensureDir, findExistingPrefix, layoutFor, writeManagedFile } from "#/layout";
import { installWrapper } from "#/orchestrator";
import { detectPlatform } from "#/platform";
import { TOOL_NAMES } from "#/tools";
import { defaultToolsConf, formatToolConfig, getToolConfig, loadToolsConf } from "#/tools-conf";
import { runUserSetup } from "#/user-setup";
import { openSession, printLines, type CliDeps, type GlobalArgs, type Session } from "../session";

function describeHost({ ctx, settings }: Session): string[] {
  const platform = detectPlatform(ctx, { adminGroup: settings.adminGroup });
  const rows: [string, string][] = [
    ["Platform", `${platform.osType} (${platform.distroId})`],
    ["Package manager", platform.packageManager],
    ["Architecture", platform.arch],
    ["Admin group", platform.adminGroup],
    ["CPUs", String(platform.cpuCount)],
    ["Privileges", detectPrivilegeMode(ctx.shell, ctx.system)],
    ["Prefix", findExistingPrefix(ctx, settings.prefix)],
  ];
  return rows.map(([label, value]) => `${`${label}:`.padEnd(17)}${value}`);
}

function showToolsConf({ ctx, settings }: Session): string[] {
  const path = layoutFor(findExistingPrefix(ctx, settings.prefix)).toolsConf;
  const header = ctx.fs.exists(path) ? `# ${path}` : `# ${path} (not found, defaults shown)`;
  const conf = loadToolsConf(ctx, path);
  return [header, ...TOOL_NAMES.map((name) => formatToolConfig(getToolConfig(conf, name)))];
}

export function registerSetupCommands<T extends GlobalArgs>(parser: Argv<T>, deps: CliDeps): Argv<T> {
  return parser
    .command(
      "user-setup",
      "Link shell dotfiles and set up per-user tool configuration (run without sudo)",
      (y) => y,
      async (args) => {
        const session = openSession(deps, args);
        runUserSetup(session.ctx, {
          prefix: findExistingPrefix(session.ctx, session.settings.prefix),
          settings: session.settings,
        });
      }
    )
    .command(
      "detect",
      "Print what dotstrap detects about this host",
      (y) => y,
      async (args) => {
        printLines(deps.io, describeHost(openSession(deps, args)));
      }
    )
    .command(
      "config <action>",
      "Show the effective tools.conf or write the default one",
      (y) =>
        y
          .positional("action", { type: "string", choices: ["show", "init"] as const, demandOption: true })
          .option("force", { type: "boolean", default: false, describe: "Overwrite an existing tools.conf" }),
      async (args) => {
        const session = openSession(deps, args);
        if (args.action === "show") {
          printLines(deps.io, showToolsConf(session));
          return;
        }

        const env = createInstallEnv(session.ctx, { settings: session.settings });
        const path = env.layout.toolsConf;
        if (session.ctx.fs.exists(path) && !args.force) {
          throw new Error(`${path} already exists (use --force to overwrite)`);
        }
        const group = env.platform.adminGroup;
        if (!ensureDir(env.ctx, env.privileged, env.layout.configDir, { group })) {
          throw new Error(`Cannot create ${env.layout.configDir}`);
        }
        writeManagedFile(env.ctx, env.privileged, path, defaultToolsConf([...TOOL_NAMES]), {
          mode: CONFIG_FILE_MODE,
          group,
        });
        deps.io.stdout(`Wrote ${path}\n`);
      }
    )
    .command(
      "wrapper",
      "Install the `dependencies` wrapper script into the prefix",
      (y) => y,
      async (args) => {
        if (!deps.selfPath) {
          throw new Error("Cannot determine the dotstrap executable path");
        }
        const session = openSession(deps, args);
        const env = createInstallEnv(session.ctx, { settings: session.settings });
        deps.io.stdout(`Installed ${installWrapper(env, deps.selfPath)}\n`);
      }
    );
}
