/**
 * CLI adapter: parse the command line, open a session, call the engine.
 *
 * Commands:
 * - install [--force] [--only a,b] [--skip-toolchains] [--strict] [--no-wrapper]
 * - dependencies [--force] [--only a,b] [--skip-toolchains] [--strict]
 * - toolchains [--force] [--only a,b]
 * - tool <name> [--force]
 * - user-setup
 * - detect
 * - config show | config init [--force]
 * - wrapper
 */

import yargs from "yargs";
import { errorMessage } from "#/core";
import { APP_NAME } from "#/constants";
import { registerDependencyCommands } from "./commands/dependencies";
import { registerSetupCommands } from "./commands/setup";
import type { CliDeps, CliState } from "./session";

export async function runCli(opts: { argv: string[] } & CliDeps): Promise<number> {
  const { argv, ...deps } = opts;
  const state: CliState = { exitCode: 0 };

  const base = yargs(argv)
    .scriptName(APP_NAME)
    .option("prefix", { type: "string", describe: "Install prefix (default: /opt/local, else /usr/local)" })
    .option("settings", { type: "string", describe: "Path to settings.yaml" })
    .option("verbose", { type: "boolean", describe: "Debug logging" })
    .option("quiet", { type: "boolean", describe: "Only warnings and errors" })
    .conflicts("verbose", "quiet");

  const parser = registerSetupCommands(registerDependencyCommands(base, deps, state), deps)
    .demandCommand(1, "Specify a command")
    .strict()
    .exitProcess(false)
    .fail((message, err) => {
      throw err ?? new Error(message);
    })
    .help();

  try {
    await parser.parseAsync();
    return state.exitCode;
  } catch (err) {
    deps.io.stderr(`[ERROR] ${errorMessage(err)}\n`);
    return 1;
  }
}
