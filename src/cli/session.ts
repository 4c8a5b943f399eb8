/**
 * Per-invocation state shared by the commands: the engine context, the
 * effective settings and the exit code.
 */

import type { EngineContext, LogLevel } from "#/core";
import { formatFriendlyError } from "#/friendly-errors";
import type { Settings } from "#/schemas";
import { loadSettings } from "#/settings";
import type { IO } from "./io";

export interface GlobalArgs {
  prefix: string | undefined;
  settings: string | undefined;
  verbose: boolean | undefined;
  quiet: boolean | undefined;
}

export interface CliDeps {
  io: IO;
  /** Engine context at the given log level */
  createContext: (level: LogLevel) => EngineContext;
  nodeVersion: string;
  /** Path of the dotstrap executable, for the dependencies wrapper */
  selfPath?: string;
}

export interface Session {
  ctx: EngineContext;
  settings: Settings;
}

export interface CliState {
  exitCode: number;
}

function flagLogLevel(args: GlobalArgs): LogLevel | undefined {
  if (args.verbose === true) return "debug";
  if (args.quiet === true) return "warn";
  return undefined;
}

/**
 * Load settings and build the context. The log level comes from the flags,
 * then DOTSTRAP_LOG_LEVEL, then settings.yaml.
 */
export function openSession(deps: CliDeps, args: GlobalArgs): Session {
  const flagLevel = flagLogLevel(args);
  const initialLevel = flagLevel ?? "info";
  const probe = deps.createContext(initialLevel);

  const loaded = loadSettings(probe, { settingsPath: args.settings, prefix: args.prefix, logLevel: flagLevel });
  if (!loaded.success) {
    throw new Error(formatFriendlyError(loaded.error));
  }

  const { settings } = loaded.data;
  const level = settings.logLevel ?? "info";
  return { ctx: level === initialLevel ? probe : deps.createContext(level), settings };
}

/**
 * `a,b, c` → ["a", "b", "c"]; undefined when the option was not given.
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function printLines(io: IO, lines: string[]): void {
  for (const line of lines) io.stdout(`${line}\n`);
}
