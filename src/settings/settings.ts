/**
 * Settings
 *
 * Optional settings.yaml plus environment overrides plus command-line flags.
 * Precedence: flag > environment > file > detected default. Defaults that
 * need the host (prefix, admin group, jobs) are filled in by the caller.
 */

import type { EngineContext } from "#/core";
import { FALLBACK_PREFIX, PREFERRED_PREFIX } from "#/constants";
import { formatZodIssues, safeParseYaml, type ParseResult } from "#/friendly-errors";
import { layoutFor } from "#/layout";
import { SettingsOverridesSchema, SettingsSchema, type Settings, type SettingsOverrides } from "#/schemas";

export const ENV_PREFIX = "DOTSTRAP_PREFIX";
export const ENV_LOG_LEVEL = "DOTSTRAP_LOG_LEVEL";
export const ENV_JOBS = "DOTSTRAP_JOBS";
export const ENV_GITHUB_TOKEN = "GITHUB_TOKEN";

export interface SettingsFlags extends SettingsOverrides {
  /** Explicit settings file (--settings) */
  settingsPath?: string;
}

export interface LoadedSettings {
  settings: Settings;
  /** File the settings came from, null when none was found */
  path: string | null;
}

/**
 * Raw override values from the environment, before validation.
 */
export function readEnvOverrides(env: Record<string, string | undefined>): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  if (env[ENV_PREFIX]) raw.prefix = env[ENV_PREFIX];
  if (env[ENV_LOG_LEVEL]) raw.logLevel = env[ENV_LOG_LEVEL];
  if (env[ENV_JOBS]) raw.jobs = Number(env[ENV_JOBS]);
  if (env[ENV_GITHUB_TOKEN]) raw.githubToken = env[ENV_GITHUB_TOKEN];
  return raw;
}

function parseOverrides(raw: unknown, source: string): ParseResult<SettingsOverrides> {
  const result = SettingsOverridesSchema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration in ${source}`,
        details: formatZodIssues(result.error),
      },
    };
  }
  return { success: true, data: result.data };
}

function compactOverrides(values: SettingsOverrides): SettingsOverrides {
  const out: SettingsOverrides = {};
  if (values.prefix !== undefined) out.prefix = values.prefix;
  if (values.logLevel !== undefined) out.logLevel = values.logLevel;
  if (values.jobs !== undefined) out.jobs = values.jobs;
  if (values.githubToken !== undefined) out.githubToken = values.githubToken;
  return out;
}

/**
 * Locate settings.yaml under the hinted prefix, or under either default prefix.
 */
export function findSettingsFile(ctx: EngineContext, prefixHint?: string): string | null {
  const prefixes = prefixHint ? [prefixHint] : [PREFERRED_PREFIX, FALLBACK_PREFIX];
  for (const prefix of prefixes) {
    const path = layoutFor(prefix).settingsFile;
    if (ctx.fs.exists(path)) return path;
  }
  return null;
}

/**
 * Read and validate a settings file.
 */
export function loadSettingsFile(ctx: EngineContext, path: string): ParseResult<Settings> {
  let content: string;
  try {
    content = ctx.fs.readFile(path);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "io",
        message: `Cannot read ${path}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }
  return safeParseYaml(content, SettingsSchema, path);
}

/**
 * Resolve the effective settings for this run.
 */
export function loadSettings(ctx: EngineContext, flags: SettingsFlags = {}): ParseResult<LoadedSettings> {
  const { settingsPath, ...flagValues } = flags;

  const fromEnv = parseOverrides(readEnvOverrides(ctx.system.env), "environment");
  if (!fromEnv.success) return fromEnv;

  const fromFlags = parseOverrides(compactOverrides(flagValues), "command line options");
  if (!fromFlags.success) return fromFlags;

  if (settingsPath && !ctx.fs.exists(settingsPath)) {
    return { success: false, error: { type: "io", message: `Settings file not found: ${settingsPath}` } };
  }

  const path = settingsPath ?? findSettingsFile(ctx, fromFlags.data.prefix ?? fromEnv.data.prefix);

  let fileSettings: Settings = SettingsSchema.parse(undefined);
  if (path) {
    const parsed = loadSettingsFile(ctx, path);
    if (!parsed.success) return parsed;
    fileSettings = parsed.data;
    ctx.logger.debug(`Loaded settings from ${path}`);
  }

  return {
    success: true,
    data: {
      settings: { ...fileSettings, ...fromEnv.data, ...fromFlags.data },
      path,
    },
  };
}
