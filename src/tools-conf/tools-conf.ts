/**
 * tools.conf parsing and writing
 *
 * One tool per line:
 *
 *   # comment
 *   bat=stable
 *   neovim=head, config
 *   delta=stable, post="git config --global core.pager delta"
 *
 * The first field of the value is the version type; `post="..."` carries a
 * command; anything else is a flag. Problems never abort parsing: the line is
 * skipped or defaulted and a warning is collected.
 */

import type { EngineContext } from "#/core";
import { DEFAULT_VERSION_TYPE, TOOL_NAME_REGEX } from "#/constants";
import { VersionTypeSchema } from "#/schemas";
import type { ToolConfig, ToolsConf } from "./tools-conf.types";

const POST_FIELD = "post=";

/**
 * Split on commas that are not inside double quotes.
 */
export function splitFields(value: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === "\\" && inQuotes && i + 1 < value.length) {
      current += char + value[i + 1];
      i++;
      continue;
    }
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === "," && !inQuotes) {
      fields.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  fields.push(current.trim());

  return fields;
}

function parsePostValue(raw: string): string {
  const value = raw.trim();
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return value;
}

function quotePostValue(command: string): string {
  return `"${command.replace(/(["\\])/g, "\\$1")}"`;
}

export function parseToolsConf(content: string): ToolsConf {
  const entries = new Map<string, ToolConfig>();
  const warnings: string[] = [];

  content.split("\n").forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) return;

    const eq = line.indexOf("=");
    if (eq === -1) {
      warnings.push(`Line ${lineNumber}: expected <tool>=<version type>, ignoring "${line}"`);
      return;
    }

    const name = line.slice(0, eq).trim();
    if (!TOOL_NAME_REGEX.test(name)) {
      warnings.push(`Line ${lineNumber}: invalid tool name "${name}", ignoring`);
      return;
    }

    if (entries.has(name)) {
      warnings.push(`Line ${lineNumber}: duplicate entry for ${name}, keeping the first one`);
      return;
    }

    const [first = "", ...rest] = splitFields(line.slice(eq + 1));
    const rawType = first.replace(/\s+/g, "").toLowerCase();
    const parsedType = VersionTypeSchema.safeParse(rawType);

    const versionType = parsedType.success ? parsedType.data : DEFAULT_VERSION_TYPE;
    if (!parsedType.success) {
      warnings.push(
        rawType
          ? `Line ${lineNumber}: unknown version type "${rawType}" for ${name}, using ${DEFAULT_VERSION_TYPE}`
          : `Line ${lineNumber}: missing version type for ${name}, using ${DEFAULT_VERSION_TYPE}`
      );
    }

    const config: ToolConfig = { name, versionType, flags: [], line: lineNumber };
    for (const field of rest) {
      if (!field) continue;
      if (field.startsWith(POST_FIELD)) {
        config.postCommand = parsePostValue(field.slice(POST_FIELD.length));
      } else {
        config.flags.push(field);
      }
    }

    entries.set(name, config);
  });

  return { entries, warnings };
}

/**
 * The configured entry, or stable with no flags when the tool is not listed.
 */
export function getToolConfig(conf: ToolsConf, name: string): ToolConfig {
  return conf.entries.get(name) ?? { name, versionType: DEFAULT_VERSION_TYPE, flags: [] };
}

export function hasFlag(config: ToolConfig, flag: string): boolean {
  return config.flags.includes(flag);
}

export function formatToolConfig(config: ToolConfig): string {
  const fields: string[] = [config.versionType, ...config.flags];
  if (config.postCommand !== undefined) {
    fields.push(`${POST_FIELD}${quotePostValue(config.postCommand)}`);
  }
  return `${config.name}=${fields.join(", ")}`;
}

export function serializeToolsConf(entries: Iterable<ToolConfig>): string {
  return [...entries].map((entry) => `${formatToolConfig(entry)}\n`).join("");
}

/**
 * Template written by `dotstrap config init`: every tool on stable.
 */
export function defaultToolsConf(toolNames: string[]): string {
  const header = [
    "# dotstrap tools configuration",
    "#",
    "# <tool>=<stable|head|managed|none>[, config][, post=\"command\"]",
    "#   stable   latest release tag, built from source",
    "#   head     latest commit on the default branch",
    "#   managed  installed through the system package manager",
    "#   none     not installed",
    "",
  ].join("\n");

  const body = serializeToolsConf(
    toolNames.map((name) => ({ name, versionType: DEFAULT_VERSION_TYPE, flags: [] }))
  );
  return `${header}\n${body}`;
}

/**
 * Read tools.conf if present. A missing file is the same as an empty one.
 */
export function loadToolsConf(ctx: EngineContext, path: string): ToolsConf {
  if (!ctx.fs.exists(path)) {
    ctx.logger.debug(`${path} not found, all tools default to ${DEFAULT_VERSION_TYPE}`);
    return { entries: new Map(), warnings: [] };
  }

  const conf = parseToolsConf(ctx.fs.readFile(path));
  for (const warning of conf.warnings) {
    ctx.logger.warn(`${path}: ${warning}`);
  }
  return conf;
}
