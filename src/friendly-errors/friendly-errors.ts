/**
 * Friendly Errors
 *
 * Standard utility for parsing YAML + Zod validation with human-readable errors.
 *
 * USAGE: Use this for every user-edited file (settings.yaml) so that a typo
 * yields "Invalid configuration in <file>" plus one line per problem, never a
 * stack trace.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, SettingsSchema, "settings.yaml");
 * if (!result.success) {
 *   logger.error(formatFriendlyError(result.error));
 *   return 1;
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation" | "io";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function firstLine(message: string): string {
  return message.split("\n")[0] ?? message;
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    const detail = err instanceof YAMLParseError
      ? firstLine(err.message)
      : err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Invalid YAML syntax${fileContext}`,
        details: [detail],
      },
    };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration${fileContext}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Render a FriendlyError as a multi-line message (details indented).
 */
export function formatFriendlyError(error: FriendlyError): string {
  const details = error.details ?? [];
  return [error.message, ...details.map((detail) => `  ${detail}`)].join("\n");
}
