/**
 * Console logger.
 *
 * Writes `[LEVEL] message` lines to stderr so that stdout stays free for
 * summaries and command output that users may pipe.
 */

import type { Logger, LogLevel } from "./interfaces";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Create a logger that drops messages below `level`.
 * `success` is reported at info level with an `[OK]` tag.
 */
export function createLogger(level: LogLevel = "info", sink: LogSink = stderrSink): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (messageLevel: Exclude<LogLevel, "silent">, tag: string, message: string) => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    sink(`[${tag}] ${message}`);
  };

  return {
    debug: (message) => emit("debug", "DEBUG", message),
    info: (message) => emit("info", "INFO", message),
    warn: (message) => emit("warn", "WARN", message),
    error: (message) => emit("error", "ERROR", message),
    success: (message) => emit("info", "OK", message),
  };
}
