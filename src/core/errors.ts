/**
 * Error raised by a ShellExecutor when a command cannot start or exits non-zero.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly command: string,
    /** Exit status, null when the process never ran or was killed */
    readonly exitCode: number | null
  ) {
    super(message);
    this.name = "CommandError";
  }
}

export function exitCodeOf(err: unknown): number | null {
  return err instanceof CommandError ? err.exitCode : null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
