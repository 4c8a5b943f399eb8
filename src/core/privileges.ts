/**
 * Privileged command execution.
 *
 * The shared prefix is owned by root, so directory setup, installs and
 * cache-repository work go through sudo unless we already are root.
 * The mode is decided once per run:
 * - root: uid 0, commands run as-is
 * - sudo: `sudo -n true` succeeded, commands run through `sudo -n`
 * - unprivileged: no usable sudo, commands run as-is and may fail;
 *   callers turn those failures into warnings
 */

import type { ExecOptions, ShellExecutor, SystemProbe } from "./interfaces";

export type PrivilegeMode = "root" | "sudo" | "unprivileged";

export interface PrivilegedShell {
  readonly mode: PrivilegeMode;
  /** Run with elevated rights where available. Throws like ShellExecutor. */
  run(command: string, args: string[], options?: ExecOptions): string;
  /** Like run, but reports failure as `false` instead of throwing. */
  tryRun(command: string, args: string[], options?: ExecOptions): boolean;
}

export function detectPrivilegeMode(shell: ShellExecutor, system: SystemProbe): PrivilegeMode {
  if (system.uid === 0) return "root";

  try {
    shell.execFile("sudo", ["-n", "true"]);
    return "sudo";
  } catch {
    return "unprivileged";
  }
}

/**
 * Wrap a command in `env K=V ... command args`.
 * sudo resets the environment, so build variables have to travel on the
 * command line.
 */
export function withEnv(
  env: Record<string, string>,
  command: string,
  args: string[]
): { command: string; args: string[] } {
  const assignments = Object.entries(env).map(([key, value]) => `${key}=${value}`);
  if (assignments.length === 0) {
    return { command, args };
  }
  return { command: "env", args: [...assignments, command, ...args] };
}

export function createPrivilegedShell(shell: ShellExecutor, mode: PrivilegeMode): PrivilegedShell {
  const run = (command: string, args: string[], options: ExecOptions = {}): string => {
    if (mode !== "sudo") {
      return shell.execFile(command, args, options);
    }

    const { env, ...rest } = options;
    const wrapped = env ? withEnv(env, command, args) : { command, args };
    return shell.execFile("sudo", ["-n", wrapped.command, ...wrapped.args], rest);
  };

  return {
    mode,
    run,
    tryRun(command, args, options) {
      try {
        run(command, args, options);
        return true;
      } catch {
        return false;
      }
    },
  };
}
