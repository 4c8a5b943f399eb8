/**
 * Core interfaces for dependency injection.
 * Every module reaches the host through these, so the whole provisioning
 * flow can run against in-memory fakes.
 */

export interface FileSystem {
  readFile(path: string): string;
  writeFile(path: string, content: string, mode?: number): void;
  writeFileBinary(path: string, content: Buffer): void;
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  /** True for regular files with any execute bit set (symlinks are followed). */
  isExecutable(path: string): boolean;
  /** True when the path itself is a symlink (not followed). */
  isSymlink(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  readdir(path: string): string[];
  unlink(path: string): void;
  rmdir(path: string, options?: { recursive?: boolean }): void;
  rename(src: string, dest: string): void;
  copyFile(src: string, dest: string): void;
  symlink(target: string, path: string): void;
  /** Create a fresh private directory under the OS temp dir. */
  makeTempDir(prefix: string): string;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export interface ExecOptions {
  cwd?: string;
  /** Merged over the current process environment. */
  env?: Record<string, string>;
  /**
   * "pipe" captures stdout and returns it; "inherit" streams the child's
   * output to the terminal (builds) and returns an empty string.
   */
  stdio?: "pipe" | "inherit";
}

/**
 * Runs an executable with array-based arguments.
 * There is no string form: nothing is interpreted by a shell
 * unless the caller runs `sh -c` explicitly.
 * Throws when the command cannot be started or exits non-zero.
 */
export interface ShellExecutor {
  execFile(command: string, args: string[], options?: ExecOptions): string;
}

/**
 * Facts about the running host that are not files.
 */
export interface SystemProbe {
  platform: NodeJS.Platform;
  /** Node-style architecture (x64, arm64, arm). */
  arch: string;
  cpuCount: number;
  /** Effective uid, or -1 where the platform has none. */
  uid: number;
  homeDir: string;
  env: Record<string, string | undefined>;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  shell: ShellExecutor;
  system: SystemProbe;
  logger: Logger;
}
