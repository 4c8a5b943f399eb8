/**
 * Node.js implementations of the engine interfaces.
 * This is the only module that talks to the real host.
 */

import {
  accessSync,
  constants,
  copyFileSync,
  existsSync,
  lstatSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  symlinkSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { execFileSync } from "child_process";
import { cpus, homedir, tmpdir } from "os";
import { join } from "path";
import { CommandError } from "./errors";
import { createLogger } from "./logger";
import type {
  EngineContext,
  ExecOptions,
  FileSystem,
  HttpClient,
  LogLevel,
  ShellExecutor,
  SystemProbe,
} from "./interfaces";

const MAX_CAPTURED_OUTPUT = 64 * 1024 * 1024;

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    writeFile: (path, content, mode) => writeFileSync(path, content, mode === undefined ? undefined : { mode }),
    writeFileBinary: (path, content) => writeFileSync(path, content),
    exists: (path) => existsSync(path),

    isDirectory(path) {
      try {
        return statSync(path).isDirectory();
      } catch {
        return false;
      }
    },

    isExecutable(path) {
      try {
        if (!statSync(path).isFile()) return false;
        accessSync(path, constants.X_OK);
        return true;
      } catch {
        return false;
      }
    },

    isSymlink(path) {
      try {
        return lstatSync(path).isSymbolicLink();
      } catch {
        return false;
      }
    },

    mkdir: (path, options) => {
      mkdirSync(path, { recursive: options?.recursive ?? false });
    },
    readdir: (path) => readdirSync(path),
    unlink: (path) => unlinkSync(path),
    rmdir: (path, options) => rmSync(path, { recursive: options?.recursive ?? false, force: true }),
    rename: (src, dest) => renameSync(src, dest),
    copyFile: (src, dest) => copyFileSync(src, dest),
    symlink: (target, path) => symlinkSync(target, path),
    makeTempDir: (prefix) => mkdtempSync(join(tmpdir(), prefix)),
  };
}

export function createNodeHttpClient(): HttpClient {
  return {
    fetch: (url, options) => fetch(url, options),
  };
}

/**
 * execFileSync-backed executor.
 * Errors carry the command line and the child's stderr so callers can log
 * them without re-running anything.
 */
export function createNodeShellExecutor(): ShellExecutor {
  return {
    execFile(command: string, args: string[], options: ExecOptions = {}): string {
      const stdio = options.stdio ?? "pipe";
      try {
        const output = execFileSync(command, args, {
          cwd: options.cwd,
          env: options.env ? { ...process.env, ...options.env } : process.env,
          encoding: "utf-8",
          maxBuffer: MAX_CAPTURED_OUTPUT,
          stdio: stdio === "inherit" ? "inherit" : ["ignore", "pipe", "pipe"],
        });
        return typeof output === "string" ? output : "";
      } catch (err) {
        const status = err instanceof Error && "status" in err && typeof err.status === "number" ? err.status : null;
        throw new CommandError(describeExecFailure(command, args, err), command, status);
      }
    },
  };
}

function describeExecFailure(command: string, args: string[], err: unknown): string {
  const commandLine = [command, ...args].join(" ");
  if (!(err instanceof Error)) {
    return `${commandLine} failed: ${String(err)}`;
  }

  if ("code" in err && err.code === "ENOENT") {
    return `${command}: command not found`;
  }

  const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr.trim() : "";
  const status = "status" in err && typeof err.status === "number" ? ` (exit ${err.status})` : "";
  return stderr ? `${commandLine} failed${status}: ${stderr}` : `${commandLine} failed${status}`;
}

export function createNodeSystemProbe(): SystemProbe {
  return {
    platform: process.platform,
    arch: process.arch,
    cpuCount: cpus().length,
    uid: typeof process.getuid === "function" ? process.getuid() : -1,
    homeDir: process.env.HOME || homedir(),
    env: process.env,
  };
}

export interface NodeContextOptions {
  logLevel?: LogLevel;
}

export function createNodeContext(options: NodeContextOptions = {}): EngineContext {
  return {
    fs: createNodeFileSystem(),
    http: createNodeHttpClient(),
    shell: createNodeShellExecutor(),
    system: createNodeSystemProbe(),
    logger: createLogger(options.logLevel ?? "info"),
  };
}
