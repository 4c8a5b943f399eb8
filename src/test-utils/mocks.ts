/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { dirname } from "path";
import type {
  EngineContext,
  ExecOptions,
  FileSystem,
  HttpClient,
  Logger,
  ShellExecutor,
  SystemProbe,
} from "#/core";

interface MockFileSystemState {
  files: Map<string, string | Buffer>;
  dirs: Set<string>;
  symlinks: Map<string, string>;
  executables: Set<string>;
}

/**
 * Create a mock FileSystem with in-memory storage.
 * Parent directories are implied by their children.
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {},
  options: { executables?: string[]; dirs?: string[] } = {}
): FileSystem & MockFileSystemState {
  const files = new Map<string, string | Buffer>(Object.entries(initialFiles));
  const dirs = new Set<string>(options.dirs ?? []);
  const symlinks = new Map<string, string>();
  const executables = new Set<string>(options.executables ?? []);
  let tempCounter = 0;

  for (const path of executables) {
    if (!files.has(path)) files.set(path, "#!/bin/sh\n");
  }

  const trim = (path: string) => (path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path);

  const hasChildren = (path: string): boolean => {
    const prefix = `${trim(path)}/`;
    for (const key of [...files.keys(), ...dirs, ...symlinks.keys()]) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  };

  const follow = (path: string): string => {
    let current = path;
    for (let hops = 0; hops < 8; hops++) {
      const target = symlinks.get(current);
      if (target === undefined) return current;
      current = target.startsWith("/") ? target : `${dirname(current)}/${target}`;
    }
    return current;
  };

  const removeTree = (path: string) => {
    const root = trim(path);
    const prefix = `${root}/`;
    for (const store of [files, symlinks]) {
      for (const key of [...store.keys()]) {
        if (key === root || key.startsWith(prefix)) store.delete(key);
      }
    }
    for (const set of [dirs, executables]) {
      for (const key of [...set]) {
        if (key === root || key.startsWith(prefix)) set.delete(key);
      }
    }
  };

  return {
    files,
    dirs,
    symlinks,
    executables,

    readFile(path: string): string {
      const content = files.get(follow(path));
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof content === "string" ? content : content.toString("utf-8");
    },

    writeFile(path: string, content: string, mode?: number): void {
      files.set(path, content);
      if (mode !== undefined && (mode & 0o111) !== 0) {
        executables.add(path);
      }
    },

    writeFileBinary(path: string, content: Buffer): void {
      files.set(path, content);
    },

    exists(path: string): boolean {
      const p = trim(path);
      return files.has(p) || dirs.has(p) || symlinks.has(p) || hasChildren(p);
    },

    isDirectory(path: string): boolean {
      const p = trim(follow(trim(path)));
      return dirs.has(p) || (!files.has(p) && hasChildren(p));
    },

    isExecutable(path: string): boolean {
      const target = follow(path);
      return files.has(target) && executables.has(target);
    },

    isSymlink(path: string): boolean {
      return symlinks.has(trim(path));
    },

    mkdir(path: string, options?: { recursive?: boolean }): void {
      let current = trim(path);
      dirs.add(current);
      if (!options?.recursive) return;
      while (current !== "/" && current !== ".") {
        current = dirname(current);
        dirs.add(current);
      }
    },

    readdir(path: string): string[] {
      const prefix = `${trim(path)}/`;
      const names = new Set<string>();
      for (const key of [...files.keys(), ...dirs, ...symlinks.keys()]) {
        if (!key.startsWith(prefix)) continue;
        const first = key.slice(prefix.length).split("/")[0];
        if (first) names.add(first);
      }
      return [...names].sort();
    },

    unlink(path: string): void {
      const p = trim(path);
      if (!files.has(p) && !symlinks.has(p)) {
        throw new Error(`ENOENT: no such file or directory, unlink '${path}'`);
      }
      files.delete(p);
      symlinks.delete(p);
      executables.delete(p);
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      removeTree(path);
    },

    rename(src: string, dest: string): void {
      const from = trim(src);
      const to = trim(dest);
      const prefix = `${from}/`;
      let moved = false;

      for (const [key, value] of [...files.entries()]) {
        if (key !== from && !key.startsWith(prefix)) continue;
        const next = to + key.slice(from.length);
        files.delete(key);
        files.set(next, value);
        if (executables.delete(key)) executables.add(next);
        moved = true;
      }
      for (const [key, value] of [...symlinks.entries()]) {
        if (key !== from && !key.startsWith(prefix)) continue;
        symlinks.delete(key);
        symlinks.set(to + key.slice(from.length), value);
        moved = true;
      }
      for (const key of [...dirs]) {
        if (key !== from && !key.startsWith(prefix)) continue;
        dirs.delete(key);
        dirs.add(to + key.slice(from.length));
        moved = true;
      }

      if (!moved) {
        throw new Error(`ENOENT: no such file or directory, rename '${src}'`);
      }
    },

    copyFile(src: string, dest: string): void {
      const content = files.get(follow(src));
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, copyfile '${src}'`);
      }
      files.set(dest, content);
    },

    symlink(target: string, path: string): void {
      symlinks.set(trim(path), target);
    },

    makeTempDir(prefix: string): string {
      tempCounter += 1;
      const dir = `/tmp/${prefix}${tempCounter}`;
      dirs.add(dir);
      return dir;
    },
  };
}

/**
 * Recorded HTTP request
 */
interface HttpCall {
  url: string;
  options?: RequestInit;
}

/**
 * Create a mock HttpClient with predefined responses
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; requests: HttpCall[] } {
  const requests: HttpCall[] = [];

  return {
    responses,
    requests,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      requests.push({ url, options });
      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function" ? responseOrFactory() : responseOrFactory;
    },
  };
}

/**
 * Recorded shell execution call
 */
export interface ShellCall {
  command: string;
  args: string[];
  options?: ExecOptions;
}

export type MockShellResult = string | Error | ((call: ShellCall) => string);

/**
 * Create a mock ShellExecutor with predefined command outputs.
 *
 * Keys match the full command line: a key matches when the line equals it
 * or starts with it followed by a space. The longest matching key wins, so
 * `"git"` can set a default while `"git -C /repo tag -l"` overrides one call.
 * Unmatched commands succeed with empty output.
 */
export function createMockShellExecutor(
  results: Record<string, MockShellResult> = {}
): ShellExecutor & { calls: ShellCall[]; commands: string[]; results: Record<string, MockShellResult> } {
  const calls: ShellCall[] = [];
  const commands: string[] = [];

  return {
    calls,
    commands,
    results,

    execFile(command: string, args: string[], options?: ExecOptions): string {
      const call: ShellCall = { command, args, options };
      const line = [command, ...args].join(" ");
      calls.push(call);
      commands.push(line);

      let bestKey: string | undefined;
      for (const key of Object.keys(results)) {
        const matches = line === key || line.startsWith(`${key} `);
        if (matches && (bestKey === undefined || key.length > bestKey.length)) {
          bestKey = key;
        }
      }

      if (bestKey === undefined) return "";

      const result = results[bestKey];
      if (result instanceof Error) throw result;
      if (typeof result === "function") return result(call);
      return result ?? "";
    },
  };
}

export interface LoggedMessage {
  level: "debug" | "info" | "warn" | "error" | "success";
  message: string;
}

/**
 * Create a Logger that records every message
 */
export function createMockLogger(): Logger & {
  messages: LoggedMessage[];
  at(level: LoggedMessage["level"]): string[];
} {
  const messages: LoggedMessage[] = [];
  const record = (level: LoggedMessage["level"]) => (message: string) => {
    messages.push({ level, message });
  };

  return {
    messages,
    at: (level) => messages.filter((m) => m.level === level).map((m) => m.message),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    success: record("success"),
  };
}

/**
 * Create a SystemProbe describing a 4-core x64 Linux host run by a regular user
 */
export function createMockSystem(overrides: Partial<SystemProbe> = {}): SystemProbe {
  return {
    platform: "linux",
    arch: "x64",
    cpuCount: 4,
    uid: 1000,
    homeDir: "/home/dev",
    env: { PATH: "/usr/local/bin:/usr/bin:/bin", HOME: "/home/dev" },
    ...overrides,
  };
}

export interface TestContext extends EngineContext {
  fs: ReturnType<typeof createMockFileSystem>;
  http: ReturnType<typeof createMockHttpClient>;
  shell: ReturnType<typeof createMockShellExecutor>;
  logger: ReturnType<typeof createMockLogger>;
}

/**
 * Bundle the mocks into an EngineContext
 */
export function createTestContext(
  parts: {
    fs?: ReturnType<typeof createMockFileSystem>;
    http?: ReturnType<typeof createMockHttpClient>;
    shell?: ReturnType<typeof createMockShellExecutor>;
    system?: SystemProbe;
  } = {}
): TestContext {
  return {
    fs: parts.fs ?? createMockFileSystem(),
    http: parts.http ?? createMockHttpClient(),
    shell: parts.shell ?? createMockShellExecutor(),
    system: parts.system ?? createMockSystem(),
    logger: createMockLogger(),
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create a text/html response
 */
export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/html" } });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(data: Buffer | Uint8Array, status = 200): Response {
  return new Response(new Uint8Array(data), {
    status,
    headers: { "Content-Type": "application/octet-stream" },
  });
}
