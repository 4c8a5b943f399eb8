/**
 * PATH lookup.
 *
 * Resolved by scanning PATH through the FileSystem interface instead of
 * spawning `which`, which minimal images do not always ship.
 */

import { join } from "path";
import type { FileSystem, SystemProbe } from "./interfaces";

/**
 * Every executable named `name` on PATH, in PATH order (like `which -a`).
 * `extraDirs` are searched first; the prefix bin directory is passed here
 * because a fresh install is not on the caller's PATH yet.
 */
export function whichAll(
  fs: FileSystem,
  system: SystemProbe,
  name: string,
  extraDirs: string[] = []
): string[] {
  if (name.includes("/")) {
    return fs.isExecutable(name) ? [name] : [];
  }

  const pathDirs = (system.env.PATH ?? "").split(":").filter(Boolean);
  const seen = new Set<string>();
  const found: string[] = [];

  for (const dir of [...extraDirs, ...pathDirs]) {
    if (seen.has(dir)) continue;
    seen.add(dir);

    const candidate = join(dir, name);
    if (fs.isExecutable(candidate)) {
      found.push(candidate);
    }
  }

  return found;
}

export function which(
  fs: FileSystem,
  system: SystemProbe,
  name: string,
  extraDirs: string[] = []
): string | null {
  return whichAll(fs, system, name, extraDirs)[0] ?? null;
}

export function commandExists(
  fs: FileSystem,
  system: SystemProbe,
  name: string,
  extraDirs: string[] = []
): boolean {
  return which(fs, system, name, extraDirs) !== null;
}
