/**
 * Archive safety checks.
 *
 * Downloaded toolchains and release binaries are listed BEFORE extraction
 * and rejected when any entry would land outside the target directory.
 * Extraction may run as root, so an escaping entry could overwrite
 * anything on the host.
 */

import { isAbsolute, normalize, relative, resolve } from "path";
import type { ShellExecutor } from "./interfaces";

export type ArchiveFormat = "tar.gz" | "tar.xz" | "zip";

export interface ArchiveValidationResult {
  safe: boolean;
  violations: string[];
}

/**
 * Infer the archive format from a file name or URL.
 */
export function detectArchiveFormat(name: string): ArchiveFormat | null {
  const lower = name.toLowerCase().split("?")[0] ?? "";
  if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) return "tar.gz";
  if (lower.endsWith(".tar.xz") || lower.endsWith(".txz")) return "tar.xz";
  if (lower.endsWith(".zip")) return "zip";
  return null;
}

/**
 * Validate archive contents before extraction.
 *
 * Rejects:
 * - absolute entries
 * - entries escaping the target after `--strip-components`
 * - symlinks (tar only) pointing outside the target
 *
 * A listing failure is itself a violation: an archive we cannot read is not
 * extracted.
 */
export function validateArchiveEntries(
  shell: ShellExecutor,
  archivePath: string,
  targetDir: string,
  format: ArchiveFormat,
  stripComponents = 0
): ArchiveValidationResult {
  const violations: string[] = [];
  const root = resolve(targetDir);

  let entries: string[];
  let symlinks = new Map<string, string>();
  try {
    if (format === "zip") {
      entries = splitLines(shell.execFile("unzip", ["-Z1", archivePath]));
    } else {
      entries = splitLines(shell.execFile("tar", ["-tf", archivePath]));
      symlinks = parseTarSymlinks(splitLines(shell.execFile("tar", ["-tvf", archivePath])));
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    return { safe: false, violations: [`Cannot list archive: ${message}`] };
  }

  for (const entry of entries) {
    const stripped = stripLeadingComponents(entry, stripComponents);
    if (stripped === null) continue;

    if (isAbsolute(stripped)) {
      violations.push(`Absolute path in archive: ${entry}`);
      continue;
    }

    const normalized = normalize(stripped);
    if (normalized === ".." || normalized.startsWith("../")) {
      violations.push(`Path traversal in archive: ${entry}`);
      continue;
    }

    const destination = resolve(root, normalized);
    if (!isInside(root, destination)) {
      violations.push(`Entry escapes target directory: ${entry}`);
      continue;
    }

    const linkTarget = symlinks.get(entry);
    if (linkTarget !== undefined) {
      const pointsTo = resolve(destination, "..", linkTarget);
      if (!isInside(root, pointsTo)) {
        violations.push(`Symlink escapes target directory: ${entry} -> ${linkTarget}`);
      }
    }
  }

  return { safe: violations.length === 0, violations };
}

/**
 * Drop the first `count` path components, as tar --strip-components does.
 * Returns null when nothing is left (the entry is a stripped prefix dir).
 *
 * @example stripLeadingComponents("go/bin/go", 1) → "bin/go"
 * @example stripLeadingComponents("go/", 1) → null
 */
export function stripLeadingComponents(entry: string, count: number): string | null {
  if (!entry.trim()) return null;
  if (count <= 0) return entry;

  const parts = entry.split("/").filter(Boolean);
  if (parts.length <= count) return null;
  return parts.slice(count).join("/");
}

/**
 * Map entry name → link target from `tar -tvf` output.
 * GNU: "lrwxrwxrwx root/root 0 2024-01-01 00:00 zig/lib -> ../lib"
 * BSD: "lrwxr-xr-x  0 root wheel 0 Jan  1 00:00 zig/lib -> ../lib"
 * Both put the name right after the HH:MM column.
 */
export function parseTarSymlinks(lines: string[]): Map<string, string> {
  const links = new Map<string, string>();

  for (const line of lines) {
    if (!line.startsWith("l")) continue;

    const arrow = line.indexOf(" -> ");
    if (arrow === -1) continue;

    const head = line.slice(0, arrow);
    const match = head.match(/\d{1,2}:\d{2}(?::\d{2})?\s+(.+)$/);
    const name = match?.[1]?.trim() ?? head.trim().split(/\s+/).pop();
    if (name) {
      links.set(name, line.slice(arrow + 4));
    }
  }

  return links;
}

function splitLines(output: string): string[] {
  return output.split("\n").map((line) => line.trimEnd()).filter(Boolean);
}

function isInside(root: string, candidate: string): boolean {
  if (candidate === root) return true;
  const rel = relative(root, candidate);
  return !(rel === ".." || rel.startsWith("../") || isAbsolute(rel));
}
