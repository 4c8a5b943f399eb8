/**
 * Version utilities
 *
 * Tools publish versions in several shapes: semver (0.24.0), v-prefixed
 * tags (v0.10.6), two-component versions with a letter suffix (tmux 3.3a).
 * Strict semver goes through the semver package; everything else is
 * compared component by component, like `sort -V`.
 */

import semver from "semver";
import { DEFAULT_TAG_PATTERN, VERSION_IN_OUTPUT_REGEX } from "#/constants";

const DOTTED_VERSION = /^(\d+(?:\.\d+)*)([a-z]?)$/;

/**
 * Pull the first dotted version out of `--version` style output.
 *
 * @example extractVersion("tmux 3.4") → "3.4"
 * @example extractVersion("go version go1.22.1 linux/amd64") → "1.22.1"
 */
export function extractVersion(output: string): string | null {
  const match = output.match(VERSION_IN_OUTPUT_REGEX);
  return match ? match[0] : null;
}

/**
 * Strip a leading "v" or "V" from a tag.
 */
export function normalizeTag(tag: string): string {
  return /^[vV]\d/.test(tag) ? tag.slice(1) : tag;
}

/**
 * Check if a string is strict semver (no v prefix).
 */
export function isValidSemver(version: string): boolean {
  if (version.startsWith("v") || version.startsWith("V")) {
    return false;
  }
  return semver.valid(version) !== null;
}

/**
 * Compare two versions; tags are normalized first.
 * Returns -1 if a < b, 0 if equal, 1 if a > b.
 * Missing components count as 0 ("3.4" equals "3.4.0") and a letter suffix
 * sorts after the bare number ("3.3a" > "3.3").
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = normalizeTag(a);
  const right = normalizeTag(b);

  if (isValidSemver(left) && isValidSemver(right)) {
    return semver.compare(left, right);
  }

  const leftParts = left.match(DOTTED_VERSION);
  const rightParts = right.match(DOTTED_VERSION);
  if (!leftParts || !rightParts) {
    const fallback = left.localeCompare(right, "en", { numeric: true });
    return fallback < 0 ? -1 : fallback > 0 ? 1 : 0;
  }

  const leftNumbers = (leftParts[1] ?? "").split(".").map(Number);
  const rightNumbers = (rightParts[1] ?? "").split(".").map(Number);
  const length = Math.max(leftNumbers.length, rightNumbers.length);

  for (let i = 0; i < length; i++) {
    const l = leftNumbers[i] ?? 0;
    const r = rightNumbers[i] ?? 0;
    if (l !== r) return l > r ? 1 : -1;
  }

  const leftSuffix = leftParts[2] ?? "";
  const rightSuffix = rightParts[2] ?? "";
  if (leftSuffix === rightSuffix) return 0;
  return leftSuffix > rightSuffix ? 1 : -1;
}

/**
 * Sort versions or tags in descending order (highest first).
 */
export function sortVersionsDesc(versions: string[]): string[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

/**
 * Pick the highest tag matching `pattern`.
 * Returns null when no tag matches.
 */
export function selectLatestTag(tags: string[], pattern: RegExp = DEFAULT_TAG_PATTERN): string | null {
  const candidates = tags.map((tag) => tag.trim()).filter((tag) => pattern.test(tag));
  return sortVersionsDesc(candidates)[0] ?? null;
}

/**
 * True when an installed version string denotes the same release as a tag.
 */
export function sameVersion(installed: string | null | undefined, target: string | null | undefined): boolean {
  if (!installed || !target) return false;
  return compareVersions(installed, target) === 0;
}
