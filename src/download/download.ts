/**
 * Download utilities
 *
 * Network and archive failures are returned as results; callers decide
 * whether a failed download is fatal (toolchains) or falls back to a source
 * build (prebuilt tool binaries).
 */

import { basename, join } from "path";
import {
  detectArchiveFormat,
  errorMessage,
  validateArchiveEntries,
  type EngineContext,
  type PrivilegedShell,
} from "#/core";
import { USER_AGENT } from "#/constants";
import { formatBytes } from "#/formatters";
import type {
  DownloadAndExtractOptions,
  DownloadResult,
  ExtractOptions,
  ExtractResult,
} from "./download.types";

/**
 * File name for a download URL (query string dropped).
 */
export function fileNameFromUrl(url: string): string {
  const path = url.split(/[?#]/)[0] ?? url;
  return basename(path) || "download";
}

/**
 * Download `url` into `dest` (written by the current user).
 */
export async function downloadToFile(
  ctx: EngineContext,
  url: string,
  dest: string,
  headers: Record<string, string> = {}
): Promise<DownloadResult> {
  try {
    const response = await ctx.http.fetch(url, {
      headers: { "User-Agent": USER_AGENT, ...headers },
      redirect: "follow",
    });

    if (!response.ok) {
      return { success: false, error: `HTTP ${response.status}: ${response.statusText}` };
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    ctx.fs.writeFileBinary(dest, buffer);
    ctx.logger.debug(`Downloaded ${url} (${formatBytes(buffer.length)})`);
    return { success: true, bytes: buffer.length };
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}

/**
 * Extract an archive into `targetDir` after validating every entry.
 * The target is created through the privileged shell; extraction runs there too.
 */
export function extractArchive(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  archive: string,
  targetDir: string,
  options: ExtractOptions = {}
): ExtractResult {
  const stripComponents = options.stripComponents ?? 0;
  const format = options.format ?? detectArchiveFormat(archive);
  if (!format) {
    return { success: false, error: `Unknown archive format: ${basename(archive)}` };
  }
  if (format === "zip" && stripComponents > 0) {
    return { success: false, error: "stripComponents is not supported for zip archives" };
  }

  // Validate archive contents BEFORE extraction (prevents path traversal)
  const validation = validateArchiveEntries(ctx.shell, archive, targetDir, format, stripComponents);
  if (!validation.safe) {
    return { success: false, error: `Unsafe archive: ${validation.violations.join(", ")}` };
  }

  try {
    privileged.run("mkdir", ["-p", targetDir]);

    if (format === "zip") {
      privileged.run("unzip", ["-oq", archive, "-d", targetDir]);
    } else {
      const args = [format === "tar.xz" ? "-xJf" : "-xzf", archive, "-C", targetDir];
      if (stripComponents > 0) {
        args.push(`--strip-components=${stripComponents}`);
      }
      privileged.run("tar", args);
    }
    return { success: true };
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}

/**
 * Download an archive to a private temp directory, extract it, and always
 * remove the temp directory.
 */
export async function downloadAndExtract(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  url: string,
  targetDir: string,
  options: DownloadAndExtractOptions = {}
): Promise<ExtractResult> {
  const { headers, ...extractOptions } = options;
  const tempDir = ctx.fs.makeTempDir("dotstrap-");
  const archive = join(tempDir, fileNameFromUrl(url));

  try {
    const download = await downloadToFile(ctx, url, archive, headers);
    if (!download.success) {
      return { success: false, error: `Download of ${url} failed: ${download.error}` };
    }
    return extractArchive(ctx, privileged, archive, targetDir, extractOptions);
  } finally {
    ctx.fs.rmdir(tempDir, { recursive: true });
  }
}
