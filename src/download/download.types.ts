/**
 * Download types
 */

import type { ArchiveFormat } from "#/core";

export interface DownloadResult {
  success: boolean;
  /** Bytes written */
  bytes?: number;
  error?: string;
}

export interface ExtractOptions {
  /** Leading path components to drop, as tar --strip-components (tar only) */
  stripComponents?: number;
  /** Inferred from the archive name when omitted */
  format?: ArchiveFormat;
}

export interface ExtractResult {
  success: boolean;
  error?: string;
}

export interface DownloadAndExtractOptions extends ExtractOptions {
  headers?: Record<string, string>;
}
