/**
 * Output formatting for summaries and sizes.
 * Formatters return lines; callers decide where they are written.
 */

const SUMMARY_RULE = "-".repeat(30);
const NAME_WIDTH = 10;
const STATE_WIDTH = 10;

export interface SummaryRow {
  name: string;
  state: string;
  version?: string | null;
}

/**
 * Format bytes to human readable string.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * @example formatSummaryRow({ name: "conda", state: "installed", version: "24.1.2" })
 *   → "conda     : installed  (version: 24.1.2)"
 */
export function formatSummaryRow(row: SummaryRow): string {
  const version = row.version ?? "unknown";
  return `${row.name.padEnd(NAME_WIDTH)}: ${row.state.padEnd(STATE_WIDTH)} (version: ${version})`;
}

export function formatSummary(title: string, rows: SummaryRow[]): string[] {
  return [`${title}:`, SUMMARY_RULE, ...rows.map(formatSummaryRow), SUMMARY_RULE];
}

export function formatToolchainSummary(
  results: { name: string; state: string; version: string | null }[]
): string[] {
  return formatSummary("Toolchain Installation Summary", results);
}

export function formatToolSummary(
  results: { name: string; status: string; version?: string | null }[]
): string[] {
  return formatSummary(
    "Tool Installation Summary",
    results.map((result) => ({ name: result.name, state: result.status, version: result.version }))
  );
}
