import { describe, test, expect } from "vitest";
import { formatBytes, formatSummaryRow, formatToolchainSummary, formatToolSummary } from "./index";

const RULE = "------------------------------";

describe("formatters", () => {
  describe("formatBytes", () => {
    test("returns B for bytes < 1024", () => {
      expect(formatBytes(500)).toBe("500 B");
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(1023)).toBe("1023 B");
    });

    test("returns KB for bytes < 1MB", () => {
      expect(formatBytes(1024)).toBe("1.0 KB");
      expect(formatBytes(1536)).toBe("1.5 KB");
      expect(formatBytes(1024 * 1024 - 1)).toBe("1024.0 KB");
    });

    test("returns MB for bytes >= 1MB", () => {
      expect(formatBytes(1024 * 1024)).toBe("1.0 MB");
      expect(formatBytes(1572864)).toBe("1.5 MB");
    });
  });

  describe("formatSummaryRow", () => {
    test("pads name and state to ten columns", () => {
      expect(formatSummaryRow({ name: "conda", state: "installed", version: "24.1.2" })).toBe(
        "conda     : installed  (version: 24.1.2)"
      );
    });

    test("reports a missing version as unknown", () => {
      expect(formatSummaryRow({ name: "zig", state: "failed", version: null })).toBe(
        "zig       : failed     (version: unknown)"
      );
    });

    test("long names are not truncated", () => {
      expect(formatSummaryRow({ name: "oh-my-posh", state: "current", version: "19.8.0" })).toBe(
        "oh-my-posh: current    (version: 19.8.0)"
      );
    });
  });

  test("formatToolchainSummary frames the rows with rules", () => {
    expect(
      formatToolchainSummary([
        { name: "rust", state: "current", version: "1.79.0" },
        { name: "go", state: "updated", version: "1.22.5" },
      ])
    ).toEqual([
      "Toolchain Installation Summary:",
      RULE,
      "rust      : current    (version: 1.79.0)",
      "go        : updated    (version: 1.22.5)",
      RULE,
    ]);
  });

  test("formatToolSummary uses the tool status", () => {
    expect(formatToolSummary([{ name: "tmux", status: "skipped" }])).toEqual([
      "Tool Installation Summary:",
      RULE,
      "tmux      : skipped    (version: unknown)",
      RULE,
    ]);
  });
});
