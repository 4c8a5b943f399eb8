import { describe, test, expect } from "vitest";
import {
  detectArchiveFormat,
  parseTarSymlinks,
  stripLeadingComponents,
  validateArchiveEntries,
} from "./archive-utils";
import { createMockShellExecutor } from "#/test-utils/mocks";

const ARCHIVE = "/tmp/dotstrap-zig-1/zig.tar.xz";

describe("archive-utils", () => {
  test("detectArchiveFormat reads the extension", () => {
    expect(detectArchiveFormat("go1.22.5.linux-amd64.tar.gz")).toBe("tar.gz");
    expect(detectArchiveFormat("https://example.com/zig.tar.xz?mirror=1")).toBe("tar.xz");
    expect(detectArchiveFormat("THEMES.ZIP")).toBe("zip");
    expect(detectArchiveFormat("release.TGZ")).toBe("tar.gz");
    expect(detectArchiveFormat("posh-linux-amd64")).toBeNull();
  });

  test("stripLeadingComponents mirrors --strip-components", () => {
    expect(stripLeadingComponents("go/bin/go", 1)).toBe("bin/go");
    expect(stripLeadingComponents("go/", 1)).toBeNull();
    expect(stripLeadingComponents("bin/go", 0)).toBe("bin/go");
    expect(stripLeadingComponents("  ", 0)).toBeNull();
  });

  test("parseTarSymlinks handles GNU and BSD listings", () => {
    const links = parseTarSymlinks([
      "-rwxr-xr-x root/root 1024 2024-01-01 00:00 zig/zig",
      "lrwxrwxrwx root/root 0 2024-01-01 00:00 zig/lib -> ../lib",
      "lrwxr-xr-x  0 root wheel 0 Jan  1 00:00 zig/doc -> docs",
    ]);

    expect([...links.entries()]).toEqual([
      ["zig/lib", "../lib"],
      ["zig/doc", "docs"],
    ]);
  });

  describe("validateArchiveEntries", () => {
    test("accepts entries that stay inside the target", () => {
      const shell = createMockShellExecutor({
        [`tar -tf ${ARCHIVE}`]: "zig/\nzig/zig\nzig/lib/std/std.zig\n",
        [`tar -tvf ${ARCHIVE}`]: "",
      });

      expect(validateArchiveEntries(shell, ARCHIVE, "/opt/local/share/dev/toolchains/zig", "tar.xz", 1)).toEqual({
        safe: true,
        violations: [],
      });
    });

    test("rejects absolute paths, traversal and escaping symlinks", () => {
      const shell = createMockShellExecutor({
        [`tar -tf ${ARCHIVE}`]: "/etc/passwd\n../evil\nzig/lib\n",
        [`tar -tvf ${ARCHIVE}`]: "lrwxrwxrwx root/root 0 2024-01-01 00:00 zig/lib -> ../../../etc\n",
      });

      expect(validateArchiveEntries(shell, ARCHIVE, "/opt/t", "tar.xz").violations).toEqual([
        "Absolute path in archive: /etc/passwd",
        "Path traversal in archive: ../evil",
        "Symlink escapes target directory: zig/lib -> ../../../etc",
      ]);
    });

    test("an archive that cannot be listed is unsafe", () => {
      const shell = createMockShellExecutor({ unzip: new Error("End-of-central-directory signature not found") });

      expect(validateArchiveEntries(shell, "/tmp/themes.zip", "/opt/t", "zip")).toEqual({
        safe: false,
        violations: ["Cannot list archive: End-of-central-directory signature not found"],
      });
    });
  });
});
