import { describe, test, expect } from "vitest";
import { createPrivilegedShell } from "#/core";
import {
  layoutFor,
  resolvePrefix,
  findExistingPrefix,
  ensureDir,
  ensureLayout,
  createManagedSymlink,
  installBinary,
  removePath,
  writeManagedFile,
} from "./layout";
import { createMockFileSystem, createMockShellExecutor, createTestContext } from "#/test-utils/mocks";

describe("layout", () => {
  describe("layoutFor", () => {
    test("derives every managed path from the prefix", () => {
      expect(layoutFor("/opt/local")).toEqual({
        prefix: "/opt/local",
        bin: "/opt/local/bin",
        lib: "/opt/local/lib",
        configDir: "/opt/local/etc/dev",
        toolsConf: "/opt/local/etc/dev/tools.conf",
        settingsFile: "/opt/local/etc/dev/settings.yaml",
        shareDir: "/opt/local/share/dev",
        cacheDir: "/opt/local/share/dev/cache",
        toolchainsDir: "/opt/local/share/dev/toolchains",
      });
    });
  });

  describe("resolvePrefix", () => {
    test("returns an override untouched", () => {
      const ctx = createTestContext();
      const privileged = createPrivilegedShell(ctx.shell, "root");

      expect(resolvePrefix(ctx, privileged, "/srv/tools")).toBe("/srv/tools");
      expect(ctx.shell.commands).toEqual([]);
    });

    test("prefers an existing /opt/local/bin", () => {
      const ctx = createTestContext({
        fs: createMockFileSystem({}, { dirs: ["/opt/local/bin", "/usr/local/bin"] }),
      });
      const privileged = createPrivilegedShell(ctx.shell, "root");

      expect(resolvePrefix(ctx, privileged)).toBe("/opt/local");
      expect(ctx.shell.commands).toEqual([]);
    });

    test("uses an existing /usr/local/bin", () => {
      const ctx = createTestContext({ fs: createMockFileSystem({}, { dirs: ["/usr/local/bin"] }) });
      const privileged = createPrivilegedShell(ctx.shell, "root");

      expect(resolvePrefix(ctx, privileged)).toBe("/usr/local");
    });

    test("creates /opt/local/bin when neither exists", () => {
      const ctx = createTestContext();
      const privileged = createPrivilegedShell(ctx.shell, "sudo");

      expect(resolvePrefix(ctx, privileged)).toBe("/opt/local");
      expect(ctx.shell.commands).toEqual([
        "sudo -n mkdir -p /opt/local/bin",
        "sudo -n chmod 775 /opt/local/bin",
      ]);
    });

    test("falls back to /usr/local when /opt/local cannot be created", () => {
      const shell = createMockShellExecutor({ "mkdir -p /opt/local/bin": new Error("Permission denied") });
      const ctx = createTestContext({ shell });
      const privileged = createPrivilegedShell(shell, "unprivileged");

      expect(resolvePrefix(ctx, privileged)).toBe("/usr/local");
    });

    test("fails when no prefix can be created", () => {
      const shell = createMockShellExecutor({ mkdir: new Error("Permission denied") });
      const ctx = createTestContext({ shell });
      const privileged = createPrivilegedShell(shell, "unprivileged");

      expect(() => resolvePrefix(ctx, privileged)).toThrow(
        "Could not create either /opt/local/bin or /usr/local/bin"
      );
    });
  });

  describe("ensureDir", () => {
    test("skips mkdir for existing directories", () => {
      const ctx = createTestContext({ fs: createMockFileSystem({}, { dirs: ["/opt/local/lib"] }) });
      const privileged = createPrivilegedShell(ctx.shell, "root");

      expect(ensureDir(ctx, privileged, "/opt/local/lib", { group: "staff" })).toBe(true);
      expect(ctx.shell.commands).toEqual(["chown root:staff /opt/local/lib", "chmod 775 /opt/local/lib"]);
    });

    test("leaves ownership alone without a group", () => {
      const ctx = createTestContext();
      const privileged = createPrivilegedShell(ctx.shell, "root");

      ensureDir(ctx, privileged, "/tmp/work", { mode: "700" });

      expect(ctx.shell.commands).toEqual(["mkdir -p /tmp/work", "chmod 700 /tmp/work"]);
    });
  });

  describe("ensureLayout", () => {
    test("creates, owns and opens every directory", () => {
      const ctx = createTestContext();
      const privileged = createPrivilegedShell(ctx.shell, "root");

      const failed = ensureLayout(ctx, privileged, layoutFor("/opt/local"), "staff");

      expect(failed).toEqual([]);
      expect(ctx.shell.commands).toHaveLength(18);
      expect(ctx.shell.commands.slice(0, 3)).toEqual([
        "mkdir -p /opt/local/bin",
        "chown root:staff /opt/local/bin",
        "chmod 775 /opt/local/bin",
      ]);
      expect(ctx.shell.commands).toContain("mkdir -p /opt/local/share/dev/toolchains");
    });

    test("degrades to warnings without privilege", () => {
      const shell = createMockShellExecutor({ chown: new Error("Operation not permitted") });
      const ctx = createTestContext({ shell });
      const privileged = createPrivilegedShell(shell, "unprivileged");

      const failed = ensureLayout(ctx, privileged, layoutFor("/opt/local"), "staff");

      expect(failed).toHaveLength(6);
      expect(ctx.logger.at("warn")[0]).toBe("Could not set up /opt/local/bin: Operation not permitted");
      expect(ctx.logger.at("warn")[6]).toBe("Prefix layout incomplete (6 of 6 directories), continuing...");
    });
  });

  describe("createManagedSymlink", () => {
    test("links and chowns the link itself", () => {
      const source = "/opt/local/share/dev/toolchains/go/bin/go";
      const ctx = createTestContext({ fs: createMockFileSystem({}, { executables: [source] }) });
      const privileged = createPrivilegedShell(ctx.shell, "root");

      expect(createManagedSymlink(ctx, privileged, source, "/opt/local/bin/go", "staff")).toBe(true);
      expect(ctx.shell.commands).toEqual([
        `ln -sf ${source} /opt/local/bin/go`,
        "chown -h root:staff /opt/local/bin/go",
      ]);
    });

    test("warns about a missing source", () => {
      const ctx = createTestContext();
      const privileged = createPrivilegedShell(ctx.shell, "root");

      expect(createManagedSymlink(ctx, privileged, "/nope/bin/go", "/opt/local/bin/go", "staff")).toBe(false);
      expect(ctx.logger.at("warn")).toEqual(["Cannot link go: /nope/bin/go does not exist"]);
      expect(ctx.shell.commands).toEqual([]);
    });
  });

  test("installBinary copies with mode 755", () => {
    const shell = createMockShellExecutor();
    const privileged = createPrivilegedShell(shell, "sudo");

    const dest = installBinary(privileged, "/cache/bat/target/release/bat", "/opt/local/bin");

    expect(dest).toBe("/opt/local/bin/bat");
    expect(shell.commands).toEqual(["sudo -n install -m755 /cache/bat/target/release/bat /opt/local/bin/bat"]);
  });

  test("installBinary can rename the binary", () => {
    const shell = createMockShellExecutor();
    const privileged = createPrivilegedShell(shell, "root");

    expect(installBinary(privileged, "/tmp/posh-linux-amd64", "/opt/local/bin", "oh-my-posh")).toBe(
      "/opt/local/bin/oh-my-posh"
    );
  });

  test("removePath reports failure", () => {
    const shell = createMockShellExecutor({ "rm -rf /opt/local/share/dev/toolchains/go": new Error("busy") });
    const privileged = createPrivilegedShell(shell, "root");

    expect(removePath(privileged, "/opt/local/share/dev/toolchains/go")).toBe(false);
    expect(removePath(privileged, "/tmp/other")).toBe(true);
  });
});

describe("findExistingPrefix", () => {
  test("prefers the override", () => {
    expect(findExistingPrefix(createTestContext(), "/srv/dev")).toBe("/srv/dev");
  });

  test("falls back to /usr/local when only it exists", () => {
    const ctx = createTestContext({ fs: createMockFileSystem({}, { dirs: ["/usr/local"] }) });

    expect(findExistingPrefix(ctx)).toBe("/usr/local");
  });

  test("defaults to /opt/local", () => {
    expect(findExistingPrefix(createTestContext())).toBe("/opt/local");
  });
});

describe("writeManagedFile", () => {
  test("stages the content and installs it with owner and mode", () => {
    const ctx = createTestContext();
    const privileged = createPrivilegedShell(ctx.shell, "sudo");

    writeManagedFile(ctx, privileged, "/opt/local/etc/dev/tools.conf", "tmux=head\n", { mode: "664", group: "staff" });

    expect(ctx.fs.files.get("/tmp/dotstrap-tools.conf-1/tools.conf")).toBe("tmux=head\n");
    expect(ctx.shell.commands).toEqual([
      "sudo -n install -m664 /tmp/dotstrap-tools.conf-1/tools.conf /opt/local/etc/dev/tools.conf",
      "sudo -n chown root:staff /opt/local/etc/dev/tools.conf",
      "sudo -n rm -rf /tmp/dotstrap-tools.conf-1",
    ]);
  });

  test("removes the staging directory when the copy fails", () => {
    const shell = createMockShellExecutor({ install: new Error("Read-only file system") });
    const ctx = createTestContext({ shell });
    const privileged = createPrivilegedShell(shell, "root");

    expect(() =>
      writeManagedFile(ctx, privileged, "/opt/local/bin/dependencies", "#!/bin/sh\n", { mode: "755", group: "staff" })
    ).toThrow("Read-only file system");
    expect(shell.commands.at(-1)).toBe("rm -rf /tmp/dotstrap-dependencies-1");
  });
});
