import { describe, test, expect } from "vitest";
import { createPrivilegedShell, detectPrivilegeMode, withEnv } from "./privileges";
import { createMockShellExecutor, createMockSystem } from "#/test-utils/mocks";

describe("privileges", () => {
  describe("detectPrivilegeMode", () => {
    test("root needs no probe", () => {
      const shell = createMockShellExecutor();

      expect(detectPrivilegeMode(shell, createMockSystem({ uid: 0 }))).toBe("root");
      expect(shell.commands).toEqual([]);
    });

    test("uses sudo when it works without a password", () => {
      const shell = createMockShellExecutor();

      expect(detectPrivilegeMode(shell, createMockSystem())).toBe("sudo");
      expect(shell.commands).toEqual(["sudo -n true"]);
    });

    test("falls back to unprivileged", () => {
      const shell = createMockShellExecutor({ sudo: new Error("a password is required") });

      expect(detectPrivilegeMode(shell, createMockSystem())).toBe("unprivileged");
    });
  });

  describe("withEnv", () => {
    test("leaves commands without variables alone", () => {
      expect(withEnv({}, "make", ["install"])).toEqual({ command: "make", args: ["install"] });
    });

    test("prefixes assignments through env", () => {
      expect(withEnv({ GOPATH: "/cache/go", CGO_ENABLED: "0" }, "go", ["build"])).toEqual({
        command: "env",
        args: ["GOPATH=/cache/go", "CGO_ENABLED=0", "go", "build"],
      });
    });
  });

  describe("createPrivilegedShell", () => {
    test("sudo mode moves the environment onto the command line", () => {
      const shell = createMockShellExecutor();
      const privileged = createPrivilegedShell(shell, "sudo");

      privileged.run("make", ["install"], { cwd: "/src/tmux", env: { PATH: "/opt/local/bin:/usr/bin" } });

      expect(shell.calls).toEqual([
        {
          command: "sudo",
          args: ["-n", "env", "PATH=/opt/local/bin:/usr/bin", "make", "install"],
          options: { cwd: "/src/tmux" },
        },
      ]);
    });

    test("root mode passes options through", () => {
      const shell = createMockShellExecutor();
      const privileged = createPrivilegedShell(shell, "root");

      privileged.run("make", ["install"], { env: { PREFIX: "/opt/local" } });

      expect(shell.calls[0]).toEqual({ command: "make", args: ["install"], options: { env: { PREFIX: "/opt/local" } } });
    });

    test("tryRun reports failure instead of throwing", () => {
      const shell = createMockShellExecutor({ "chown root:staff /opt/local": new Error("Operation not permitted") });
      const privileged = createPrivilegedShell(shell, "unprivileged");

      expect(privileged.tryRun("chown", ["root:staff", "/opt/local"])).toBe(false);
      expect(privileged.tryRun("chmod", ["775", "/opt/local"])).toBe(true);
      expect(() => privileged.run("chown", ["root:staff", "/opt/local"])).toThrow("Operation not permitted");
    });
  });
});
