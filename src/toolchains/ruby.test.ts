import { describe, test, expect } from "vitest";
import { rubyToolchain } from "./ruby";
import { createTestInstallEnv } from "#/test-utils/install-env";
import { createMockFileSystem, createMockShellExecutor, createTestContext } from "#/test-utils/mocks";

const RUBY_OUTPUT = "ruby 3.2.3 (2024-01-18 revision 52bb2ac0a6) [x86_64-linux]\n";

describe("ruby toolchain", () => {
  test("keeps a ruby already on PATH", async () => {
    const fs = createMockFileSystem({}, { executables: ["/usr/bin/ruby"] });
    const shell = createMockShellExecutor({ "/usr/bin/ruby --version": RUBY_OUTPUT });
    const env = createTestInstallEnv({ ctx: createTestContext({ fs, shell }) });

    const result = await rubyToolchain.install(env, {});

    expect(result).toEqual({ name: "ruby", state: "current", version: "3.2.3" });
    expect(shell.commands).toEqual(["/usr/bin/ruby --version"]);
  });

  test("installs ruby-full through apt", async () => {
    const fs = createMockFileSystem();
    const shell = createMockShellExecutor({
      "apt-get install": () => {
        fs.writeFile("/usr/bin/ruby", "", 0o755);
        return "";
      },
      "/usr/bin/ruby --version": RUBY_OUTPUT,
    });
    const env = createTestInstallEnv({ ctx: createTestContext({ fs, shell }) });

    const result = await rubyToolchain.install(env, {});

    expect(result).toEqual({ name: "ruby", state: "installed", version: "3.2.3" });
    expect(shell.commands[0]).toBe("apt-get install -y -q ruby-full");
  });

  test("installs headers alongside ruby on dnf", async () => {
    const env = createTestInstallEnv({ platform: { distroId: "fedora", packageManager: "dnf" } });

    await rubyToolchain.install(env, {});

    expect(env.ctx.shell.commands).toEqual(["dnf install -y -q ruby ruby-devel"]);
  });

  test("throws when the package manager fails", async () => {
    const shell = createMockShellExecutor({ "apt-get install": new Error("dpkg was interrupted") });
    const env = createTestInstallEnv({ ctx: createTestContext({ shell }) });

    await expect(rubyToolchain.install(env, {})).rejects.toThrow("Package installation failed: dpkg was interrupted");
  });
});
