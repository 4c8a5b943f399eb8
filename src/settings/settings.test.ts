import { describe, test, expect } from "vitest";
import { readEnvOverrides, findSettingsFile, loadSettings } from "./settings";
import { createMockFileSystem, createMockSystem, createTestContext } from "#/test-utils/mocks";

const DEFAULT_FILE = "/opt/local/etc/dev/settings.yaml";

function contextWith(files: Record<string, string>, env: Record<string, string> = {}) {
  return createTestContext({
    fs: createMockFileSystem(files),
    system: createMockSystem({ env: { PATH: "/usr/bin:/bin", ...env } }),
  });
}

describe("settings", () => {
  describe("readEnvOverrides", () => {
    test("maps environment variables", () => {
      expect(
        readEnvOverrides({
          DOTSTRAP_PREFIX: "/srv/dev",
          DOTSTRAP_LOG_LEVEL: "debug",
          DOTSTRAP_JOBS: "6",
          GITHUB_TOKEN: "test-token",
        })
      ).toEqual({ prefix: "/srv/dev", logLevel: "debug", jobs: 6, githubToken: "test-token" });
    });

    test("ignores empty values", () => {
      expect(readEnvOverrides({ DOTSTRAP_PREFIX: "", HOME: "/home/dev" })).toEqual({});
    });
  });

  describe("findSettingsFile", () => {
    test("looks under both default prefixes", () => {
      const ctx = contextWith({ "/usr/local/etc/dev/settings.yaml": "" });

      expect(findSettingsFile(ctx)).toBe("/usr/local/etc/dev/settings.yaml");
    });

    test("only looks under a hinted prefix", () => {
      const ctx = contextWith({ [DEFAULT_FILE]: "" });

      expect(findSettingsFile(ctx, "/srv/dev")).toBeNull();
    });
  });

  describe("loadSettings", () => {
    test("defaults without a file", () => {
      const result = loadSettings(contextWith({}));

      expect(result).toEqual({ success: true, data: { settings: { tools: [] }, path: null } });
    });

    test("reads the file under the default prefix", () => {
      const result = loadSettings(contextWith({ [DEFAULT_FILE]: "jobs: 2\nlogLevel: warn\n" }));

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.path).toBe(DEFAULT_FILE);
        expect(result.data.settings.jobs).toBe(2);
        expect(result.data.settings.logLevel).toBe("warn");
      }
    });

    test("environment beats the file and flags beat the environment", () => {
      const ctx = contextWith({ [DEFAULT_FILE]: "jobs: 2\nadminGroup: staff\n" }, { DOTSTRAP_JOBS: "6" });

      const fromEnv = loadSettings(ctx);
      const fromFlag = loadSettings(ctx, { jobs: 8 });

      expect(fromEnv.success && fromEnv.data.settings.jobs).toBe(6);
      expect(fromFlag.success && fromFlag.data.settings.jobs).toBe(8);
      expect(fromFlag.success && fromFlag.data.settings.adminGroup).toBe("staff");
    });

    test("unset flags leave lower layers alone", () => {
      const ctx = contextWith({ [DEFAULT_FILE]: "jobs: 2\n" });

      const result = loadSettings(ctx, { prefix: undefined, jobs: undefined, logLevel: undefined });

      expect(result.success && result.data.settings.jobs).toBe(2);
    });

    test("finds the file under an overridden prefix", () => {
      const ctx = contextWith(
        {
          [DEFAULT_FILE]: "jobs: 2\n",
          "/srv/dev/etc/dev/settings.yaml": "jobs: 5\n",
        },
        { DOTSTRAP_PREFIX: "/srv/dev" }
      );

      const result = loadSettings(ctx);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.path).toBe("/srv/dev/etc/dev/settings.yaml");
        expect(result.data.settings).toEqual({ tools: [], jobs: 5, prefix: "/srv/dev" });
      }
    });

    test("reads the token from GITHUB_TOKEN", () => {
      const result = loadSettings(contextWith({}, { GITHUB_TOKEN: "test-token" }));

      expect(result.success && result.data.settings.githubToken).toBe("test-token");
    });

    test("rejects invalid environment values", () => {
      const result = loadSettings(contextWith({}, { DOTSTRAP_JOBS: "many" }));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("validation");
        expect(result.error.message).toBe("Invalid configuration in environment");
        expect(result.error.details?.[0]).toMatch(/^jobs: /);
      }
    });

    test("rejects a relative prefix flag", () => {
      const result = loadSettings(contextWith({}), { prefix: "opt" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Invalid configuration in command line options");
        expect(result.error.details).toEqual(["prefix: prefix must be an absolute path"]);
      }
    });

    test("reports a missing explicit settings file", () => {
      const result = loadSettings(contextWith({}), { settingsPath: "/tmp/settings.yaml" });

      expect(result).toEqual({
        success: false,
        error: { type: "io", message: "Settings file not found: /tmp/settings.yaml" },
      });
    });

    test("reports YAML errors in the file", () => {
      const result = loadSettings(contextWith({ "/tmp/settings.yaml": "jobs: [1\n" }), {
        settingsPath: "/tmp/settings.yaml",
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.message).toBe("Invalid YAML syntax in /tmp/settings.yaml");
      }
    });

    test("rejects unknown keys", () => {
      const result = loadSettings(contextWith({ [DEFAULT_FILE]: "prefx: /opt/local\n" }));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`Invalid configuration in ${DEFAULT_FILE}`);
      }
    });
  });
});
