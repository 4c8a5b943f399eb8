import { describe, test, expect } from "vitest";
import {
  VersionTypeSchema,
  SettingsSchema,
  GitHubReleaseSchema,
  GoReleasesSchema,
  ZigTarballEntrySchema,
} from "./index";

describe("schemas", () => {
  describe("VersionTypeSchema", () => {
    test("accepts the four version types", () => {
      for (const type of ["stable", "head", "managed", "none"]) {
        expect(VersionTypeSchema.parse(type)).toBe(type);
      }
    });

    test("rejects anything else", () => {
      expect(VersionTypeSchema.safeParse("latest").success).toBe(false);
      expect(VersionTypeSchema.safeParse("").success).toBe(false);
    });
  });

  describe("SettingsSchema", () => {
    test("treats null (empty YAML document) as defaults", () => {
      expect(SettingsSchema.parse(null)).toEqual({ tools: [] });
    });

    test("parses a full settings document", () => {
      const settings = SettingsSchema.parse({
        prefix: "/opt/local",
        adminGroup: "staff",
        jobs: 3,
        logLevel: "debug",
        toolchains: ["rust", "go"],
        tools: ["bat", "fzf"],
        configRepoTemplate: "https://example.com/config.{tool}.git",
        githubToken: "test-token",
      });

      expect(settings.prefix).toBe("/opt/local");
      expect(settings.jobs).toBe(3);
      expect(settings.toolchains).toEqual(["rust", "go"]);
      expect(settings.tools).toEqual(["bat", "fzf"]);
    });

    test("rejects relative prefix", () => {
      const result = SettingsSchema.safeParse({ prefix: "opt/local" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe("prefix must be an absolute path");
      }
    });

    test("rejects config repo template without placeholder", () => {
      const result = SettingsSchema.safeParse({ configRepoTemplate: "https://example.com/config.git" });

      expect(result.success).toBe(false);
    });

    test("rejects unknown toolchains", () => {
      expect(SettingsSchema.safeParse({ toolchains: ["java"] }).success).toBe(false);
    });

    test("rejects unknown keys", () => {
      expect(SettingsSchema.safeParse({ prefx: "/opt/local" }).success).toBe(false);
    });

    test("rejects non-positive jobs", () => {
      expect(SettingsSchema.safeParse({ jobs: 0 }).success).toBe(false);
    });
  });

  describe("GitHubReleaseSchema", () => {
    test("defaults assets to an empty list", () => {
      expect(GitHubReleaseSchema.parse({ tag_name: "0.4.1" })).toEqual({ tag_name: "0.4.1", assets: [] });
    });

    test("requires a tag name", () => {
      expect(GitHubReleaseSchema.safeParse({ assets: [] }).success).toBe(false);
    });
  });

  describe("GoReleasesSchema", () => {
    test("accepts go.dev release entries", () => {
      const releases = GoReleasesSchema.parse([
        { version: "go1.22.1", stable: true, files: [] },
        { version: "go1.21.8", stable: true },
      ]);

      expect(releases.map((r) => r.version)).toEqual(["go1.22.1", "go1.21.8"]);
    });

    test("rejects versions without go prefix", () => {
      expect(GoReleasesSchema.safeParse([{ version: "1.22.1", stable: true }]).success).toBe(false);
    });
  });

  describe("ZigTarballEntrySchema", () => {
    test("accepts string or number sizes", () => {
      expect(
        ZigTarballEntrySchema.safeParse({ tarball: "https://example.com/zig.tar.xz", size: "123" }).success
      ).toBe(true);
      expect(
        ZigTarballEntrySchema.safeParse({ tarball: "https://example.com/zig.tar.xz", size: 123 }).success
      ).toBe(true);
    });
  });
});
