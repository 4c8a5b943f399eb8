import { z } from "zod";
import { TOOLCHAIN_NAMES, VERSION_TYPES } from "#/constants";

// Version selection mode of a tool (tools.conf)
export const VersionTypeSchema = z.enum(VERSION_TYPES);
export type VersionType = z.infer<typeof VersionTypeSchema>;

export const ToolchainNameSchema = z.enum(TOOLCHAIN_NAMES);
export type ToolchainName = z.infer<typeof ToolchainNameSchema>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

// Settings (settings.yaml)
export const SettingsObjectSchema = z
  .object({
    prefix: z.string().startsWith("/", { message: "prefix must be an absolute path" }).optional(),
    adminGroup: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, { message: "adminGroup must be a group name" })
      .optional(),
    jobs: z.number().int().positive().optional(),
    logLevel: LogLevelSchema.optional(),
    toolchains: z.array(ToolchainNameSchema).optional(),
    tools: z.array(z.string().min(1)).default([]),
    configRepoTemplate: z
      .string()
      .includes("{tool}", { message: "configRepoTemplate must contain {tool}" })
      .optional(),
    githubToken: z.string().min(1).nullish(),
  })
  .strict();

// An empty file means all defaults
export const SettingsSchema = z.preprocess((raw) => raw ?? {}, SettingsObjectSchema);
export type Settings = z.infer<typeof SettingsObjectSchema>;

// Values that may also come from the environment or the command line
export const SettingsOverridesSchema = SettingsObjectSchema.pick({
  prefix: true,
  logLevel: true,
  jobs: true,
  githubToken: true,
});
export type SettingsOverrides = z.infer<typeof SettingsOverridesSchema>;

// GitHub REST: GET /repos/{owner}/{repo}/releases/latest (fields we use)
export const GitHubReleaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string().url(),
  size: z.number().int().nonnegative(),
});

export const GitHubReleaseSchema = z.object({
  tag_name: z.string().min(1),
  assets: z.array(GitHubReleaseAssetSchema).default([]),
});
export type GitHubRelease = z.infer<typeof GitHubReleaseSchema>;

// https://go.dev/dl/?mode=json
export const GoReleasesSchema = z.array(
  z.object({
    version: z.string().regex(/^go\d/),
    stable: z.boolean(),
  })
);

// https://ziglang.org/download/index.json: "master" plus one key per release,
// each holding "<arch>-<os>" entries with a tarball URL
export const ZigIndexSchema = z.record(
  z.string(),
  z
    .object({
      version: z.string().optional(),
      date: z.string().optional(),
    })
    .catchall(z.unknown())
);

export const ZigTarballEntrySchema = z.object({
  tarball: z.string().url(),
  shasum: z.string().optional(),
  size: z.union([z.string(), z.number()]).optional(),
});
