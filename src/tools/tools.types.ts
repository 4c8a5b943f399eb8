/**
 * Tool types
 *
 * A recipe declares where a tool comes from and how it is built; the
 * installer drives every recipe through the same state machine.
 */

import type { InstallEnv } from "#/environment";
import type { PackageSet } from "#/package-manager";
import type { PlatformInfo } from "#/platform";

export type ToolStatus = "installed" | "updated" | "current" | "skipped" | "failed";

export type InstallMethod = "source" | "package" | "prebuilt";

export interface ToolResult {
  name: string;
  status: ToolStatus;
  method?: InstallMethod;
  version?: string | null;
  error?: string;
}

export interface ToolOptions {
  /** Rebuild even when the recorded commit is already installed */
  force?: boolean;
}

/** `cargo build --release`, or `make <makeTarget>` for crates with a Makefile wrapper */
export interface CargoBuildSpec {
  kind: "cargo";
  /** Binaries copied from target/release, default the recipe binary */
  binaries?: string[];
  makeTarget?: string;
}

export interface GoBuildSpec {
  kind: "go";
  /** Output file, default the recipe binary */
  output?: string;
}

export interface MakeBuildSpec {
  kind: "make";
  target?: string;
  /** `make clean` first */
  clean?: boolean;
  /** Copy this file instead of running `make install` */
  artifact?: string;
  /** Extra `make install` arguments */
  installVars?: (prefix: string) => string[];
}

export interface AutotoolsBuildSpec {
  kind: "autotools";
}

export interface CmakeMakeBuildSpec {
  kind: "cmake-make";
  buildType?: string;
}

export interface GemBuildSpec {
  kind: "gem";
  gemspec: string;
}

export interface ScriptBuildSpec {
  kind: "script";
  command: string;
  args: (prefix: string) => string[];
}

/** Installed from a release download only */
export interface ReleaseBuildSpec {
  kind: "release";
}

export type BuildSpec =
  | CargoBuildSpec
  | GoBuildSpec
  | MakeBuildSpec
  | AutotoolsBuildSpec
  | CmakeMakeBuildSpec
  | GemBuildSpec
  | ScriptBuildSpec
  | ReleaseBuildSpec;

export interface PrebuiltSpec {
  /** Never build from source */
  always?: boolean;
  /** Release asset for the platform, null when none is published */
  asset(platform: PlatformInfo): string | null;
  /** "binary" assets are the executable itself */
  format: "binary" | "tar.gz";
  stripComponents?: number;
}

export interface ExtraLink {
  name: string;
  when?: (platform: PlatformInfo) => boolean;
}

export interface AfterInstallContext {
  repoDir: string | null;
}

export interface ToolRecipe {
  name: string;
  description: string;
  repo: string;
  /** Executable used for detection and verification */
  binary: string;
  versionArgs: string[];
  tagPattern?: RegExp;
  /** Default branches to try, in order */
  branches?: string[];
  /** Ref built for `stable` instead of the latest tag */
  stableRef?: string;
  /** The project publishes no release tags; `stable` builds the default branch */
  followsBranch?: boolean;
  /** Build dependencies */
  dependencies?: PackageSet;
  /** Package-manager packages for `managed` installs */
  packages?: PackageSet;
  build: BuildSpec;
  prebuilt?: PrebuiltSpec;
  /** Remove a package-manager copy before installing into the prefix */
  replacesPackage?: boolean;
  /** Commands that must already be installed */
  requires?: string[];
  extraLinks?: ExtraLink[];
  afterInstall?: (env: InstallEnv, context: AfterInstallContext) => Promise<void>;
}
