/**
 * Ruby from the system package manager (lolcat builds its gem with it).
 */

import { which } from "#/core";
import type { PackageSet } from "#/package-manager";
import { probeVersion } from "./shared";
import type { Toolchain, ToolchainResult } from "./toolchains.types";

// Interpreter plus headers for native gem extensions
export const RUBY_PACKAGES: PackageSet = {
  apt: ["ruby-full"],
  dnf: ["ruby", "ruby-devel"],
  pacman: ["ruby"],
  brew: ["ruby"],
};

export const rubyToolchain: Toolchain = {
  name: "ruby",
  label: "Ruby",

  async install(env, options): Promise<ToolchainResult> {
    const { fs, system, logger } = env.ctx;
    logger.info("Processing Ruby toolchain...");

    const existing = which(fs, system, "ruby", [env.layout.bin]);
    const current = existing ? probeVersion(env, existing, ["--version"]) : null;
    if (existing && !options.force) {
      return { name: "ruby", state: "current", version: current };
    }

    const result = env.packages.install(env.packages.packagesFor(RUBY_PACKAGES));
    if (!result.success) {
      throw new Error(`Package installation failed: ${result.error}`);
    }

    const installed = which(fs, system, "ruby", [env.layout.bin]);
    const version = installed ? probeVersion(env, installed, ["--version"]) : null;
    return { name: "ruby", state: existing ? "updated" : "installed", version };
  },
};
