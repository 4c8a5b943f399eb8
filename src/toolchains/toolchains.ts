/**
 * Toolchain runner
 *
 * Installs the requested toolchains in a fixed order. A failing toolchain is
 * logged and recorded; the rest still run.
 */

import { errorMessage } from "#/core";
import { TOOLCHAIN_NAMES } from "#/constants";
import type { InstallEnv } from "#/environment";
import type { ToolchainName } from "#/schemas";
import { condaToolchain } from "./conda";
import { goToolchain } from "./go";
import { perlToolchain } from "./perl";
import { rubyToolchain } from "./ruby";
import { rustToolchain } from "./rust";
import { zigToolchain } from "./zig";
import type { Toolchain, ToolchainOptions, ToolchainResult } from "./toolchains.types";

export const TOOLCHAINS: Record<ToolchainName, Toolchain> = {
  conda: condaToolchain,
  rust: rustToolchain,
  go: goToolchain,
  zig: zigToolchain,
  perl: perlToolchain,
  ruby: rubyToolchain,
};

export async function installToolchain(
  env: InstallEnv,
  toolchain: Toolchain,
  options: ToolchainOptions = {}
): Promise<ToolchainResult> {
  try {
    return await toolchain.install(env, options);
  } catch (err) {
    env.ctx.logger.error(errorMessage(err));
    env.ctx.logger.warn(`${toolchain.label} installation failed, continuing...`);
    return { name: toolchain.name, state: "failed", version: null, error: errorMessage(err) };
  }
}

/**
 * Install toolchains in catalogue order; `names` restricts the set.
 */
export async function runToolchains(
  env: InstallEnv,
  names: readonly ToolchainName[] = TOOLCHAIN_NAMES,
  options: ToolchainOptions = {}
): Promise<ToolchainResult[]> {
  env.ctx.logger.info("Starting toolchain installations...");
  const selected = TOOLCHAIN_NAMES.filter((name) => names.includes(name));

  const results: ToolchainResult[] = [];
  for (const name of selected) {
    results.push(await installToolchain(env, TOOLCHAINS[name], options));
  }
  return results;
}
