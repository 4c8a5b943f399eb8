/**
 * Rust via rustup, with RUSTUP_HOME and CARGO_HOME inside <toolchains>/rust.
 */

import { join } from "path";
import { errorMessage } from "#/core";
import { RUSTUP_INIT_URL } from "#/constants";
import { downloadToFile } from "#/download";
import { rustEnv, toolchainDir, type InstallEnv } from "#/environment";
import { ensureDir } from "#/layout";
import { linkBinaries, probeVersion } from "./shared";
import type { Toolchain, ToolchainResult } from "./toolchains.types";

const RUST_BINARIES = ["cargo", "rustc", "rustup"];

async function runRustupInit(env: InstallEnv, rustDir: string): Promise<void> {
  const { fs } = env.ctx;
  const group = env.platform.adminGroup;

  for (const dir of [rustDir, join(rustDir, "rustup"), join(rustDir, "cargo")]) {
    if (!ensureDir(env.ctx, env.privileged, dir, { group })) {
      throw new Error(`Cannot create ${dir}`);
    }
  }

  const tempDir = fs.makeTempDir("dotstrap-rustup-");
  try {
    const installer = join(tempDir, "rustup-init.sh");
    const download = await downloadToFile(env.ctx, RUSTUP_INIT_URL, installer);
    if (!download.success) {
      throw new Error(`rustup download failed: ${download.error}`);
    }
    env.privileged.run("sh", [installer, "-y", "--no-modify-path"], { env: rustEnv(env), cwd: tempDir });
  } finally {
    fs.rmdir(tempDir, { recursive: true });
  }

  // rustup writes its files with the invoking user's umask
  env.privileged.tryRun("chown", ["-R", `root:${group}`, rustDir]);
  env.privileged.tryRun("chmod", ["-R", "g+w", rustDir]);
}

export const rustToolchain: Toolchain = {
  name: "rust",
  label: "Rust",

  async install(env, options): Promise<ToolchainResult> {
    const { fs, logger } = env.ctx;
    const rustDir = toolchainDir(env, "rust");
    const cargoBinDir = join(rustDir, "cargo", "bin");
    const rustup = join(cargoBinDir, "rustup");
    const rustc = join(cargoBinDir, "rustc");

    logger.info("Processing Rust toolchain...");

    if (options.force || !fs.exists(rustup)) {
      await runRustupInit(env, rustDir);
      linkBinaries(
        env,
        cargoBinDir,
        RUST_BINARIES.map((name): [string, string] => [name, name])
      );

      if (!fs.exists(rustc)) {
        logger.warn("Rust installation may not have completed successfully");
        return { name: "rust", state: "failed", version: null, error: `rustc not found at ${rustc}` };
      }
      return { name: "rust", state: "installed", version: probeVersion(env, rustc, ["--version"], rustEnv(env)) };
    }

    logger.info("Updating existing Rust installation...");
    const before = probeVersion(env, rustc, ["--version"], rustEnv(env));
    try {
      env.privileged.run(rustup, ["update"], { env: rustEnv(env) });
    } catch (err) {
      logger.warn(`rustup update failed: ${errorMessage(err)}`);
      return { name: "rust", state: "failed", version: before, error: errorMessage(err) };
    }

    const after = probeVersion(env, rustc, ["--version"], rustEnv(env));
    return { name: "rust", state: before !== null && before === after ? "current" : "updated", version: after };
  },
};
