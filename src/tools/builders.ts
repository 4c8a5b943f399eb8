/**
 * Source builders
 *
 * One builder per build system. Every builder runs in the cache repository
 * through the privileged shell and leaves the tool's binary in <prefix>/bin.
 */

import { join } from "path";
import type { ExecOptions } from "#/core";
import { buildPath, rustEnv, type InstallEnv } from "#/environment";
import { installBinary } from "#/layout";
import { sortVersionsDesc } from "#/version";
import type { BuildSpec, ToolRecipe } from "./tools.types";

// Keeps rustc within a Raspberry Pi's memory
const CONSTRAINED_RUSTFLAGS = "-C codegen-units=1 -C opt-level=s";

const DEFAULT_CMAKE_BUILD_TYPE = "RelWithDebInfo";

function buildOptions(repoDir: string, env: Record<string, string>): ExecOptions {
  return { cwd: repoDir, env, stdio: "inherit" };
}

export function cargoEnv(env: InstallEnv): Record<string, string> {
  const vars: Record<string, string> = { ...rustEnv(env), CARGO_BUILD_JOBS: String(env.cargoJobs) };
  if (env.platform.osType === "raspberrypi") {
    vars.RUSTFLAGS = CONSTRAINED_RUSTFLAGS;
  }
  return vars;
}

export function goPath(env: InstallEnv, tool: string): string {
  return join(env.layout.cacheDir, ".gopath", tool);
}

/**
 * Newest `.gem` file in the repository after `gem build`.
 */
export function findBuiltGem(env: InstallEnv, repoDir: string, gemspec: string): string {
  const name = gemspec.replace(/\.gemspec$/, "");
  const versions = env.ctx.fs
    .readdir(repoDir)
    .filter((file) => file.startsWith(`${name}-`) && file.endsWith(".gem"))
    .map((file) => file.slice(name.length + 1, -".gem".length));

  // git clean keeps ignored files, so gems from earlier builds are still here
  const newest = sortVersionsDesc(versions)[0];
  if (newest === undefined) {
    throw new Error(`gem build produced no ${name} gem in ${repoDir}`);
  }
  return join(repoDir, `${name}-${newest}.gem`);
}

/**
 * Build `recipe` in `repoDir` and install it into the prefix.
 * Throws on the first failing command.
 */
export function buildTool(env: InstallEnv, recipe: ToolRecipe, repoDir: string): void {
  const { privileged, layout } = env;
  const build: BuildSpec = recipe.build;
  const pathEnv = { PATH: buildPath(env) };
  const options = buildOptions(repoDir, pathEnv);
  const makeJobs = `-j${env.jobs}`;

  switch (build.kind) {
    case "cargo": {
      const cargoOptions = buildOptions(repoDir, cargoEnv(env));
      if (build.makeTarget) {
        privileged.run("make", [build.makeTarget], cargoOptions);
      } else {
        privileged.run("cargo", ["build", "--release"], cargoOptions);
      }
      for (const binary of build.binaries ?? [recipe.binary]) {
        installBinary(privileged, join(repoDir, "target", "release", binary), layout.bin);
      }
      return;
    }

    case "go": {
      const output = build.output ?? recipe.binary;
      const gopath = goPath(env, recipe.name);
      privileged.run("mkdir", ["-p", gopath]);
      privileged.run("go", ["build", "-o", output], buildOptions(repoDir, { ...pathEnv, GOPATH: gopath }));
      installBinary(privileged, join(repoDir, output), layout.bin, recipe.binary);
      return;
    }

    case "make": {
      if (build.clean) {
        privileged.tryRun("make", ["clean"], options);
      }
      privileged.run("make", build.target ? [makeJobs, build.target] : [makeJobs], options);
      if (build.artifact) {
        installBinary(privileged, join(repoDir, build.artifact), layout.bin, recipe.binary);
      } else {
        privileged.run("make", ["install", ...(build.installVars?.(layout.prefix) ?? [])], options);
      }
      return;
    }

    case "autotools":
      privileged.run("sh", ["autogen.sh"], options);
      privileged.run("./configure", [`--prefix=${layout.prefix}`], options);
      privileged.run("make", [makeJobs], options);
      privileged.run("make", ["install"], options);
      return;

    case "cmake-make":
      privileged.run(
        "make",
        [
          makeJobs,
          `CMAKE_BUILD_TYPE=${build.buildType ?? DEFAULT_CMAKE_BUILD_TYPE}`,
          `CMAKE_INSTALL_PREFIX=${layout.prefix}`,
        ],
        options
      );
      privileged.run("make", ["install"], options);
      return;

    case "gem": {
      privileged.run("gem", ["build", build.gemspec], options);
      const gem = findBuiltGem(env, repoDir, build.gemspec);
      privileged.run("gem", ["install", "--no-user-install", "--no-document", "--bindir", layout.bin, gem], options);
      return;
    }

    case "script":
      privileged.run(build.command, build.args(layout.prefix), options);
      return;

    case "release":
      throw new Error(`${recipe.name} is only distributed as a release binary`);
  }
}
