/**
 * Tool catalogue
 *
 * Recipes in installation order. bat-extras runs after bat, which it
 * requires.
 */

import { join } from "path";
import { downloadAndExtract } from "#/download";
import type { InstallEnv } from "#/environment";
import { buildLatestAssetUrl } from "#/github";
import { ensureDir } from "#/layout";
import type { PackageSet } from "#/package-manager";
import type { PlatformInfo } from "#/platform";
import type { AfterInstallContext, ToolRecipe } from "./tools.types";

// Tags like 3.4 or 3.3a (tmux has no v prefix and uses letter releases)
const LETTER_SUFFIX_TAG = /^\d+(\.\d+)*[a-z]?$/;

const RUST_BUILD_DEPS: PackageSet = {
  apt: ["cmake", "pkg-config", "libssl-dev"],
  dnf: ["cmake", "pkgconf-pkg-config", "openssl-devel"],
  pacman: ["cmake", "pkgconf", "openssl"],
  brew: ["cmake", "pkg-config", "openssl@3"],
};

const C_BUILD_DEPS: PackageSet = {
  apt: ["build-essential"],
  dnf: ["make", "gcc"],
  pacman: ["base-devel"],
};

function samePackageEverywhere(name: string): PackageSet {
  return { apt: [name], dnf: [name], pacman: [name], brew: [name] };
}

function poshArch(platform: PlatformInfo): string {
  switch (platform.arch) {
    case "x86_64":
      return "amd64";
    case "aarch64":
      return "arm64";
    case "armv7l":
      return "arm";
  }
}

function uvTarget(platform: PlatformInfo): string | null {
  if (platform.arch === "armv7l") return null;
  const system = platform.osType === "macos" ? "apple-darwin" : "unknown-linux-musl";
  return `uv-${platform.arch}-${system}`;
}

export function fzfShellDir(env: InstallEnv): string {
  return join(env.ctx.system.homeDir, ".local", "share", "fzf");
}

/**
 * Copy fzf's zsh integration into the invoking user's data directory.
 */
async function installFzfShellFiles(env: InstallEnv, { repoDir }: AfterInstallContext): Promise<void> {
  if (!repoDir) return;
  const { fs, logger } = env.ctx;
  const shellDir = join(repoDir, "shell");
  const target = fzfShellDir(env);

  const scripts = fs.readdir(shellDir).filter((file) => file.endsWith(".zsh"));
  fs.mkdir(target, { recursive: true });
  for (const script of scripts) {
    fs.copyFile(join(shellDir, script), join(target, script));
  }
  logger.debug(`Copied ${scripts.length} fzf shell scripts to ${target}`);
}

export function poshThemesDir(env: InstallEnv): string {
  return join(env.layout.prefix, "share", "oh-my-posh", "themes");
}

async function installPoshThemes(env: InstallEnv): Promise<void> {
  const themesDir = poshThemesDir(env);
  const group = env.platform.adminGroup;
  for (const dir of [join(env.layout.prefix, "share", "oh-my-posh"), themesDir]) {
    if (!ensureDir(env.ctx, env.privileged, dir, { group })) {
      throw new Error(`Cannot create ${dir}`);
    }
  }

  const url = buildLatestAssetUrl("JanDeDobbeleer", "oh-my-posh", "themes.zip");
  const result = await downloadAndExtract(env.ctx, env.privileged, url, themesDir, { format: "zip" });
  if (!result.success) {
    throw new Error(`Could not install oh-my-posh themes: ${result.error}`);
  }
}

export const TOOL_RECIPES: readonly ToolRecipe[] = [
  {
    name: "bat",
    description: "cat clone with syntax highlighting",
    repo: "https://github.com/sharkdp/bat",
    binary: "bat",
    versionArgs: ["--version"],
    dependencies: RUST_BUILD_DEPS,
    packages: samePackageEverywhere("bat"),
    build: { kind: "cargo" },
    requires: ["cargo"],
    // Debian ships the binary as batcat; scripts written for it keep working
    extraLinks: [{ name: "batcat", when: (platform) => platform.packageManager === "apt" }],
  },
  {
    name: "bat-extras",
    description: "Scripts built around bat (batdiff, batgrep, batman, ...)",
    repo: "https://github.com/eth-p/bat-extras",
    binary: "batdiff",
    versionArgs: ["--version"],
    dependencies: { apt: ["shfmt"], dnf: ["shfmt"], pacman: ["shfmt"], brew: ["shfmt"] },
    packages: samePackageEverywhere("bat-extras"),
    build: { kind: "script", command: "./build.sh", args: (prefix) => [`--prefix=${prefix}`, "--install"] },
    requires: ["bat"],
  },
  {
    name: "delta",
    description: "Syntax-highlighting pager for git diffs",
    repo: "https://github.com/dandavison/delta",
    binary: "delta",
    versionArgs: ["--version"],
    dependencies: RUST_BUILD_DEPS,
    packages: { apt: ["git-delta"], dnf: ["git-delta"], pacman: ["git-delta"], brew: ["git-delta"] },
    build: { kind: "cargo" },
    requires: ["cargo"],
  },
  {
    name: "figlet",
    description: "Large letters out of ordinary text",
    repo: "https://github.com/cmatsuoka/figlet",
    binary: "figlet",
    versionArgs: ["-v"],
    followsBranch: true,
    dependencies: C_BUILD_DEPS,
    packages: samePackageEverywhere("figlet"),
    build: { kind: "make", target: "all", installVars: (prefix) => [`prefix=${prefix}`] },
  },
  {
    name: "fzf",
    description: "Command-line fuzzy finder",
    repo: "https://github.com/junegunn/fzf",
    binary: "fzf",
    versionArgs: ["--version"],
    packages: samePackageEverywhere("fzf"),
    build: { kind: "make", clean: true, target: "install", artifact: "bin/fzf" },
    requires: ["go"],
    afterInstall: installFzfShellFiles,
  },
  {
    name: "lazygit",
    description: "Terminal UI for git",
    repo: "https://github.com/jesseduffield/lazygit",
    binary: "lazygit",
    versionArgs: ["--version"],
    packages: { pacman: ["lazygit"], brew: ["lazygit"] },
    build: { kind: "go" },
    requires: ["go"],
  },
  {
    name: "lolcat",
    description: "Rainbow colouring for terminal output",
    repo: "https://github.com/busyloop/lolcat",
    binary: "lolcat",
    versionArgs: ["--version"],
    dependencies: {
      apt: ["ruby-dev", "build-essential"],
      dnf: ["ruby-devel", "make", "gcc"],
      pacman: ["base-devel"],
    },
    packages: samePackageEverywhere("lolcat"),
    build: { kind: "gem", gemspec: "lolcat.gemspec" },
    requires: ["ruby", "gem"],
  },
  {
    name: "neovim",
    description: "Vim-fork focused on extensibility",
    repo: "https://github.com/neovim/neovim",
    binary: "nvim",
    versionArgs: ["--version"],
    dependencies: {
      apt: ["ninja-build", "gettext", "cmake", "unzip", "curl", "build-essential"],
      dnf: ["ninja-build", "cmake", "gcc", "make", "gettext", "unzip", "curl"],
      pacman: ["base-devel", "cmake", "ninja", "unzip", "curl"],
      brew: ["ninja", "cmake", "gettext", "curl"],
    },
    packages: samePackageEverywhere("neovim"),
    build: { kind: "cmake-make" },
  },
  {
    name: "oh-my-posh",
    description: "Prompt theme engine",
    repo: "https://github.com/JanDeDobbeleer/oh-my-posh",
    binary: "oh-my-posh",
    versionArgs: ["--version"],
    packages: { brew: ["jandedobbeleer/oh-my-posh/oh-my-posh"] },
    build: { kind: "release" },
    prebuilt: {
      always: true,
      asset: (platform) => `posh-${platform.osType === "macos" ? "darwin" : "linux"}-${poshArch(platform)}`,
      format: "binary",
    },
    afterInstall: installPoshThemes,
  },
  {
    name: "tmux",
    description: "Terminal multiplexer",
    repo: "https://github.com/tmux/tmux",
    binary: "tmux",
    versionArgs: ["-V"],
    tagPattern: LETTER_SUFFIX_TAG,
    dependencies: {
      apt: ["libevent-dev", "libncurses-dev", "automake", "pkg-config", "build-essential", "bison"],
      dnf: ["libevent-devel", "ncurses-devel", "automake", "pkgconf-pkg-config", "make", "gcc", "bison"],
      pacman: ["libevent", "ncurses", "automake", "pkgconf", "make", "gcc", "bison"],
      brew: ["libevent", "ncurses", "automake", "pkg-config"],
    },
    packages: samePackageEverywhere("tmux"),
    build: { kind: "autotools" },
    replacesPackage: true,
  },
  {
    name: "tv",
    description: "Fuzzy finder for files, text and more (television)",
    repo: "https://github.com/alexpasmantier/television",
    binary: "tv",
    versionArgs: ["--version"],
    branches: ["main", "master"],
    stableRef: "0.10.6",
    dependencies: { apt: ["make"], dnf: ["make"], pacman: ["make"], brew: ["make"] },
    packages: { pacman: ["television"], brew: ["television"] },
    build: { kind: "cargo", makeTarget: "release" },
    requires: ["cargo"],
    replacesPackage: true,
  },
  {
    name: "uv",
    description: "Python package and project manager",
    repo: "https://github.com/astral-sh/uv",
    binary: "uv",
    versionArgs: ["--version"],
    branches: ["main"],
    dependencies: RUST_BUILD_DEPS,
    packages: { pacman: ["uv"], brew: ["uv"] },
    build: { kind: "cargo" },
    prebuilt: {
      asset: (platform) => {
        const target = uvTarget(platform);
        return target ? `${target}.tar.gz` : null;
      },
      format: "tar.gz",
      stripComponents: 1,
    },
    requires: ["cargo"],
    replacesPackage: true,
  },
  {
    name: "yazi",
    description: "Terminal file manager",
    repo: "https://github.com/sxyazi/yazi",
    binary: "yazi",
    versionArgs: ["--version"],
    dependencies: {
      ...RUST_BUILD_DEPS,
      apt: ["pkg-config", "libglib2.0-dev", "ffmpegthumbnailer", "unar"],
    },
    packages: { pacman: ["yazi"], brew: ["yazi"] },
    build: { kind: "cargo", binaries: ["yazi", "ya"] },
    requires: ["cargo"],
  },
  {
    name: "zoxide",
    description: "Smarter cd command",
    repo: "https://github.com/ajeetdsouza/zoxide",
    binary: "zoxide",
    versionArgs: ["--version"],
    packages: samePackageEverywhere("zoxide"),
    build: { kind: "cargo" },
    requires: ["cargo"],
  },
];

export const TOOL_NAMES: readonly string[] = TOOL_RECIPES.map((recipe) => recipe.name);

export function getRecipe(name: string): ToolRecipe | null {
  return TOOL_RECIPES.find((recipe) => recipe.name === name) ?? null;
}
