/**
 * Git operations on tool cache repositories.
 *
 * Cache repositories live under the root-owned prefix, so every command goes
 * through the privileged shell and names the repository as a safe directory
 * (git refuses to work in repositories owned by another user otherwise).
 * The commit last installed from a repository is stored as a ref inside it.
 */

import { join } from "path";
import { errorMessage, type FileSystem, type Logger, type PrivilegedShell } from "#/core";
import { DEFAULT_BRANCHES, INSTALLED_REF } from "#/constants";

// Network operations must fail instead of prompting for credentials
const NETWORK_ENV = { GIT_TERMINAL_PROMPT: "0" };

export interface GitClient {
  /** Clone when `dir` holds no repository, otherwise fetch tags and branches. */
  sync(url: string, dir: string): void;
  /** Discard local changes and untracked files. Returns false after a warning. */
  reset(dir: string): boolean;
  listTags(dir: string): string[];
  /** Commit hash of `ref`, or null when it does not resolve. */
  revParse(dir: string, ref: string): string | null;
  checkout(dir: string, ref: string): void;
  /** Check out the first existing branch and fast-forward it. Returns the branch. */
  checkoutDefaultBranch(dir: string, branches?: string[]): string;
  recordInstalled(dir: string, commit: string): void;
  installedCommit(dir: string): string | null;
  remoteExists(url: string): boolean;
  clone(url: string, dir: string): void;
}

export function createGitClient(fs: FileSystem, shell: PrivilegedShell, logger: Logger): GitClient {
  const git = (dir: string, args: string[], env?: Record<string, string>): string =>
    shell.run("git", ["-c", `safe.directory=${dir}`, "-C", dir, ...args], env ? { env } : {});

  const revParse = (dir: string, ref: string): string | null => {
    try {
      const hash = git(dir, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]).trim();
      return hash || null;
    } catch {
      return null;
    }
  };

  const clone = (url: string, dir: string): void => {
    shell.run("git", ["clone", "--quiet", url, dir], { env: NETWORK_ENV });
  };

  return {
    sync(url, dir) {
      if (fs.exists(join(dir, ".git"))) {
        logger.debug(`Fetching ${url} into ${dir}`);
        git(dir, ["fetch", "--quiet", "--tags", "--force", "origin"], NETWORK_ENV);
        return;
      }

      if (fs.exists(dir)) {
        shell.run("rm", ["-rf", dir]);
      }
      logger.debug(`Cloning ${url} into ${dir}`);
      clone(url, dir);
    },

    reset(dir) {
      try {
        git(dir, ["reset", "--quiet", "--hard"]);
        git(dir, ["clean", "-fdq"]);
        return true;
      } catch (err) {
        logger.warn(`Could not clean ${dir}: ${errorMessage(err)}`);
        return false;
      }
    },

    listTags(dir) {
      return git(dir, ["tag", "--list"])
        .split("\n")
        .map((tag) => tag.trim())
        .filter(Boolean);
    },

    revParse,

    checkout(dir, ref) {
      git(dir, ["-c", "advice.detachedHead=false", "checkout", "--quiet", "--force", ref]);
    },

    checkoutDefaultBranch(dir, branches = DEFAULT_BRANCHES) {
      for (const branch of branches) {
        if (revParse(dir, `refs/remotes/origin/${branch}`) === null && revParse(dir, branch) === null) {
          continue;
        }

        git(dir, ["checkout", "--quiet", "--force", branch]);
        try {
          git(dir, ["pull", "--quiet", "--ff-only", "origin", branch], NETWORK_ENV);
        } catch (err) {
          logger.warn(`Could not fast-forward ${branch} in ${dir}: ${errorMessage(err)}`);
        }
        return branch;
      }

      throw new Error(`No default branch found (tried ${branches.join(", ")})`);
    },

    recordInstalled(dir, commit) {
      git(dir, ["update-ref", INSTALLED_REF, commit]);
    },

    installedCommit: (dir) => revParse(dir, INSTALLED_REF),

    remoteExists(url) {
      try {
        shell.run("git", ["ls-remote", "--quiet", url, "HEAD"], { env: NETWORK_ENV });
        return true;
      } catch {
        return false;
      }
    },

    clone,
  };
}
