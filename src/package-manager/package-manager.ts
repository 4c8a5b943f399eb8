/**
 * System package manager adapter
 *
 * One client per run, chosen by platform detection. apt, dnf and pacman
 * run through the privileged shell; Homebrew refuses to run as root and is
 * always invoked as the calling user.
 */

import { errorMessage, exitCodeOf, type EngineContext, type PrivilegedShell } from "#/core";
import type { PackageManagerKind } from "#/platform";
import type { PackageManagerClient, PackageResult, PackageSet } from "./package-manager.types";

interface CommandSpec {
  command: string;
  args: string[];
  /** Exit codes other than 0 that still mean success */
  okExitCodes?: number[];
}

interface ManagerDefinition {
  env: Record<string, string>;
  update: CommandSpec;
  install: (packages: string[]) => CommandSpec;
  remove: (packages: string[]) => CommandSpec;
  binaryPrefixes: string[];
}

const LINUX_BINARY_PREFIXES = ["/usr/bin/", "/bin/", "/usr/sbin/", "/sbin/"];

const MANAGERS: Record<PackageManagerKind, ManagerDefinition> = {
  apt: {
    env: { DEBIAN_FRONTEND: "noninteractive" },
    update: { command: "apt-get", args: ["update", "-q"] },
    install: (packages) => ({ command: "apt-get", args: ["install", "-y", "-q", ...packages] }),
    remove: (packages) => ({ command: "apt-get", args: ["remove", "-y", "-q", ...packages] }),
    binaryPrefixes: LINUX_BINARY_PREFIXES,
  },
  dnf: {
    env: {},
    // check-update exits 100 when updates are available
    update: { command: "dnf", args: ["check-update", "-q"], okExitCodes: [100] },
    install: (packages) => ({ command: "dnf", args: ["install", "-y", "-q", ...packages] }),
    remove: (packages) => ({ command: "dnf", args: ["remove", "-y", "-q", ...packages] }),
    binaryPrefixes: LINUX_BINARY_PREFIXES,
  },
  pacman: {
    env: {},
    update: { command: "pacman", args: ["-Sy", "--noconfirm"] },
    install: (packages) => ({ command: "pacman", args: ["-S", "--needed", "--noconfirm", ...packages] }),
    remove: (packages) => ({ command: "pacman", args: ["-R", "--noconfirm", ...packages] }),
    binaryPrefixes: LINUX_BINARY_PREFIXES,
  },
  brew: {
    env: { HOMEBREW_NO_AUTO_UPDATE: "1", HOMEBREW_NO_INSTALL_CLEANUP: "1" },
    update: { command: "brew", args: ["update", "--quiet"] },
    install: (packages) => ({ command: "brew", args: ["install", "--quiet", ...packages] }),
    remove: (packages) => ({ command: "brew", args: ["uninstall", "--ignore-dependencies", ...packages] }),
    binaryPrefixes: ["/opt/homebrew/", "/usr/local/Cellar/", "/home/linuxbrew/.linuxbrew/"],
  },
};

export function isPackageManagedPath(kind: PackageManagerKind, path: string): boolean {
  return MANAGERS[kind].binaryPrefixes.some((prefix) => path.startsWith(prefix));
}

export function createPackageManager(
  ctx: EngineContext,
  privileged: PrivilegedShell,
  kind: PackageManagerKind
): PackageManagerClient {
  const definition = MANAGERS[kind];
  const usesSudo = kind !== "brew";

  const execute = (spec: CommandSpec): PackageResult => {
    try {
      if (usesSudo) {
        privileged.run(spec.command, spec.args, { env: definition.env });
      } else {
        ctx.shell.execFile(spec.command, spec.args, { env: definition.env });
      }
      return { success: true };
    } catch (err) {
      const code = exitCodeOf(err);
      if (code !== null && spec.okExitCodes?.includes(code)) {
        return { success: true };
      }
      return { success: false, error: errorMessage(err) };
    }
  };

  return {
    kind,

    update() {
      if (usesSudo && privileged.mode === "unprivileged") {
        ctx.logger.warn("No non-interactive sudo access. Skipping package manager update.");
        return { success: false, skipped: true };
      }

      ctx.logger.info(`Updating ${kind} package index...`);
      const result = execute(definition.update);
      if (!result.success) {
        ctx.logger.warn(`Package index update failed: ${result.error}`);
      }
      return result;
    },

    install(packages) {
      if (packages.length === 0) return { success: true, skipped: true };
      ctx.logger.info(`Installing with ${kind}: ${packages.join(" ")}`);
      return execute(definition.install(packages));
    },

    remove(packages) {
      if (packages.length === 0) return { success: true, skipped: true };
      ctx.logger.info(`Removing with ${kind}: ${packages.join(" ")}`);
      return execute(definition.remove(packages));
    },

    isManagedBinary: (path) => isPackageManagedPath(kind, path),

    packagesFor: (set) => set?.[kind] ?? [],
  };
}
