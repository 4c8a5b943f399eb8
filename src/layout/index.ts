/**
 * Layout module
 *
 * Prefix resolution and the directory tree dotstrap installs into.
 */

export type { InstallLayout, EnsureDirOptions } from "./layout.types";

export {
  layoutFor,
  resolvePrefix,
  findExistingPrefix,
  ensureDir,
  ensureLayout,
  createManagedSymlink,
  installBinary,
  writeManagedFile,
  removePath,
} from "./layout";
