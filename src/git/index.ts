/**
 * Git module
 */

export { createGitClient, type GitClient } from "./git";
