/**
 * GitHub module
 */

export type { RepoRef, ReleaseAsset, ReleaseInfo } from "./github.types";

export {
  GitHubReleasesClient,
  getGitHubHeaders,
  parseRepoUrl,
  buildLatestAssetUrl,
} from "./github";
