/**
 * GitHub releases client
 *
 * Only the latest-release endpoint is used: prebuilt binaries (oh-my-posh,
 * uv) are downloaded from the newest release. Anonymous requests are
 * rate-limited to 60/hour, so a token from settings or GITHUB_TOKEN is sent
 * when configured.
 *
 * @see https://docs.github.com/en/rest/releases/releases#get-the-latest-release
 */

import type { HttpClient } from "#/core";
import { GITHUB_API_URL, GITHUB_URL, USER_AGENT } from "#/constants";
import { GitHubReleaseSchema } from "#/schemas";
import type { ReleaseInfo, RepoRef } from "./github.types";

/**
 * Get headers for GitHub API requests.
 */
export function getGitHubHeaders(token?: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return headers;
}

/**
 * Parse owner and repository from a GitHub URL.
 *
 * @example parseRepoUrl("https://github.com/sharkdp/bat.git") → { owner: "sharkdp", repo: "bat" }
 * @example parseRepoUrl("git@github.com:junegunn/fzf.git") → { owner: "junegunn", repo: "fzf" }
 */
export function parseRepoUrl(url: string): RepoRef | null {
  const match = url.match(/github\.com[/:]([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match?.[1] || !match[2]) return null;
  return { owner: match[1], repo: match[2] };
}

/**
 * URL that always redirects to the asset of the newest release.
 */
export function buildLatestAssetUrl(owner: string, repo: string, asset: string): string {
  return `${GITHUB_URL}/${owner}/${repo}/releases/latest/download/${asset}`;
}

export class GitHubReleasesClient {
  private http: HttpClient;
  private token?: string | null;
  private apiUrl: string;

  constructor(http: HttpClient, token?: string | null, apiUrl: string = GITHUB_API_URL) {
    this.http = http;
    this.token = token;
    this.apiUrl = apiUrl;
  }

  /**
   * Latest non-prerelease release, or null on any HTTP or payload error.
   */
  async getLatestRelease(owner: string, repo: string): Promise<ReleaseInfo | null> {
    const url = `${this.apiUrl}/repos/${owner}/${repo}/releases/latest`;

    try {
      const response = await this.http.fetch(url, { headers: getGitHubHeaders(this.token) });
      if (!response.ok) {
        return null;
      }

      const parsed = GitHubReleaseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return null;
      }

      return {
        tag: parsed.data.tag_name,
        assets: parsed.data.assets.map((asset) => ({
          name: asset.name,
          url: asset.browser_download_url,
          size: asset.size,
        })),
      };
    } catch {
      return null;
    }
  }
}
