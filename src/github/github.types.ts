/**
 * GitHub types
 */

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface ReleaseAsset {
  name: string;
  url: string;
  size: number;
}

export interface ReleaseInfo {
  tag: string;
  assets: ReleaseAsset[];
}
