/**
 * Version module
 *
 * Version extraction, comparison and release-tag selection.
 */

export {
  extractVersion,
  normalizeTag,
  isValidSemver,
  compareVersions,
  sortVersionsDesc,
  selectLatestTag,
  sameVersion,
} from "./version";
