/**
 * Download module
 */

export type {
  DownloadResult,
  ExtractOptions,
  ExtractResult,
  DownloadAndExtractOptions,
} from "./download.types";

export { fileNameFromUrl, downloadToFile, extractArchive, downloadAndExtract } from "./download";
