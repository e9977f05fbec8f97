/**
 * Re-export binary download error types from central errors module.
 */

export type {
  BinaryDownloadErrorCode,
  ArchiveErrorCode,
  VersionNegotiationErrorCode,
} from "../errors";
export { BinaryDownloadError, ArchiveError, VersionNegotiationError } from "../errors";
