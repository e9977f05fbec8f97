/**
 * Binary download module: release negotiation, download and installation.
 */

export { BinaryDownloadError, ArchiveError, VersionNegotiationError } from "./errors";
export type { BinaryDownloadErrorCode, ArchiveErrorCode, VersionNegotiationErrorCode } from "./errors";
export {
  DefaultArchiveExtractor,
  TarExtractor,
  ZipExtractor,
  type ArchiveExtractor,
  type FormatExtractor,
} from "./archive-extractor";
export {
  GitHubReleaseClient,
  type GitHubReleaseClientDeps,
  type Release,
  type ReleaseAsset,
  type ReleaseClient,
  type ReleaseQueryOptions,
} from "./release-client";
export {
  DefaultVersionNegotiator,
  normalizeTarballUrl,
  parseReleaseVersion,
  ReleaseVersionSchema,
  type NegotiatedRelease,
  type VersionNegotiator,
  type VersionNegotiatorDeps,
} from "./version-negotiator";
export {
  DefaultArtifactFetcher,
  type ArtifactFetcher,
  type ArtifactFetcherDeps,
  type FetchRequest,
} from "./artifact-fetcher";
