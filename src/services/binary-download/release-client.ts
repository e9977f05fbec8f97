/**
 * GitHub releases lookup for the unpinned resolution path.
 */

import { z } from "zod";
import type { Logger } from "../logging";
import type { HttpClient } from "../platform/network";
import { VersionNegotiationError } from "./errors";
import { getErrorMessage } from "../errors";

/**
 * Filter applied when picking the latest release.
 */
export interface ReleaseQueryOptions {
  /** Skip releases without published assets */
  readonly requireAssets: boolean;
  /** Pick pre-releases instead of stable releases */
  readonly preRelease: boolean;
}

export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
}

/**
 * A published release, identified by its tag.
 */
export interface Release {
  readonly version: string;
  readonly assets: readonly ReleaseAsset[];
}

/**
 * Source of published releases.
 */
export interface ReleaseClient {
  /**
   * Newest release of a repository matching the options.
   *
   * @param repository - `<owner>/<name>`
   * @throws VersionNegotiationError FETCH_FAILED, PARSE_FAILED or NO_MATCHING_RELEASE
   */
  latestRelease(repository: string, options: ReleaseQueryOptions): Promise<Release>;
}

const GitHubReleaseSchema = z.object({
  tag_name: z.string(),
  draft: z.boolean(),
  prerelease: z.boolean(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string(),
    })
  ),
});

const GitHubReleaseListSchema = z.array(GitHubReleaseSchema);

/**
 * Dependencies for GitHubReleaseClient.
 */
export interface GitHubReleaseClientDeps {
  readonly httpClient: HttpClient;
  readonly logger: Logger;
  /** Base URL of the REST API, e.g. `https://api.github.com` */
  readonly apiBaseUrl: string;
  readonly timeoutMs: number;
}

/**
 * ReleaseClient backed by the GitHub REST API.
 *
 * The releases list is returned newest first; the first non-draft entry
 * matching the options wins.
 */
export class GitHubReleaseClient implements ReleaseClient {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(deps: GitHubReleaseClientDeps) {
    this.httpClient = deps.httpClient;
    this.logger = deps.logger;
    this.apiBaseUrl = deps.apiBaseUrl.replace(/\/+$/, "");
    this.timeoutMs = deps.timeoutMs;
  }

  async latestRelease(repository: string, options: ReleaseQueryOptions): Promise<Release> {
    const url = `${this.apiBaseUrl}/repos/${repository}/releases`;
    this.logger.debug("Fetching releases", { repository });

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: this.timeoutMs,
        headers: { Accept: "application/vnd.github+json" },
      });
    } catch (error) {
      throw new VersionNegotiationError(
        `Failed to fetch releases of ${repository}: ${getErrorMessage(error)}`,
        "FETCH_FAILED"
      );
    }

    if (!response.ok) {
      throw new VersionNegotiationError(
        `HTTP ${response.status} fetching releases of ${repository}`,
        "FETCH_FAILED"
      );
    }

    let body: unknown;
    try {
      body = (await response.json()) as unknown;
    } catch (error) {
      throw new VersionNegotiationError(
        `Failed to parse releases of ${repository}: ${getErrorMessage(error)}`,
        "PARSE_FAILED"
      );
    }

    const parsed = GitHubReleaseListSchema.safeParse(body);
    if (!parsed.success) {
      throw new VersionNegotiationError(
        `Unexpected releases response for ${repository}: ${parsed.error.message}`,
        "PARSE_FAILED"
      );
    }

    const release = parsed.data.find(
      (candidate) =>
        !candidate.draft &&
        candidate.prerelease === options.preRelease &&
        (!options.requireAssets || candidate.assets.length > 0)
    );
    if (!release) {
      throw new VersionNegotiationError(
        `No release of ${repository} matches (preRelease=${options.preRelease}, requireAssets=${options.requireAssets})`,
        "NO_MATCHING_RELEASE"
      );
    }

    this.logger.debug("Latest release", { repository, version: release.tag_name });
    return {
      version: release.tag_name,
      assets: release.assets.map((asset) => ({
        name: asset.name,
        downloadUrl: asset.browser_download_url,
      })),
    };
  }
}
