/**
 * Picks the language server release and download URL for a toolchain.
 */

import { z } from "zod";
import type { Logger } from "../logging";
import type { HttpClient } from "../platform/network";
import type { PlatformTarget } from "../platform/platform-info";
import {
  compatibilityTarget,
  releaseAssetName,
  type AssetNamingConvention,
} from "../platform/platform-tokens";
import { getErrorMessage } from "../errors";
import { VersionNegotiationError } from "./errors";
import type { ReleaseClient } from "./release-client";

/**
 * Release selected for download.
 */
export interface NegotiatedRelease {
  /** Language server version, names the version directory */
  readonly version: string;
  readonly downloadUrl: string;
}

export interface VersionNegotiator {
  /**
   * Select a release.
   *
   * @param toolchainVersion - Trimmed toolchain version, or null when no toolchain was found
   * @throws VersionNegotiationError
   */
  negotiate(toolchainVersion: string | null, target: PlatformTarget): Promise<NegotiatedRelease>;
}

/**
 * Per-platform asset descriptor of a compatibility response.
 */
const AssetInfoSchema = z.object({
  tarball: z.string().min(1),
  shasum: z.string(),
  size: z.union([z.string(), z.number()]),
});

const SelectVersionSchema = z
  .object({
    version: z.string().min(1),
  })
  .catchall(z.unknown());

/**
 * Release versions name a directory, so only semver shapes pass:
 * `0.13.0`, `0.14.0-dev.39+e5e5f4a`.
 */
export const ReleaseVersionSchema = z
  .string()
  .regex(
    /^\d+\.\d+\.\d+(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/,
    "not a release version"
  );

/**
 * @throws VersionNegotiationError PARSE_FAILED for anything but a release version
 */
export function parseReleaseVersion(version: string): string {
  const parsed = ReleaseVersionSchema.safeParse(version);
  if (!parsed.success) {
    throw new VersionNegotiationError(
      `Unparseable release version ${JSON.stringify(version)}`,
      "PARSE_FAILED"
    );
  }
  return parsed.data;
}

/**
 * Body returned when no release supports the toolchain.
 */
const SelectVersionFailureSchema = z.object({
  code: z.number(),
  message: z.string(),
});

/**
 * Only the gzip form is guaranteed to be extractable.
 */
export function normalizeTarballUrl(url: string): string {
  return url.endsWith(".tar.xz") ? `${url.slice(0, -".tar.xz".length)}.tar.gz` : url;
}

/**
 * Dependencies for DefaultVersionNegotiator.
 */
export interface VersionNegotiatorDeps {
  readonly httpClient: HttpClient;
  readonly releaseClient: ReleaseClient;
  readonly logger: Logger;
  readonly releaseRepository: string;
  readonly buildsBaseUrl: string;
  readonly compatibilityEndpoint: string;
  readonly assetNamingConvention: AssetNamingConvention;
  readonly requestTimeoutMs: number;
}

/**
 * Negotiates with two services:
 * - no toolchain: the latest stable release from the release repository,
 *   downloaded by asset name from the builds host
 * - toolchain present: the compatibility endpoint, which maps a toolchain
 *   version to a release and per-platform archives
 */
export class DefaultVersionNegotiator implements VersionNegotiator {
  private readonly deps: VersionNegotiatorDeps;

  constructor(deps: VersionNegotiatorDeps) {
    this.deps = deps;
  }

  async negotiate(
    toolchainVersion: string | null,
    target: PlatformTarget
  ): Promise<NegotiatedRelease> {
    const result =
      toolchainVersion === null
        ? await this.fromLatestRelease(target)
        : await this.fromCompatibilityEndpoint(toolchainVersion, target);

    parseReleaseVersion(result.version);

    this.deps.logger.info("Negotiated release", {
      toolchain: toolchainVersion,
      version: result.version,
      url: result.downloadUrl,
    });
    return result;
  }

  private async fromLatestRelease(target: PlatformTarget): Promise<NegotiatedRelease> {
    const release = await this.deps.releaseClient.latestRelease(this.deps.releaseRepository, {
      requireAssets: true,
      preRelease: false,
    });

    // The builds host serves archives by name even when the release lists none for them
    const assetName = releaseAssetName(target, release.version, this.deps.assetNamingConvention);
    const baseUrl = this.deps.buildsBaseUrl.replace(/\/+$/, "");
    return { version: release.version, downloadUrl: `${baseUrl}/${assetName}` };
  }

  private async fromCompatibilityEndpoint(
    toolchainVersion: string,
    target: PlatformTarget
  ): Promise<NegotiatedRelease> {
    const url =
      `${this.deps.compatibilityEndpoint}?zig_version=${encodeURIComponent(toolchainVersion)}` +
      "&compatibility=only-runtime";

    let response: Response;
    try {
      response = await this.deps.httpClient.fetch(url, { timeout: this.deps.requestTimeoutMs });
    } catch (error) {
      throw new VersionNegotiationError(
        `Failed to query compatible release for zig ${toolchainVersion}: ${getErrorMessage(error)}`,
        "FETCH_FAILED"
      );
    }

    const body = await this.readJson(response, toolchainVersion);

    const failure = SelectVersionFailureSchema.safeParse(body);
    if (failure.success) {
      throw new VersionNegotiationError(
        `No compatible release for zig ${toolchainVersion}: ${failure.data.message}`,
        "INCOMPATIBLE_TOOLCHAIN"
      );
    }
    if (!response.ok) {
      throw new VersionNegotiationError(
        `HTTP ${response.status} querying compatible release for zig ${toolchainVersion}`,
        "FETCH_FAILED"
      );
    }

    const selection = SelectVersionSchema.safeParse(body);
    if (!selection.success) {
      throw new VersionNegotiationError(
        `Failed to parse select version: ${selection.error.message}`,
        "PARSE_FAILED"
      );
    }

    const targetKey = compatibilityTarget(target);
    const entry = selection.data[targetKey];
    if (entry === undefined) {
      throw new VersionNegotiationError(
        `Failed to find ZLS asset for ${targetKey}`,
        "UNSUPPORTED_PLATFORM"
      );
    }

    const asset = AssetInfoSchema.safeParse(entry);
    if (!asset.success) {
      throw new VersionNegotiationError(
        `Failed to parse ZLS asset for ${targetKey}: ${asset.error.message}`,
        "PARSE_FAILED"
      );
    }

    return {
      version: selection.data.version,
      downloadUrl: normalizeTarballUrl(asset.data.tarball),
    };
  }

  private async readJson(response: Response, toolchainVersion: string): Promise<unknown> {
    const text = await response.text().catch((error: unknown) => {
      throw new VersionNegotiationError(
        `Failed to read compatible release for zig ${toolchainVersion}: ${getErrorMessage(error)}`,
        "FETCH_FAILED"
      );
    });

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      if (!response.ok) {
        throw new VersionNegotiationError(
          `HTTP ${response.status} querying compatible release for zig ${toolchainVersion}`,
          "FETCH_FAILED"
        );
      }
      throw new VersionNegotiationError(
        `Failed to parse select version: ${getErrorMessage(error)}`,
        "PARSE_FAILED"
      );
    }
  }
}
