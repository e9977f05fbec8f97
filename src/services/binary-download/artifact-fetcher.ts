/**
 * Downloads and installs one language server release into its version directory.
 */

import { randomUUID } from "node:crypto";
import * as os from "node:os";
import * as path from "node:path";
import type { Logger } from "../logging";
import type { DirEntry, FileSystemLayer } from "../platform/filesystem";
import type { HttpClient } from "../platform/network";
import type { PathProvider } from "../platform/path-provider";
import type { PlatformTarget } from "../platform/platform-info";
import { archiveExtension, archiveKind, type ArchiveKind } from "../platform/platform-tokens";
import type { InstallationStatusReporter } from "../host/types";
import { ArchiveError, getErrorMessage } from "../errors";
import { BinaryDownloadError } from "./errors";
import type { ArchiveExtractor } from "./archive-extractor";

/**
 * What to install and where.
 */
export interface FetchRequest {
  readonly downloadUrl: string;
  /** `<binariesDir>/zls-<version>`; its siblings are stale versions */
  readonly versionDir: string;
  readonly binaryPath: string;
  readonly target: PlatformTarget;
}

export interface ArtifactFetcher {
  /**
   * Install the release unless its binary is already on disk.
   *
   * @throws BinaryDownloadError NETWORK_ERROR, EXTRACTION_FAILED or PERMISSION_DENIED
   */
  fetch(request: FetchRequest): Promise<void>;
}

/**
 * Dependencies for DefaultArtifactFetcher.
 */
export interface ArtifactFetcherDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly archiveExtractor: ArchiveExtractor;
  readonly statusReporter: InstallationStatusReporter;
  readonly pathProvider: Pick<PathProvider, "binariesDir">;
  readonly logger: Logger;
  readonly serverName: string;
  readonly downloadTimeoutMs: number;
  /** Remove other entries of the binaries directory after a fresh install */
  readonly pruneStaleVersions: boolean;
  /** Directory for the downloaded archive (default: os.tmpdir()) */
  readonly tempDir?: string;
}

export class DefaultArtifactFetcher implements ArtifactFetcher {
  private readonly deps: ArtifactFetcherDeps;
  private readonly tempDir: string;

  constructor(deps: ArtifactFetcherDeps) {
    this.deps = deps;
    this.tempDir = deps.tempDir ?? os.tmpdir();
  }

  async fetch(request: FetchRequest): Promise<void> {
    const { fileSystem, logger } = this.deps;

    if (await fileSystem.isFile(request.binaryPath)) {
      logger.debug("Binary present, skipping download", { path: request.binaryPath });
      return;
    }

    this.deps.statusReporter.setStatus(this.deps.serverName, "downloading");

    const kind = archiveKind(request.target.os);
    const versionName = path.basename(request.versionDir);
    const tempFile = path.join(
      this.tempDir,
      `${versionName}-${randomUUID().slice(0, 8)}.${archiveExtension(kind)}`
    );

    logger.info("Downloading", { url: request.downloadUrl, dest: request.versionDir, kind });

    try {
      await this.downloadToFile(request.downloadUrl, tempFile);
      await this.extract(tempFile, request.versionDir, kind);
    } finally {
      await this.removeTempFile(tempFile);
    }

    if (!(await fileSystem.isFile(request.binaryPath))) {
      throw new BinaryDownloadError(
        `Archive from ${request.downloadUrl} did not contain ${path.basename(request.binaryPath)}`,
        "EXTRACTION_FAILED"
      );
    }

    try {
      await fileSystem.makeExecutable(request.binaryPath);
    } catch (error) {
      throw new BinaryDownloadError(
        `Failed to make ${request.binaryPath} executable: ${getErrorMessage(error)}`,
        "PERMISSION_DENIED"
      );
    }

    logger.info("Download complete", { path: request.binaryPath });

    if (this.deps.pruneStaleVersions) {
      await this.pruneSiblings(request.versionDir);
    }
  }

  /**
   * Download a file from URL to local path.
   * Buffers the download in memory and writes using FileSystemLayer.
   */
  private async downloadToFile(url: string, destPath: string): Promise<void> {
    let response: Response;
    try {
      response = await this.deps.httpClient.fetch(url, { timeout: this.deps.downloadTimeoutMs });
    } catch (error) {
      throw new BinaryDownloadError(
        `Network error downloading from ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR"
      );
    }

    if (!response.ok) {
      throw new BinaryDownloadError(`HTTP ${response.status} downloading from ${url}`, "NETWORK_ERROR");
    }

    let buffer: Buffer;
    try {
      buffer = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new BinaryDownloadError(
        `Failed to read download from ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR"
      );
    }

    try {
      await this.deps.fileSystem.writeFileBuffer(destPath, buffer);
    } catch (error) {
      throw new BinaryDownloadError(
        `Failed to write download to ${destPath}: ${getErrorMessage(error)}`,
        "EXTRACTION_FAILED"
      );
    }

    this.deps.logger.debug("Downloaded", { url, bytes: buffer.length });
  }

  private async extract(
    archivePath: string,
    versionDir: string,
    kind: ArchiveKind
  ): Promise<void> {
    try {
      await this.deps.fileSystem.mkdir(versionDir);
      await this.deps.archiveExtractor.extract(archivePath, versionDir, kind);
    } catch (error) {
      const reason = error instanceof ArchiveError ? error.message : getErrorMessage(error);
      throw new BinaryDownloadError(
        `Failed to extract into ${versionDir}: ${reason}`,
        "EXTRACTION_FAILED"
      );
    }
  }

  private async removeTempFile(tempFile: string): Promise<void> {
    try {
      await this.deps.fileSystem.rm(tempFile, { force: true });
    } catch (error) {
      this.deps.logger.debug("Temp file cleanup failed", {
        path: tempFile,
        error: getErrorMessage(error),
      });
    }
  }

  /**
   * Remove every entry of the binaries directory other than the installed version.
   * Failures are logged and never abort the remaining removals.
   */
  private async pruneSiblings(versionDir: string): Promise<void> {
    const { fileSystem, logger } = this.deps;
    const binariesDir = path.dirname(versionDir);
    const keep = path.basename(versionDir);

    if (path.resolve(binariesDir) !== path.resolve(this.deps.pathProvider.binariesDir)) {
      logger.warn("Not pruning outside the binaries directory", {
        versionDir,
        binariesDir: this.deps.pathProvider.binariesDir,
      });
      return;
    }

    let entries: readonly DirEntry[];
    try {
      entries = await fileSystem.readdir(binariesDir);
    } catch (error) {
      logger.warn("Listing installed versions failed", {
        dir: binariesDir,
        error: getErrorMessage(error),
      });
      return;
    }

    let pruned = 0;
    for (const entry of entries) {
      if (entry.name === keep) continue;
      const stalePath = path.join(binariesDir, entry.name);
      try {
        await fileSystem.rm(stalePath, { recursive: true, force: true });
        pruned++;
      } catch (error) {
        logger.warn("Removing stale version failed", {
          path: stalePath,
          error: getErrorMessage(error),
        });
      }
    }

    if (pruned > 0) {
      logger.info("Pruned stale versions", { dir: binariesDir, pruned });
    }
  }
}
