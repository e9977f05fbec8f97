/**
 * Archive extraction interface and implementations.
 */

import * as tar from "tar";
import yauzl, { type Entry } from "yauzl";
import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { ArchiveError } from "./errors";
import { getErrorMessage } from "../errors";
import type { ArchiveKind } from "../platform/platform-tokens";

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Extract an archive to a destination directory.
   *
   * @param archivePath - Path to the archive file
   * @param destDir - Directory to extract to (will be created if it doesn't exist)
   * @param kind - Archive format; release archives are platform-determined
   * @throws ArchiveError on extraction failure
   */
  extract(archivePath: string, destDir: string, kind: ArchiveKind): Promise<void>;
}

/**
 * Single-format extractor.
 */
export interface FormatExtractor {
  extract(archivePath: string, destDir: string): Promise<void>;
}

function isPermissionError(message: string): boolean {
  return message.includes("EACCES") || message.includes("EPERM");
}

/**
 * Extractor for gzip-compressed tar archives using the `tar` package.
 */
export class TarExtractor implements FormatExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await tar.extract({
        file: archivePath,
        cwd: destDir,
        strict: true,
      });
    } catch (error) {
      const message = getErrorMessage(error);
      if (isPermissionError(message)) {
        throw new ArchiveError(
          `Permission denied extracting to ${destDir}: ${message}`,
          "PERMISSION_DENIED"
        );
      }
      if (
        message.includes("TAR") ||
        message.includes("zlib") ||
        message.includes("unexpected end")
      ) {
        throw new ArchiveError(
          `Invalid or corrupt archive at ${archivePath}: ${message}`,
          "INVALID_ARCHIVE"
        );
      }
      throw new ArchiveError(`Failed to extract ${archivePath}: ${message}`, "EXTRACTION_FAILED");
    }
  }
}

/**
 * Extractor for .zip archives using the `yauzl` package.
 */
export class ZipExtractor implements FormatExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await this.extractZip(archivePath, path.resolve(destDir));
    } catch (error) {
      if (error instanceof ArchiveError) {
        throw error;
      }
      const message = getErrorMessage(error);
      if (isPermissionError(message)) {
        throw new ArchiveError(
          `Permission denied extracting to ${destDir}: ${message}`,
          "PERMISSION_DENIED"
        );
      }
      throw new ArchiveError(`Failed to extract ${archivePath}: ${message}`, "EXTRACTION_FAILED");
    }
  }

  private extractZip(archivePath: string, destDir: string): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
        if (err) {
          if (err.message.includes("end of central directory")) {
            reject(
              new ArchiveError(
                `Invalid or corrupt zip archive at ${archivePath}: ${err.message}`,
                "INVALID_ARCHIVE"
              )
            );
          } else {
            reject(
              new ArchiveError(
                `Failed to open zip archive at ${archivePath}: ${err.message}`,
                "EXTRACTION_FAILED"
              )
            );
          }
          return;
        }

        zipfile.readEntry();
        zipfile.on("entry", (entry: Entry) => {
          const entryPath = path.resolve(destDir, entry.fileName);

          // Entries must stay inside the destination
          if (entryPath !== destDir && !entryPath.startsWith(destDir + path.sep)) {
            zipfile.close();
            reject(
              new ArchiveError(
                `Path traversal detected in archive: ${entry.fileName}`,
                "INVALID_ARCHIVE"
              )
            );
            return;
          }

          if (entry.fileName.endsWith("/")) {
            fs.promises
              .mkdir(entryPath, { recursive: true })
              .then(() => zipfile.readEntry())
              .catch(reject);
            return;
          }

          fs.promises
            .mkdir(path.dirname(entryPath), { recursive: true })
            .then(() => {
              zipfile.openReadStream(entry, (streamErr, readStream) => {
                if (streamErr) {
                  reject(
                    new ArchiveError(
                      `Failed to read entry ${entry.fileName}: ${streamErr.message}`,
                      "EXTRACTION_FAILED"
                    )
                  );
                  return;
                }

                pipeline(readStream, fs.createWriteStream(entryPath))
                  .then(async () => {
                    // Unix mode lives in the upper 16 bits of the external attributes
                    const mode = (entry.externalFileAttributes >> 16) & 0o777;
                    if (mode !== 0) {
                      await fs.promises.chmod(entryPath, mode);
                    }
                  })
                  .then(() => zipfile.readEntry())
                  .catch(reject);
              });
            })
            .catch(reject);
        });

        zipfile.on("end", () => resolve());
        zipfile.on("error", (zipErr: Error) => {
          reject(
            new ArchiveError(`Error reading zip archive: ${zipErr.message}`, "EXTRACTION_FAILED")
          );
        });
      });
    });
  }
}

/**
 * Archive extractor dispatching on the archive kind.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  private readonly extractors: Readonly<Record<ArchiveKind, FormatExtractor>>;

  constructor(extractors?: Partial<Record<ArchiveKind, FormatExtractor>>) {
    this.extractors = {
      "gzip-tar": extractors?.["gzip-tar"] ?? new TarExtractor(),
      zip: extractors?.zip ?? new ZipExtractor(),
    };
  }

  async extract(archivePath: string, destDir: string, kind: ArchiveKind): Promise<void> {
    return this.extractors[kind].extract(archivePath, destDir);
  }
}
