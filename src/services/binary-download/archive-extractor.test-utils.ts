/**
 * Test utilities for ArchiveExtractor.
 */

import { vi, type Mock } from "vitest";
import type { ArchiveExtractor, FormatExtractor } from "./archive-extractor";
import type { ArchiveErrorCode } from "./errors";
import { ArchiveError } from "./errors";
import type { ArchiveKind } from "../platform/platform-tokens";

/**
 * Options for creating a mock archive extractor.
 */
export interface MockArchiveExtractorOptions {
  /**
   * If provided, the extract method will reject with this error.
   */
  error?: {
    message: string;
    code: ArchiveErrorCode;
  };
  /**
   * Called on successful extraction, e.g. to put the binary into an in-memory filesystem.
   */
  onExtract?: (archivePath: string, destDir: string, kind: ArchiveKind) => void | Promise<void>;
}

/**
 * Mock ArchiveExtractor type with spy on extract.
 */
export interface MockArchiveExtractor extends ArchiveExtractor {
  extract: Mock<(archivePath: string, destDir: string, kind: ArchiveKind) => Promise<void>>;
}

/**
 * Create a mock ArchiveExtractor with controllable behavior.
 */
export function createMockArchiveExtractor(
  options: MockArchiveExtractorOptions = {}
): MockArchiveExtractor {
  return {
    extract: vi.fn(async (archivePath: string, destDir: string, kind: ArchiveKind) => {
      if (options.error) {
        throw new ArchiveError(options.error.message, options.error.code);
      }
      await options.onExtract?.(archivePath, destDir, kind);
    }),
  };
}

/**
 * Mock single-format extractor.
 */
export interface MockFormatExtractor extends FormatExtractor {
  extract: Mock<(archivePath: string, destDir: string) => Promise<void>>;
}

export function createMockFormatExtractor(): MockFormatExtractor {
  return {
    extract: vi.fn(async () => {}),
  };
}
