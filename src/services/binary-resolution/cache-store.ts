/**
 * Session cache of resolved binary paths, keyed by toolchain version.
 */

import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";

/**
 * Toolchain version cache key; null when no toolchain was found.
 */
export type CacheKey = string | null;

export interface CacheStore {
  /**
   * Cached path for a key, if it still exists as a regular file.
   * A stale entry is dropped and reported as a miss.
   */
  get(key: CacheKey): Promise<string | null>;

  put(key: CacheKey, binaryPath: string): void;
}

/**
 * Keys are trimmed so `"0.13.0\n"` and `"0.13.0"` share an entry.
 */
export function normalizeCacheKey(key: CacheKey): CacheKey {
  if (key === null) return null;
  const trimmed = key.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * In-memory CacheStore. One instance per resolver.
 */
export class InMemoryCacheStore implements CacheStore {
  private readonly entries = new Map<CacheKey, string>();

  constructor(
    private readonly fileSystem: Pick<FileSystemLayer, "isFile">,
    private readonly logger: Logger
  ) {}

  async get(key: CacheKey): Promise<string | null> {
    const normalized = normalizeCacheKey(key);
    const cached = this.entries.get(normalized);
    if (cached === undefined) {
      return null;
    }

    if (await this.fileSystem.isFile(cached)) {
      return cached;
    }

    this.logger.debug("Dropping stale cache entry", { key: normalized, path: cached });
    this.entries.delete(normalized);
    return null;
  }

  put(key: CacheKey, binaryPath: string): void {
    this.entries.set(normalizeCacheKey(key), binaryPath);
  }
}
