/**
 * LanguageServerResolver - finds, caches and provisions the language server binary.
 *
 * Resolution order:
 * 1. Configured `binary.path`, then the server on the worktree's PATH
 * 2. Session cache, keyed by the trimmed toolchain version
 * 3. Version negotiation and download into `<binariesDir>/zls-<version>/`
 *
 * Installs run one at a time per resolver: a finished install prunes the
 * other version directories, including one another install is filling.
 */

import type { Logger } from "../logging";
import type { PathProvider } from "../platform/path-provider";
import type { PlatformInfo } from "../platform/platform-info";
import type { EnvPair, InstallationStatusReporter, Worktree } from "../host/types";
import type { ArtifactFetcher } from "../binary-download/artifact-fetcher";
import {
  parseReleaseVersion,
  type VersionNegotiator,
} from "../binary-download/version-negotiator";
import { getErrorMessage } from "../errors";
import { normalizeCacheKey, type CacheKey, type CacheStore } from "./cache-store";
import type { OverrideResolver } from "./override-resolver";
import type { ToolchainDetector } from "./toolchain-detector";
import type { ResolvedBinary } from "./types";

/**
 * Dependencies for LanguageServerResolver.
 */
export interface LanguageServerResolverDeps {
  readonly overrideResolver: OverrideResolver;
  readonly toolchainDetector: ToolchainDetector;
  readonly versionNegotiator: VersionNegotiator;
  readonly artifactFetcher: ArtifactFetcher;
  readonly cacheStore: CacheStore;
  readonly pathProvider: Pick<PathProvider, "versionDir" | "binaryPath">;
  readonly platformInfo: Pick<PlatformInfo, "target">;
  readonly statusReporter: InstallationStatusReporter;
  readonly logger: Logger;
  readonly serverName: string;
}

/**
 * Managed binary for one cache key.
 */
interface ManagedBinary {
  readonly path: string;
  readonly source: "cache" | "download";
}

export class LanguageServerResolver {
  private readonly inFlight = new Map<CacheKey, Promise<ManagedBinary>>();
  private installQueue: Promise<void> = Promise.resolve();

  constructor(private readonly deps: LanguageServerResolverDeps) {}

  /**
   * Resolve the binary to launch for a worktree.
   *
   * @throws VersionNegotiationError or BinaryDownloadError when no binary could be provisioned
   */
  async resolve(worktree: Worktree): Promise<ResolvedBinary> {
    const env = await this.environment(worktree);

    const override = await this.deps.overrideResolver.resolve(worktree);
    if (override.binary !== null) {
      return { ...override.binary, args: override.args, env };
    }

    this.deps.statusReporter.setStatus(this.deps.serverName, "checking-for-update");

    const toolchainVersion = await this.deps.toolchainDetector.detect(worktree);
    const managed = await this.managedBinary(normalizeCacheKey(toolchainVersion));
    return { path: managed.path, source: managed.source, args: override.args, env };
  }

  private async environment(worktree: Worktree): Promise<readonly EnvPair[] | null> {
    if (this.deps.platformInfo.target.os === "windows") {
      return null;
    }
    return worktree.shellEnv();
  }

  /**
   * Callers asking for the same key while a resolution is running share it.
   */
  private managedBinary(key: CacheKey): Promise<ManagedBinary> {
    const pending = this.inFlight.get(key);
    if (pending) {
      this.deps.logger.debug("Joining in-flight resolution", { key });
      return pending;
    }

    const resolution = this.resolveManaged(key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, resolution);
    return resolution;
  }

  private async resolveManaged(key: CacheKey): Promise<ManagedBinary> {
    const { cacheStore, statusReporter, serverName, logger } = this.deps;

    try {
      const cached = await cacheStore.get(key);
      if (cached !== null) {
        logger.debug("Cache hit", { key, path: cached });
        statusReporter.setStatus(serverName, "none");
        return { path: cached, source: "cache" };
      }

      const path = await this.exclusive(() => this.provision(key));
      cacheStore.put(key, path);
      statusReporter.setStatus(serverName, "none");
      return { path, source: "download" };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.warn("Resolution failed", { key, error: message });
      statusReporter.setStatus(serverName, { failed: message });
      throw error;
    }
  }

  /**
   * Run a task after every previously queued one has settled.
   * A failed task rejects its own caller and leaves the queue usable.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.installQueue.then(task);
    this.installQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async provision(key: CacheKey): Promise<string> {
    const { versionNegotiator, artifactFetcher, pathProvider, platformInfo, logger } = this.deps;
    const { target } = platformInfo;

    const release = await versionNegotiator.negotiate(key, target);
    const version = parseReleaseVersion(release.version);
    const versionDir = pathProvider.versionDir(version);
    const binaryPath = pathProvider.binaryPath(version, target.os);

    await artifactFetcher.fetch({
      downloadUrl: release.downloadUrl,
      versionDir,
      binaryPath,
      target,
    });

    logger.info("Language server ready", { key, version, path: binaryPath });
    return binaryPath;
  }
}
