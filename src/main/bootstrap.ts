/**
 * Bootstrap - wires the default Node implementations into a ZigExtension.
 *
 * The flow:
 * 1. Platform detection and paths
 * 2. Logging and configuration
 * 3. Boundary layers (filesystem, network, processes)
 * 4. Services, then the extension facade
 */

import { NodePlatformInfo, type PlatformInfo } from "../services/platform/platform-info";
import { DefaultPathProvider, type PathProvider } from "../services/platform/path-provider";
import { DefaultFileSystemLayer, type FileSystemLayer } from "../services/platform/filesystem";
import { DefaultNetworkLayer, type HttpClient } from "../services/platform/network";
import { ExecaProcessRunner, type ProcessRunner } from "../services/platform/process";
import { FileLogService, type LoggingService } from "../services/logging";
import { createConfigService, type ProvisionerConfig } from "../services/config";
import {
  JsonLspSettingsProvider,
  LocalWorktree,
  LoggingStatusReporter,
  type InstallationStatusReporter,
  type LspSettingsProvider,
  type Worktree,
} from "../services/host";
import {
  DefaultArchiveExtractor,
  DefaultArtifactFetcher,
  DefaultVersionNegotiator,
  GitHubReleaseClient,
} from "../services/binary-download";
import {
  InMemoryCacheStore,
  LanguageServerResolver,
  OverrideResolver,
  ToolchainDetector,
} from "../services/binary-resolution";
import { TaskTranslator } from "../services/debug-tasks";
import { LANGUAGE_SERVER_NAME, ZigExtension } from "./zig-extension";

// =============================================================================
// Types
// =============================================================================

/**
 * Optional replacements for the default implementations.
 */
export interface ZigExtensionOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly platformInfo?: PlatformInfo;
  readonly pathProvider?: PathProvider;
  readonly loggingService?: LoggingService;
  readonly fileSystem?: FileSystemLayer;
  readonly httpClient?: HttpClient;
  readonly processRunner?: ProcessRunner;
  readonly settingsProvider?: LspSettingsProvider;
  readonly statusReporter?: InstallationStatusReporter;
  /** Skip reading config.json */
  readonly config?: ProvisionerConfig;
}

/**
 * Result of bootstrap.
 */
export interface ZigExtensionRuntime {
  readonly extension: ZigExtension;
  readonly config: ProvisionerConfig;
  readonly platformInfo: PlatformInfo;
  /** Worktree backed by this machine's PATH and environment */
  readonly createWorktree: (rootPath: string) => Worktree;
  readonly dispose: () => void;
}

// =============================================================================
// Bootstrap
// =============================================================================

export async function createZigExtension(
  options: ZigExtensionOptions = {}
): Promise<ZigExtensionRuntime> {
  const env = options.env ?? process.env;
  const platformInfo = options.platformInfo ?? new NodePlatformInfo();
  const pathProvider = options.pathProvider ?? new DefaultPathProvider(platformInfo, env);
  const loggingService = options.loggingService ?? new FileLogService(pathProvider, env);

  const fileSystem = options.fileSystem ?? new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const config =
    options.config ??
    (await createConfigService({
      fileSystem,
      pathProvider,
      logger: loggingService.createLogger("config"),
    }).load());

  const httpClient =
    options.httpClient ??
    new DefaultNetworkLayer(loggingService.createLogger("network"), {
      defaultTimeout: config.requestTimeoutMs,
    });
  const processRunner =
    options.processRunner ?? new ExecaProcessRunner(loggingService.createLogger("process"));
  const hostLogger = loggingService.createLogger("host");
  const statusReporter = options.statusReporter ?? new LoggingStatusReporter(hostLogger);
  const settingsProvider =
    options.settingsProvider ??
    new JsonLspSettingsProvider({ fileSystem, logger: loggingService.createLogger("settings") });

  const negotiatorLogger = loggingService.createLogger("negotiator");
  const resolverLogger = loggingService.createLogger("resolver");

  const resolver = new LanguageServerResolver({
    overrideResolver: new OverrideResolver({
      settingsProvider,
      logger: resolverLogger,
      serverName: LANGUAGE_SERVER_NAME,
    }),
    toolchainDetector: new ToolchainDetector({ processRunner, logger: resolverLogger }),
    versionNegotiator: new DefaultVersionNegotiator({
      httpClient,
      releaseClient: new GitHubReleaseClient({
        httpClient,
        logger: negotiatorLogger,
        apiBaseUrl: config.githubApiBaseUrl,
        timeoutMs: config.requestTimeoutMs,
      }),
      logger: negotiatorLogger,
      releaseRepository: config.releaseRepository,
      buildsBaseUrl: config.buildsBaseUrl,
      compatibilityEndpoint: config.compatibilityEndpoint,
      assetNamingConvention: config.assetNamingConvention,
      requestTimeoutMs: config.requestTimeoutMs,
    }),
    artifactFetcher: new DefaultArtifactFetcher({
      httpClient,
      fileSystem,
      archiveExtractor: new DefaultArchiveExtractor(),
      statusReporter,
      pathProvider,
      logger: loggingService.createLogger("download"),
      serverName: LANGUAGE_SERVER_NAME,
      downloadTimeoutMs: config.downloadTimeoutMs,
      pruneStaleVersions: config.pruneStaleVersions,
    }),
    cacheStore: new InMemoryCacheStore(fileSystem, resolverLogger),
    pathProvider,
    platformInfo,
    statusReporter,
    logger: resolverLogger,
    serverName: LANGUAGE_SERVER_NAME,
  });

  const extension = new ZigExtension({
    resolver,
    settingsProvider,
    taskTranslator: new TaskTranslator({
      platformInfo,
      logger: loggingService.createLogger("debug-task"),
    }),
    logger: loggingService.createLogger("extension"),
  });

  return {
    extension,
    config,
    platformInfo,
    createWorktree: (rootPath: string) =>
      new LocalWorktree(rootPath, {
        processRunner,
        os: platformInfo.target.os,
        logger: hostLogger,
        env,
      }),
    dispose: () => loggingService.dispose(),
  };
}
