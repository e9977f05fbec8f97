/**
 * Configuration service for loading and saving provisioner configuration.
 *
 * This is a pure service (not a boundary abstraction) that uses FileSystemLayer
 * for I/O operations. Configuration is stored as JSON in {dataRootDir}/config.json.
 */

import { dirname } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PathProvider } from "../platform/path-provider";
import type { Logger } from "../logging";
import { FileSystemError, getErrorMessage } from "../errors";
import type { ProvisionerConfig } from "./types";
import { DEFAULT_PROVISIONER_CONFIG, ProvisionerConfigSchema } from "./types";

/**
 * Dependencies for ConfigService.
 */
export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: Pick<PathProvider, "configPath">;
  readonly logger: Logger;
}

/**
 * Service for managing provisioner configuration.
 */
export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: Pick<PathProvider, "configPath">;
  private readonly logger: Logger;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
  }

  /**
   * Load configuration from disk.
   * Returns (and writes) the defaults if the file doesn't exist.
   * Logs a warning and returns defaults if the file is corrupt or invalid.
   */
  async load(): Promise<ProvisionerConfig> {
    const configPath = this.pathProvider.configPath;

    let content: string;
    try {
      content = await this.fileSystem.readFile(configPath);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        this.logger.debug("Config not found, using defaults", { path: configPath });
        await this.saveDefaults();
        return DEFAULT_PROVISIONER_CONFIG;
      }
      this.logger.warn("Config read failed, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return DEFAULT_PROVISIONER_CONFIG;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content) as unknown;
    } catch (error) {
      this.logger.warn("Config is not valid JSON, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return DEFAULT_PROVISIONER_CONFIG;
    }

    const result = ProvisionerConfigSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn("Config validation failed, using defaults", {
        path: configPath,
        error: result.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      });
      return DEFAULT_PROVISIONER_CONFIG;
    }

    this.logger.debug("Config loaded", { path: configPath });
    return result.data;
  }

  /**
   * Save configuration to disk.
   */
  async save(config: ProvisionerConfig): Promise<void> {
    const configPath = this.pathProvider.configPath;

    await this.fileSystem.mkdir(dirname(configPath));
    await this.fileSystem.writeFile(configPath, JSON.stringify(config, null, 2));

    this.logger.debug("Config saved", { path: configPath });
  }

  private async saveDefaults(): Promise<void> {
    try {
      await this.save(DEFAULT_PROVISIONER_CONFIG);
    } catch (error) {
      // A read-only data root still runs with defaults
      this.logger.warn("Writing default config failed", {
        path: this.pathProvider.configPath,
        error: getErrorMessage(error),
      });
    }
  }
}

/**
 * Create a ConfigService instance.
 */
export function createConfigService(deps: ConfigServiceDeps): ConfigService {
  return new ConfigService(deps);
}
