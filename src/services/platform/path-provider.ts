import { join } from "node:path";
import type { PlatformInfo, TargetOs } from "./platform-info";
import { binaryFileName } from "./platform-tokens";

/**
 * Directory name used under the per-OS application data location.
 */
export const DATA_DIR_NAME = "zls-provisioner";

/**
 * Provisioner path provider.
 * Abstracts platform-specific data locations.
 */
export interface PathProvider {
  /** Root directory for all provisioner data */
  readonly dataRootDir: string;

  /** Directory holding one subdirectory per installed server version: `<dataRoot>/zls/` */
  readonly binariesDir: string;

  /** Directory for session log files: `<dataRoot>/logs/` */
  readonly logsDir: string;

  /** Path to the configuration file: `<dataRoot>/config.json` */
  readonly configPath: string;

  /**
   * Directory for one installed version.
   * @returns `<binariesDir>/zls-<version>`
   */
  versionDir(version: string): string;

  /**
   * Absolute path of the server executable inside a version directory.
   * @returns `<binariesDir>/zls-<version>/zls[.exe]`
   */
  binaryPath(version: string, os: TargetOs): string;
}

/**
 * Default PathProvider implementation.
 *
 * Path structure:
 * - `ZLS_PROVISIONER_DATA_DIR` when set
 * - Linux: `~/.local/share/zls-provisioner/`
 * - macOS: `~/Library/Application Support/zls-provisioner/`
 * - Windows: `<home>/AppData/Roaming/zls-provisioner/`
 */
export class DefaultPathProvider implements PathProvider {
  readonly dataRootDir: string;
  readonly binariesDir: string;
  readonly logsDir: string;
  readonly configPath: string;

  constructor(platformInfo: PlatformInfo, env: NodeJS.ProcessEnv = process.env) {
    this.dataRootDir = env.ZLS_PROVISIONER_DATA_DIR || this.computeDataRootDir(platformInfo);
    this.binariesDir = join(this.dataRootDir, "zls");
    this.logsDir = join(this.dataRootDir, "logs");
    this.configPath = join(this.dataRootDir, "config.json");
  }

  versionDir(version: string): string {
    return join(this.binariesDir, `zls-${version}`);
  }

  binaryPath(version: string, os: TargetOs): string {
    return join(this.versionDir(version), binaryFileName(os));
  }

  private computeDataRootDir(platformInfo: PlatformInfo): string {
    const { target, homeDir } = platformInfo;

    switch (target.os) {
      case "mac":
        return join(homeDir, "Library", "Application Support", DATA_DIR_NAME);
      case "windows":
        return join(homeDir, "AppData", "Roaming", DATA_DIR_NAME);
      case "linux":
        return join(homeDir, ".local", "share", DATA_DIR_NAME);
    }
  }
}
