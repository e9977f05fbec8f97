/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, os.homedir() and process.cwd() for testability.
 */

import os from "node:os";
import { PlatformError } from "./errors";

/**
 * Operating systems the language server is published for.
 */
export type TargetOs = "mac" | "linux" | "windows";

/**
 * CPU architectures the language server is published for.
 */
export type TargetArch = "aarch64" | "x86" | "x86_64";

/**
 * Operating system and architecture of the machine the server runs on.
 */
export interface PlatformTarget {
  readonly os: TargetOs;
  readonly arch: TargetArch;
}

export interface PlatformInfo {
  /** Target the language server binary is selected for */
  readonly target: PlatformTarget;

  /** User's home directory */
  readonly homeDir: string;

  /** Working directory of the host process */
  readonly cwd: string;
}

/**
 * Map a Node.js platform name to a target OS.
 *
 * @throws PlatformError for platforms without published binaries
 */
export function mapOs(nodePlatform: string): TargetOs {
  switch (nodePlatform) {
    case "darwin":
      return "mac";
    case "linux":
      return "linux";
    case "win32":
      return "windows";
    default:
      throw new PlatformError("UNSUPPORTED_PLATFORM", `Unsupported platform: ${nodePlatform}`);
  }
}

/**
 * Map a Node.js architecture name to a target architecture.
 *
 * @throws PlatformError for architectures without published binaries
 */
export function mapArch(nodeArch: string): TargetArch {
  switch (nodeArch) {
    case "arm64":
      return "aarch64";
    case "ia32":
      return "x86";
    case "x64":
      return "x86_64";
    default:
      throw new PlatformError("UNSUPPORTED_ARCHITECTURE", `Unsupported architecture: ${nodeArch}`);
  }
}

/**
 * PlatformInfo implementation using Node.js APIs.
 *
 * Values are cached at construction time for consistency.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly target: PlatformTarget;
  readonly homeDir: string;
  readonly cwd: string;

  constructor() {
    this.target = { os: mapOs(process.platform), arch: mapArch(process.arch) };
    this.homeDir = os.homedir();
    this.cwd = process.cwd();
  }
}
