/**
 * Detects the zig toolchain version of a worktree.
 */

import type { Logger } from "../logging";
import type { ProcessRunner } from "../platform/process";
import type { Worktree } from "../host/types";

/**
 * Dependencies for ToolchainDetector.
 */
export interface ToolchainDetectorDeps {
  readonly processRunner: ProcessRunner;
  readonly logger: Logger;
  /** Toolchain executable name (default: zig) */
  readonly toolchainName?: string;
}

export class ToolchainDetector {
  private readonly processRunner: ProcessRunner;
  private readonly logger: Logger;
  private readonly toolchainName: string;

  constructor(deps: ToolchainDetectorDeps) {
    this.processRunner = deps.processRunner;
    this.logger = deps.logger;
    this.toolchainName = deps.toolchainName ?? "zig";
  }

  /**
   * Run `<toolchain> version` if the toolchain is on PATH.
   *
   * @returns Trimmed version string, or null when the toolchain is missing,
   *          exits non-zero, or prints nothing
   */
  async detect(worktree: Worktree): Promise<string | null> {
    const toolchainPath = await worktree.which(this.toolchainName);
    if (toolchainPath === null) {
      this.logger.debug("Toolchain not found", { name: this.toolchainName });
      return null;
    }

    const result = await this.processRunner
      .run(toolchainPath, ["version"], { cwd: worktree.rootPath })
      .wait();

    if (result.exitCode !== 0) {
      this.logger.warn("Toolchain version failed", {
        path: toolchainPath,
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
      return null;
    }

    const version = result.stdout.trim();
    if (version.length === 0) {
      return null;
    }

    this.logger.debug("Toolchain detected", { path: toolchainPath, version });
    return version;
  }
}
