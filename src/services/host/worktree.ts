/**
 * Worktree backed by the local machine.
 */

import type { Logger } from "../logging";
import type { TargetOs } from "../platform/platform-info";
import type { ProcessRunner } from "../platform/process";
import type { EnvPair, Worktree } from "./types";

/**
 * Dependencies for LocalWorktree.
 */
export interface LocalWorktreeDeps {
  readonly processRunner: ProcessRunner;
  readonly os: TargetOs;
  readonly logger: Logger;
  /** Environment reported as the shell environment (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Worktree resolving executables with `which` (`where` on Windows)
 * and reporting the current process environment as its shell environment.
 */
export class LocalWorktree implements Worktree {
  private readonly processRunner: ProcessRunner;
  private readonly os: TargetOs;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    readonly rootPath: string,
    deps: LocalWorktreeDeps
  ) {
    this.processRunner = deps.processRunner;
    this.os = deps.os;
    this.logger = deps.logger;
    this.env = deps.env ?? process.env;
  }

  async which(name: string): Promise<string | null> {
    const lookup = this.os === "windows" ? "where" : "which";
    const result = await this.processRunner
      .run(lookup, [name], { cwd: this.rootPath, env: this.env })
      .wait();

    if (result.exitCode !== 0) {
      this.logger.debug("Executable not on PATH", { name });
      return null;
    }

    // `where` lists every match; the first one wins like it does for the shell
    const found = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    return found ?? null;
  }

  async shellEnv(): Promise<readonly EnvPair[]> {
    const pairs: EnvPair[] = [];
    for (const [name, value] of Object.entries(this.env)) {
      if (value !== undefined) {
        pairs.push([name, value]);
      }
    }
    return pairs;
  }
}
