/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import type { Logger } from "../logging";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal or spawn error.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status or spawn failures - check result fields instead.
   *
   * @example
   * const result = await proc.wait();
   * if (result.exitCode !== 0) {
   *   logger.warn('Command failed', { stderr: result.stderr });
   * }
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to await it.
   * Returns synchronously - the process is spawned immediately.
   *
   * @example
   * const proc = runner.run('zig', ['version']);
   * const result = await proc.wait();
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

/**
 * Type alias for execa subprocess - using ReturnType to get the exact type.
 */
type ExecaSubprocess = ReturnType<typeof execa>;

/**
 * SpawnedProcess implementation wrapping an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private cachedResult: ProcessResult | null = null;

  constructor(
    private readonly subprocess: ExecaSubprocess,
    private readonly logger: Logger,
    private readonly command: string
  ) {}

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  async wait(): Promise<ProcessResult> {
    if (this.cachedResult !== null) {
      return this.cachedResult;
    }

    const result = await this.waitForProcess();
    this.cachedResult = result;
    this.logResult(result);
    return result;
  }

  private logResult(result: ProcessResult): void {
    this.logOutputLines(result.stdout, "stdout");
    this.logOutputLines(result.stderr, "stderr");
    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
    });
  }

  /**
   * Log output lines (stdout or stderr) at SILLY level.
   */
  private logOutputLines(output: string, stream: "stdout" | "stderr"): void {
    if (!output) return;

    const prefix = `[${this.command} ${this.pid ?? 0}]`;
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`${prefix} ${stream}: ${line}`);
    }
  }

  private async waitForProcess(): Promise<ProcessResult> {
    try {
      const result = await this.subprocess;
      return this.convertResult(result);
    } catch (error) {
      // reject: false keeps exit codes out of here; only spawn-level failures land here
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Spawn failed", { command: this.command, error: message });
      return {
        stdout: "",
        stderr: message,
        exitCode: null,
      };
    }
  }

  private convertResult(result: Awaited<ExecaSubprocess>): ProcessResult {
    // For spawn errors (ENOENT, EACCES), execa sets failed=true and puts
    // error info in originalMessage instead of throwing (with reject: false)
    const execaResult = result as typeof result & {
      failed?: boolean;
      originalMessage?: string;
    };

    let stderr = typeof execaResult.stderr === "string" ? execaResult.stderr : "";
    if (execaResult.failed && execaResult.originalMessage && !stderr) {
      stderr = execaResult.originalMessage;
    }

    const processResult: ProcessResult = {
      stdout: typeof execaResult.stdout === "string" ? execaResult.stdout : "",
      stderr,
      exitCode: execaResult.exitCode ?? null,
    };
    if (execaResult.signal) {
      return { ...processResult, signal: execaResult.signal };
    }
    return processResult;
  }
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const subprocess = execa(command, [...args], {
      cleanup: true,
      encoding: "utf8",
      reject: false,
      ...(options?.cwd && { cwd: options.cwd }),
      // When custom env is provided, disable extendEnv so that deleted keys
      // from the custom env are actually removed (not inherited from process.env)
      ...(options?.env && { env: options.env, extendEnv: false }),
    }) as ExecaSubprocess;

    const spawned = new ExecaSpawnedProcess(subprocess, this.logger, command);
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }
    return spawned;
  }
}
