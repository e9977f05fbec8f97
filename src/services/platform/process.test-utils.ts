/**
 * Test utilities for process module.
 */
import { vi, type Mock } from "vitest";
import type { SpawnedProcess, ProcessResult, ProcessRunner, ProcessOptions } from "./process";

/**
 * Mock SpawnedProcess with vitest mock methods for assertions.
 */
export interface MockSpawnedProcess extends SpawnedProcess {
  wait: Mock<() => Promise<ProcessResult>>;
}

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  run: Mock<(command: string, args: readonly string[], options?: ProcessOptions) => SpawnedProcess>;
}

/**
 * Create a mock SpawnedProcess with controllable behavior.
 *
 * @param overrides.pid - Process ID (defaults to 12345, set to null to simulate spawn failure)
 * @param overrides.waitResult - Result for wait() (can be a value or async function)
 */
export function createMockSpawnedProcess(overrides?: {
  pid?: number | null;
  waitResult?: Partial<ProcessResult> | (() => Promise<ProcessResult>);
}): MockSpawnedProcess {
  const defaultResult: ProcessResult = {
    exitCode: 0,
    stdout: "",
    stderr: "",
  };

  const pid = overrides?.pid === null ? undefined : (overrides?.pid ?? 12345);

  return {
    pid,
    wait: vi.fn(async (): Promise<ProcessResult> => {
      const waitResult = overrides?.waitResult;
      if (typeof waitResult === "function") {
        return waitResult();
      }
      return { ...defaultResult, ...waitResult };
    }),
  };
}

/**
 * Create a mock ProcessRunner.
 *
 * Accepts a single SpawnedProcess returned for every command, or a
 * per-command map for tests that run more than one program.
 *
 * @example
 * const runner = createMockProcessRunner({
 *   which: createMockSpawnedProcess({ waitResult: { stdout: "/usr/bin/zig\n" } }),
 *   "/usr/bin/zig": createMockSpawnedProcess({ waitResult: { stdout: "0.13.0\n" } }),
 * });
 */
export function createMockProcessRunner(
  spawned?: SpawnedProcess | Readonly<Record<string, SpawnedProcess>>
): MockProcessRunner {
  return {
    run: vi.fn((command: string): SpawnedProcess => {
      if (spawned === undefined) {
        return createMockSpawnedProcess();
      }
      if (isSpawnedProcess(spawned)) {
        return spawned;
      }
      return spawned[command] ?? createMockSpawnedProcess({ waitResult: { exitCode: 1 } });
    }),
  };
}

function isSpawnedProcess(
  value: SpawnedProcess | Readonly<Record<string, SpawnedProcess>>
): value is SpawnedProcess {
  return "wait" in value && typeof value.wait === "function";
}
