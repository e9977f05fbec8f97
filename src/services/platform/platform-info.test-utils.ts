/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo, PlatformTarget } from "./platform-info";

/**
 * Create a mock PlatformInfo.
 * Defaults to x86_64 Linux with a test home and working directory.
 */
export function createMockPlatformInfo(
  overrides?: Partial<Omit<PlatformInfo, "target">> & { target?: Partial<PlatformTarget> }
): PlatformInfo {
  return {
    target: {
      os: overrides?.target?.os ?? "linux",
      arch: overrides?.target?.arch ?? "x86_64",
    },
    homeDir: overrides?.homeDir ?? "/home/test",
    cwd: overrides?.cwd ?? "/home/test/project",
  };
}
