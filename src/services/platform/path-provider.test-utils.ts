/**
 * Test utilities for PathProvider.
 */
import { join } from "node:path";
import type { PathProvider } from "./path-provider";
import type { TargetOs } from "./platform-info";
import { binaryFileName } from "./platform-tokens";

/**
 * Create a mock PathProvider with controllable behavior.
 * Defaults to test paths under `/test/app-data/`.
 */
export function createMockPathProvider(
  overrides?: Partial<Pick<PathProvider, "dataRootDir" | "binariesDir" | "logsDir" | "configPath">>
): PathProvider {
  const dataRootDir = overrides?.dataRootDir ?? join("/test", "app-data");
  const binariesDir = overrides?.binariesDir ?? join(dataRootDir, "zls");
  const versionDir = (version: string): string => join(binariesDir, `zls-${version}`);

  return {
    dataRootDir,
    binariesDir,
    logsDir: overrides?.logsDir ?? join(dataRootDir, "logs"),
    configPath: overrides?.configPath ?? join(dataRootDir, "config.json"),
    versionDir,
    binaryPath: (version: string, os: TargetOs) => join(versionDir(version), binaryFileName(os)),
  };
}
