/**
 * Types for language server binary resolution.
 */

import type { EnvPair } from "../host/types";

/**
 * Where a resolved binary came from.
 */
export type BinarySource = "override" | "path" | "cache" | "download";

/**
 * Executable handed to the host's process launcher as-is.
 */
export interface ResolvedBinary {
  readonly path: string;
  /** Extra arguments from the user's settings */
  readonly args: readonly string[] | null;
  /** Environment for the server process; null on Windows */
  readonly env: readonly EnvPair[] | null;
  readonly source: BinarySource;
}

/**
 * Outcome of checking user settings and PATH.
 */
export interface OverrideResolution {
  /** Binary chosen without any version logic, or null to continue */
  readonly binary: { readonly path: string; readonly source: "override" | "path" } | null;
  /** Configured arguments; they apply to whatever binary is finally chosen */
  readonly args: readonly string[] | null;
}
