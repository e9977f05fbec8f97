/**
 * Collaborators supplied by the editor host.
 *
 * The provisioner only talks to the host through these interfaces; the
 * Node implementations in this directory back them outside an editor.
 */

/**
 * One environment variable as a name/value pair.
 */
export type EnvPair = readonly [name: string, value: string];

/**
 * View of the project directory the language server runs for.
 */
export interface Worktree {
  /** Absolute path of the worktree root */
  readonly rootPath: string;

  /**
   * Look up an executable on the worktree's PATH.
   *
   * @returns Absolute path of the executable, or null if it is not on PATH
   */
  which(name: string): Promise<string | null>;

  /**
   * Environment of the user's login shell for this worktree.
   */
  shellEnv(): Promise<readonly EnvPair[]>;
}

/**
 * User override for the language server binary.
 */
export interface BinarySettings {
  readonly path?: string;
  readonly arguments?: readonly string[];
}

/**
 * Language server settings for one server name.
 */
export interface LspSettings {
  readonly binary?: BinarySettings;
  /** Opaque workspace configuration forwarded to the server */
  readonly settings?: unknown;
}

/**
 * Source of per-worktree language server settings.
 */
export interface LspSettingsProvider {
  /**
   * @returns Settings for the server, or null when the worktree has none
   */
  forWorktree(serverName: string, worktree: Worktree): Promise<LspSettings | null>;
}

/**
 * Progress of a language server installation as shown by the host.
 */
export type InstallationStatus =
  | "checking-for-update"
  | "downloading"
  | "none"
  | { readonly failed: string };

/**
 * Receiver of installation progress. Calls are fire-and-forget.
 */
export interface InstallationStatusReporter {
  setStatus(serverName: string, status: InstallationStatus): void;
}
