/**
 * Host collaborator interfaces and their Node implementations.
 */

export type {
  BinarySettings,
  EnvPair,
  InstallationStatus,
  InstallationStatusReporter,
  LspSettings,
  LspSettingsProvider,
  Worktree,
} from "./types";
export { LocalWorktree, type LocalWorktreeDeps } from "./worktree";
export { JsonLspSettingsProvider, type JsonLspSettingsProviderDeps } from "./lsp-settings";
export { LoggingStatusReporter } from "./installation-status";
