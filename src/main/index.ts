/**
 * Public entry point: the extension facade, its bootstrap and the types the
 * host exchanges with it.
 */

export { createZigExtension, type ZigExtensionOptions, type ZigExtensionRuntime } from "./bootstrap";
export {
  ZigExtension,
  LANGUAGE_SERVER_NAME,
  type LanguageServerCommand,
  type ZigExtensionDeps,
} from "./zig-extension";
export type {
  EnvPair,
  InstallationStatus,
  InstallationStatusReporter,
  LspSettings,
  LspSettingsProvider,
  Worktree,
} from "../services/host";
export type { BuildTask, DebugScenario, LaunchRequest } from "../services/debug-tasks";
export type { ResolvedBinary } from "../services/binary-resolution";
export type { ProvisionerConfig } from "../services/config";
export {
  ServiceError,
  BinaryDownloadError,
  ArchiveError,
  VersionNegotiationError,
  DebugTaskError,
  FileSystemError,
  isServiceError,
  type SerializedError,
} from "../services/errors";
