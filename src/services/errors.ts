/**
 * Service error definitions with serialization support for the host boundary.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Error codes for binary download operations.
 */
export type BinaryDownloadErrorCode =
  | "NETWORK_ERROR"
  | "EXTRACTION_FAILED"
  | "UNSUPPORTED_PLATFORM"
  | "PERMISSION_DENIED";

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode = "INVALID_ARCHIVE" | "EXTRACTION_FAILED" | "PERMISSION_DENIED";

/**
 * Error codes for version negotiation.
 */
export type VersionNegotiationErrorCode =
  | "FETCH_FAILED"
  | "PARSE_FAILED"
  | "UNSUPPORTED_PLATFORM"
  | "NO_MATCHING_RELEASE"
  | "INCOMPATIBLE_TOOLCHAIN";

/**
 * Error codes for debug task translation.
 */
export type DebugTaskErrorCode = "UNSUPPORTED_BUILD_TASK" | "MISSING_PROJECT_NAME";

/**
 * Serialized error format handed to the host runtime.
 */
export interface SerializedError {
  readonly type:
    | "binary-download"
    | "archive"
    | "version-negotiation"
    | "debug-task"
    | "filesystem";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error for the host boundary.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }

  /**
   * Recreate the matching ServiceError subclass from its serialized form.
   *
   * @example
   * ```typescript
   * const error = ServiceError.fromJSON(serialized);
   * if (error instanceof VersionNegotiationError) {
   *   // show the compatibility message
   * }
   * ```
   */
  static fromJSON(json: SerializedError): ServiceError {
    switch (json.type) {
      case "binary-download":
        return new BinaryDownloadError(json.message, json.code as BinaryDownloadErrorCode);
      case "archive":
        return new ArchiveError(json.message, json.code as ArchiveErrorCode);
      case "version-negotiation":
        return new VersionNegotiationError(
          json.message,
          json.code as VersionNegotiationErrorCode
        );
      case "debug-task":
        return new DebugTaskError(json.message, json.code as DebugTaskErrorCode);
      case "filesystem":
        return new FileSystemError(
          (json.code as FileSystemErrorCode) ?? "UNKNOWN",
          json.path ?? "",
          json.message
        );
    }
  }
}

/**
 * Error from downloading, unpacking or installing the language server binary.
 */
export class BinaryDownloadError extends ServiceError {
  readonly type = "binary-download" as const;

  constructor(
    message: string,
    readonly errorCode?: BinaryDownloadErrorCode
  ) {
    super(message, errorCode);
    this.name = "BinaryDownloadError";
  }
}

/**
 * Error from archive extraction operations (tar.gz, zip).
 */
export class ArchiveError extends ServiceError {
  readonly type = "archive" as const;

  constructor(
    message: string,
    readonly errorCode?: ArchiveErrorCode
  ) {
    super(message, errorCode);
    this.name = "ArchiveError";
  }
}

/**
 * Error from finding a language server release for the current toolchain.
 */
export class VersionNegotiationError extends ServiceError {
  readonly type = "version-negotiation" as const;

  constructor(
    message: string,
    readonly errorCode?: VersionNegotiationErrorCode
  ) {
    super(message, errorCode);
    this.name = "VersionNegotiationError";
  }
}

/**
 * Error from turning a build task into a launch request.
 */
export class DebugTaskError extends ServiceError {
  readonly type = "debug-task" as const;

  constructor(
    message: string,
    readonly errorCode?: DebugTaskErrorCode
  ) {
    super(message, errorCode);
    this.name = "DebugTaskError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export { getErrorMessage } from "../shared/error-utils";
