/**
 * Platform layer error definitions.
 *
 * Thrown while detecting the host platform, before any service runs.
 */

/**
 * Error codes for platform operations.
 */
export type PlatformErrorCode = "UNSUPPORTED_PLATFORM" | "UNSUPPORTED_ARCHITECTURE";

/**
 * Error from platform layer operations.
 *
 * @example
 * ```typescript
 * throw new PlatformError("UNSUPPORTED_PLATFORM", "Unsupported platform: freebsd");
 * ```
 */
export class PlatformError extends Error {
  override readonly name = "PlatformError";

  constructor(
    /** Error code identifying the type of error */
    readonly code: PlatformErrorCode,
    message: string
  ) {
    super(message);
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Type guard to check if an error is a PlatformError.
 */
export function isPlatformError(error: unknown): error is PlatformError {
  return error instanceof PlatformError;
}

/**
 * Type guard to check if an error is a PlatformError with a specific code.
 */
export function isPlatformErrorWithCode(
  error: unknown,
  code: PlatformErrorCode
): error is PlatformError {
  return isPlatformError(error) && error.code === code;
}
