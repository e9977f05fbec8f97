/**
 * Logging module public API.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
export { LogLevel } from "./types";
export { FileLogService } from "./log-service";

import type { Logger } from "./types";

/**
 * Logger that drops everything. For call sites that have no logger wired.
 */
export const SILENT_LOGGER: Logger = {
  silly: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
