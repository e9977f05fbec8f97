/**
 * FileLogService - Logging implementation using electron-log's Node entry.
 *
 * Features:
 * - Session-based log files: `<datetime>-<uuid>.log`
 * - Environment variable configuration for level and console output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { PathProvider } from "../platform/path-provider";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { LogLevel as LogLevelValues } from "./types";

type LogScope = ReturnType<typeof log.scope>;

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LogLevelValues, value);
}

/**
 * Parse and validate ZLS_PROVISIONER_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Parse ZLS_PROVISIONER_LOGGER to get the set of allowed logger names.
 *
 * @param envValue - Comma-separated logger names
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): Set<string> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .slice(0, 19);
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ScopedLogger implements Logger {
  constructor(
    private readonly scope: LogScope,
    private readonly enabled: boolean
  ) {}

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.silly(this.compose(message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.debug(this.compose(message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.info(this.compose(message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.scope.warn(this.compose(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.enabled) return;
    if (error) {
      this.scope.error(this.compose(message, context), error);
    } else {
      this.scope.error(this.compose(message, context));
    }
  }

  private compose(message: string, context: LogContext | undefined): string {
    const contextStr = formatContext(context);
    return contextStr ? `${message} ${contextStr}` : message;
  }
}

/**
 * Logging service writing one file per session.
 *
 * Configuration:
 * - Default level: WARN
 * - Override via ZLS_PROVISIONER_LOGLEVEL
 * - Console output via ZLS_PROVISIONER_PRINT_LOGS (any non-empty value)
 * - Logger filtering via ZLS_PROVISIONER_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const logger = new FileLogService(pathProvider).createLogger('download');
 * logger.info('Download complete', { version: '0.13.0' });
 * // Output: [2025-12-16 10:30:00.123] [info] [download] Download complete version=0.13.0
 * ```
 */
export class FileLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly allowedLoggers: Set<string> | undefined;

  constructor(pathProvider: Pick<PathProvider, "logsDir">, env: NodeJS.ProcessEnv = process.env) {
    const logLevel = parseLogLevel(env.ZLS_PROVISIONER_LOGLEVEL) ?? "warn";
    const enableConsole = !!env.ZLS_PROVISIONER_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(env.ZLS_PROVISIONER_LOGGER);

    const filename = generateSessionFilename();
    log.transports.file.resolvePathFn = (): string => join(pathProvider.logsDir, filename);
    log.transports.file.level = logLevel;
    log.transports.console.level = enableConsole ? logLevel : false;

    log.transports.file.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
    log.transports.console.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
  }

  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const enabled = this.allowedLoggers === undefined || this.allowedLoggers.has(name);
    const logger = new ScopedLogger(log.scope(`[${name}]`), enabled);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
