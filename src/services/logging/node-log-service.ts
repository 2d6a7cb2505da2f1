/**
 * NodeLogService - logging implementation using electron-log's Node.js entry.
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
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
import { LogLevel } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/** Level used when SQUIRREL_LOGLEVEL is unset or invalid. */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => (value === null ? `${key}=null` : `${key}=${String(value)}`))
    .join(" ");
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

/**
 * Parse and validate SQUIRREL_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Parse SQUIRREL_LOGGER (comma-separated logger names).
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): ReadonlySet<string> | undefined {
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
export function generateSessionFilename(now: Date = new Date()): string {
  const timestamp = now
    .toISOString()
    .replace(/[:.]/g, "-") // Replace : and . with -
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = withContext(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: ReadonlySet<string> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service for the installer and launcher.
 *
 * Configuration:
 * - Default level: WARN
 * - Override via SQUIRREL_LOGLEVEL environment variable
 * - Console output via SQUIRREL_PRINT_LOGS (any non-empty value)
 * - Logger filtering via SQUIRREL_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService(pathProvider);
 * const logger = loggingService.createLogger("installer");
 * logger.info("Installed", { version: "1.2.0" });
 * // Output: [2026-01-10 10:30:00.123] [info] [installer] Installed version=1.2.0
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly enableConsole: boolean;
  private readonly allowedLoggers: ReadonlySet<string> | undefined;

  constructor(pathProvider: Pick<PathProvider, "logsDir">) {
    this.logLevel = parseLogLevel(process.env.SQUIRREL_LOGLEVEL) ?? DEFAULT_LOG_LEVEL;
    this.enableConsole = !!process.env.SQUIRREL_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(process.env.SQUIRREL_LOGGER);

    const filename = generateSessionFilename();
    log.transports.file.resolvePathFn = (): string => join(pathProvider.logsDir, filename);
    log.transports.file.level = this.logLevel;
    log.transports.console.level = this.enableConsole ? this.logLevel : false;

    log.transports.file.format = LOG_FORMAT;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * If SQUIRREL_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }
}
