/**
 * Logging contracts shared by every service.
 */

/**
 * Levels from most to least verbose.
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger scopes. SQUIRREL_LOGGER filters on these names.
 */
export type LoggerName =
  | "process" // ExecaProcessRunner
  | "network" // DefaultNetworkLayer
  | "fs" // DefaultFileSystemLayer
  | "platform" // PlatformIdResolver, LibcDetector
  | "fetcher" // ResilientFetcher
  | "release" // VersionResolver, ManifestResolver
  | "installer" // AtomicInstaller, BinDirResolver
  | "settings" // SettingsStore
  | "dispatcher" // BinaryLocator, Dispatcher
  | "path-advisor"
  | "skill"
  | "config" // release parser selection
  | "install"; // InstallFlow

/**
 * Structured fields appended to a log line as `key=value`.
 * Flat primitives only, so every entry serializes to one line.
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Injected into every service.
 *
 * Levels in practice:
 * - silly: individual probes and candidates
 * - debug: requests, redirects, spawned commands
 * - info: resolved versions, completed installs
 * - warn: recoverable problems (retries, degraded parser, skipped skill)
 * - error: failures the user will see
 *
 * @example
 * this.logger.info("Resolved artifact", { tag, platformId, filename });
 */
export interface Logger {
  silly(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /** @param error - Included with its stack */
  error(message: string, context?: LogContext, error?: Error): void;
}

export interface LoggingService {
  /**
   * Logger for a scope; the same instance for repeated names.
   */
  createLogger(name: LoggerName): Logger;
}
