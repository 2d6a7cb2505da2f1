/**
 * Logging module exports.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel } from "./types.js";
export { NodeLogService } from "./node-log-service.js";
