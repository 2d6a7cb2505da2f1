/**
 * Logger doubles for tests.
 */

import type { Logger, LogContext, LogLevel } from "./types.js";

/**
 * Logger that discards everything.
 */
export function createSilentLogger(): Logger {
  const discard = (): void => undefined;
  return { silly: discard, debug: discard, info: discard, warn: discard, error: discard };
}

export interface LoggedMessage {
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Logger that records what was logged, for asserting on warnings a service
 * emits instead of throwing.
 */
export interface BehavioralLogger extends Logger {
  getMessages(): readonly LoggedMessage[];
  getMessagesByLevel(level: LogLevel): readonly LoggedMessage[];
}

/**
 * @example
 * const logger = createBehavioralLogger();
 * await new SkillInstaller(fileSystem, platformInfo, logger).install(source);
 * expect(logger.getMessagesByLevel("warn")).toEqual([
 *   { level: "warn", message: "Skill source unavailable, skipping skill install", context: { ... } },
 * ]);
 */
export function createBehavioralLogger(): BehavioralLogger {
  const messages: LoggedMessage[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      messages.push({ level, message, context });
    };

  return {
    silly: record("silly"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    getMessages: () => [...messages],
    getMessagesByLevel: (level) => messages.filter((entry) => entry.level === level),
  };
}
