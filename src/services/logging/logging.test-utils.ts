/**
 * Logger doubles for tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";

type LogMethod = Mock<(message: string, context?: LogContext) => void>;

/** Logger whose methods are spies. */
export interface MockLogger extends Logger {
  silly: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Logging service handing out one MockLogger per name, in creation order. */
export interface MockLoggingService extends LoggingService {
  getCreatedLoggerNames(): LoggerName[];
}

export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  return {
    createLogger(name: LoggerName): Logger {
      const logger = loggers.get(name) ?? createMockLogger();
      loggers.set(name, logger);
      return logger;
    },
    dispose(): void {
      loggers.clear();
    },
    getCreatedLoggerNames: () => [...loggers.keys()],
  };
}

export interface LoggedMessage {
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Logger that records what was logged, grouped by level.
 *
 * @example
 * const logger = createBehavioralLogger();
 * await cache.materialize(tool, version, containerDir);
 * expect(logger.getMessagesByLevel("warn")).toEqual([]);
 */
export interface BehavioralLogger extends Logger {
  getMessagesByLevel(level: LogLevel): readonly LoggedMessage[];
}

export function createBehavioralLogger(): BehavioralLogger {
  const recorded: LoggedMessage[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      recorded.push({ level, message, context });
    };

  return {
    silly: record("silly"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    getMessagesByLevel: (level) => recorded.filter((entry) => entry.level === level),
  };
}
