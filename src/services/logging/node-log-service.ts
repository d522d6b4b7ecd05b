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
import type { PathProvider } from "../platform/path-provider";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { LogLevel as LogLevelValues } from "./types";

type LogScope = ReturnType<typeof log.scope>;

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

/**
 * Parse and validate LSPROVISION_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return Object.values(LogLevelValues).find((level) => level === normalized);
}

/**
 * Parse LSPROVISION_LOGGER into the set of allowed logger names.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
function parseLoggerFilter(envValue: string | undefined): Set<string> | undefined {
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
  constructor(private readonly scope: LogScope) {}

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
 * Logger that is a no-op unless its name is in the allowed set.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<string> | undefined,
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
 * Options for NodeLogService.
 */
export interface NodeLogServiceOptions {
  /** Development mode logs at debug level by default. Default: NODE_ENV === "development" */
  readonly isDevelopment?: boolean;
  /** Environment to read configuration from. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Logging service backed by electron-log.
 *
 * Configuration:
 * - Default level: DEBUG (development) / WARN (otherwise)
 * - Override via LSPROVISION_LOGLEVEL
 * - Console output via LSPROVISION_PRINT_LOGS (any non-empty value)
 * - Logger filtering via LSPROVISION_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService(pathProvider);
 * const logger = loggingService.createLogger('cache');
 * logger.info('Download complete', { tool: 'marksman', version: '2024-12-18' });
 * // [2025-12-16 10:30:00.123] [info] [cache] Download complete tool=marksman version=2024-12-18
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<string> | undefined;

  constructor(pathProvider: PathProvider, options: NodeLogServiceOptions = {}) {
    const env = options.env ?? process.env;
    const isDevelopment = options.isDevelopment ?? env.NODE_ENV === "development";

    this.logLevel = parseLogLevel(env.LSPROVISION_LOGLEVEL) ?? (isDevelopment ? "debug" : "warn");
    this.allowedLoggers = parseLoggerFilter(env.LSPROVISION_LOGGER);
    const enableConsole = !!env.LSPROVISION_PRINT_LOGS;

    const logFile = join(pathProvider.logsDir, generateSessionFilename());
    log.transports.file.resolvePathFn = (): string => logFile;
    log.transports.file.level = this.logLevel;
    log.transports.file.format = LOG_FORMAT;

    log.transports.console.level = enableConsole ? this.logLevel : false;
    log.transports.console.format = LOG_FORMAT;
  }

  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const logger = new FilteredLogger(
      new ScopedLogger(log.scope(`[${name}]`)),
      this.allowedLoggers,
      name
    );
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
