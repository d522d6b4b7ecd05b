/**
 * Logging module.
 */

import type { Logger } from "./types";

export { LogLevel, type Logger, type LoggerName, type LogContext, type LoggingService } from "./types";
export { NodeLogService, type NodeLogServiceOptions } from "./node-log-service";

/**
 * Create a logger that discards everything.
 */
export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Shared silent logger for embedding without log output.
 */
export const SILENT_LOGGER: Logger = createSilentLogger();
