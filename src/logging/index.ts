/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  createLoggerFromConfig,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogSink,
  type LoggerOptions,
  type LoggingConfig,
} from "./logger.js";
