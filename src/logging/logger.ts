/**
 * Lightweight logging utility.
 * Writes timestamped lines tagged with a run ID to the console and,
 * optionally, to a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import type { AppConfig } from "../config/index.js";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

/** Receives every formatted line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Extra destination, used by tests to capture output */
  sink?: LogSink;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "sink">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "pipeline.log",
  console: true,
  file: false,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * Derive a logger whose entries always carry `bindings`. A bound
   * `runId` replaces the process run ID in the line prefix.
   */
  child(bindings: LogContext): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context: LogContext = {},
  now: Date = new Date()
): string {
  const { runId: boundRunId, ...rest } = context;
  const runId =
    typeof boundRunId === "string" ? boundRunId : getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

  if (Object.keys(rest).length > 0) {
    entry += ` ${JSON.stringify(rest)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { sink, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }

    sink?.(level, entry);
  }

  function bind(bindings: LogContext): Logger {
    const write =
      (level: LogLevel) =>
      (message: string, context?: LogContext): void =>
        log(level, message, { ...bindings, ...context });

    return {
      debug: write("debug"),
      info: write("info"),
      warn: write("warn"),
      error: write("error"),
      child: (more) => bind({ ...bindings, ...more }),
    };
  }

  return bind({});
}

export type LoggingConfig = Pick<
  AppConfig,
  "logLevel" | "debug" | "logToFile" | "logDir" | "appName"
>;

/**
 * Create a logger from application config. `DEBUG` forces the debug
 * level; file output goes to `<logDir>/<appName>.log`.
 */
export function createLoggerFromConfig(
  appConfig: LoggingConfig,
  overrides: Pick<LoggerOptions, "console" | "sink"> = {}
): Logger {
  const level: LogLevel = appConfig.debug
    ? "debug"
    : isLogLevel(appConfig.logLevel)
      ? appConfig.logLevel
      : DEFAULT_OPTIONS.level;

  return createLogger({
    level,
    file: appConfig.logToFile,
    logDir: appConfig.logDir,
    logFile: `${appConfig.appName}.log`,
    ...overrides,
  });
}

/** A logger that drops everything. */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
