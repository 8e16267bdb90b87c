/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Also append log lines to a file under logDir */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** Application name */
  readonly appName: string;
  /** Worker slots shared by every wave of a run */
  readonly workerPoolSize: number;
  /** Run-level timeout in ms; 0 disables it */
  readonly runTimeoutMs: number;
  /** Default per-module timeout in ms; 0 disables it */
  readonly moduleTimeoutMs: number;
  /** Default cache entry lifetime in ms */
  readonly cacheDefaultTtlMs: number;
  /** Upper bound on ready cache entries; 0 means unbounded */
  readonly cacheMaxEntries: number;
  /** Directory holding `<category>.json` rule files */
  readonly rulesDir: string;
}

/**
 * Load application configuration from an environment map.
 * Fails fast on malformed numbers and booleans.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    logToFile: optionalEnvBool("LOG_FILE", false, env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    appName: optionalEnv("APP_NAME", "definition-prompt-pipeline", env),
    workerPoolSize: optionalEnvInt("PIPELINE_WORKER_POOL_SIZE", 4, 1, env),
    runTimeoutMs: optionalEnvInt("PIPELINE_RUN_TIMEOUT_MS", 30_000, 0, env),
    moduleTimeoutMs: optionalEnvInt("PIPELINE_MODULE_TIMEOUT_MS", 10_000, 0, env),
    cacheDefaultTtlMs: optionalEnvInt("CACHE_DEFAULT_TTL_MS", 3_600_000, 1, env),
    cacheMaxEntries: optionalEnvInt("CACHE_MAX_ENTRIES", 1000, 0, env),
    rulesDir: optionalEnv("RULES_DIR", "config/rules", env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have a closed set of options.
 * Call this at application startup to fail fast.
 */
export function validateConfig(target: AppConfig = config): void {
  if (!["development", "production", "test"].includes(target.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${target.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(target.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${target.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
