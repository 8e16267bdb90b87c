/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Readonly<Record<string, string | undefined>>;

function read(key: string, env: Env): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: Env = process.env
): string {
  return read(key, env) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer no smaller than `min`.
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  min = Number.MIN_SAFE_INTEGER,
  env: Env = process.env
): number {
  const value = read(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(
      `Environment variable ${key} must be >= ${min}, got: ${parsed}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: Env = process.env
): boolean {
  const value = read(key, env);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
