/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Reading the pipeline configuration file
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 * - Resolving run settings against application defaults
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_json" / "file_not_found" */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load pipeline configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen PipelineConfig
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(input: unknown): Readonly<PipelineConfig> {
  const result = PipelineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Read, parse, and validate a pipeline configuration JSON file.
 *
 * @throws PipelineConfigError for a missing file, malformed JSON, or
 *         schema violations
 */
export function loadPipelineConfigFile(filePath: string): Readonly<PipelineConfig> {
  if (!existsSync(filePath)) {
    throw new PipelineConfigError(`Pipeline configuration not found: ${filePath}`, [
      { path: [], message: `file not found: ${filePath}`, code: "file_not_found" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PipelineConfigError(`Pipeline configuration is not valid JSON: ${filePath}`, [
      { path: [], message, code: "invalid_json" },
    ]);
  }

  return loadPipelineConfig(parsed);
}

/**
 * Validate pipeline configuration without throwing.
 * Useful for checking config files before committing to a run.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/** Run settings after falling back to application defaults. */
export interface PipelineSettings {
  readonly workerPoolSize: number;
  readonly runTimeoutMs: number;
  readonly moduleTimeoutMs: number;
}

/**
 * Fill the optional run settings of a pipeline config from defaults
 * (normally the environment-derived AppConfig).
 */
export function resolvePipelineSettings(
  pipeline: Pick<PipelineConfig, "workerPoolSize" | "runTimeoutMs" | "moduleTimeoutMs">,
  defaults: PipelineSettings
): PipelineSettings {
  return {
    workerPoolSize: pipeline.workerPoolSize ?? defaults.workerPoolSize,
    runTimeoutMs: pipeline.runTimeoutMs ?? defaults.runTimeoutMs,
    moduleTimeoutMs: pipeline.moduleTimeoutMs ?? defaults.moduleTimeoutMs,
  };
}
