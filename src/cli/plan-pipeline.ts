#!/usr/bin/env node
/**
 * CLI command to validate a pipeline configuration and print its wave plan.
 *
 * Validates:
 * - Config file shape (zod schema)
 * - Unique module ids and known dependencies
 * - One producer per shared-state key
 * - Acyclic dependency graph
 * - Consumers depend on the producers of the keys they read
 *
 * Usage:
 *   npx tsx src/cli/plan-pipeline.ts [options]
 *   npm run plan-pipeline -- --config config/pipeline.json
 *
 * Options:
 *   --config <path>   Pipeline config JSON (default: config/pipeline.json)
 *   --json            Output the plan as JSON
 *   --no-color        Disable ANSI colors
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Configuration is valid
 *   1 - Configuration or descriptor set is invalid
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  loadPipelineConfigFile,
  resolvePipelineSettings,
  PipelineConfigError,
  type PipelineConfig,
  type PipelineSettings,
} from "../config/index.js";
import { createLoggerFromConfig, initRunId } from "../logging/index.js";
import { PipelineError } from "../pipeline/errors.js";
import { validateDescriptorSet } from "../pipeline/registry.js";
import { DependencyResolver } from "../pipeline/resolver.js";
import type { ModuleDescriptor } from "../types/module.js";

// ============================================================
// Types
// ============================================================

export interface PlannedModule {
  id: string;
  name: string;
  priority: number;
  required: boolean;
  wave: number;
  dependencies: readonly string[];
}

export interface PlanReport {
  fingerprint: string;
  settings: PipelineSettings;
  waves: string[][];
  /** Ordered by ascending priority, then id. */
  modules: PlannedModule[];
}

// ============================================================
// Planning
// ============================================================

/**
 * Validate the descriptor set of a loaded config and compute its plan.
 *
 * @throws PipelineError subclasses for an invalid descriptor set
 */
export function buildPlanReport(
  pipelineConfig: Readonly<PipelineConfig>,
  defaults: PipelineSettings = config
): PlanReport {
  const descriptors: ModuleDescriptor[] = pipelineConfig.modules;
  validateDescriptorSet(descriptors);

  const plan = new DependencyResolver().resolve(descriptors);
  const waveOf = new Map<string, number>();
  plan.waves.forEach((wave, index) => {
    for (const id of wave) waveOf.set(id, index);
  });

  const modules = descriptors
    .map((d) => ({
      id: d.id,
      name: d.name,
      priority: d.priority,
      required: d.required,
      wave: waveOf.get(d.id) ?? -1,
      dependencies: d.dependencies,
    }))
    .sort((a, b) =>
      a.priority !== b.priority ? a.priority - b.priority : a.id < b.id ? -1 : a.id > b.id ? 1 : 0
    );

  return {
    fingerprint: plan.fingerprint,
    settings: resolvePipelineSettings(pipelineConfig, defaults),
    waves: plan.waves.map((wave) => [...wave]),
    modules,
  };
}

export function formatWavePlan(report: PlanReport): string {
  const { settings } = report;
  const lines = [
    `Wave plan ${report.fingerprint} (${report.modules.length} modules, ${report.waves.length} waves)`,
    `  workers: ${settings.workerPoolSize}, run timeout: ${settings.runTimeoutMs}ms, module timeout: ${settings.moduleTimeoutMs}ms`,
    "",
  ];

  report.waves.forEach((wave, index) => {
    lines.push(`  wave ${index}: ${wave.join(", ")}`);
  });

  lines.push("", "Modules (assembly order):");
  for (const m of report.modules) {
    const flags = m.required ? " [required]" : "";
    const deps = m.dependencies.length > 0 ? ` <- ${m.dependencies.join(", ")}` : "";
    lines.push(`  ${String(m.priority).padStart(4)}  ${m.id}${flags}${deps}`);
  }

  return lines.join("\n");
}

// ============================================================
// Colors
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
} as const;

let useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// CLI
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string", default: "config/pipeline.json" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: plan-pipeline [options]

Options:
  --config <path>   Pipeline config JSON (default: config/pipeline.json)
  --json            Output the plan as JSON
  --no-color        Disable ANSI colors
  -h, --help        Show this help message

Exit codes:
  0 - Configuration is valid
  1 - Configuration or descriptor set is invalid
`);
    process.exit(0);
  }

  return values;
}

function main(): void {
  const args = parseCliArgs();
  if (args["no-color"]) useColors = false;

  initRunId();
  const logger = createLoggerFromConfig(config);
  const configPath = resolve(args.config);

  try {
    logger.debug("Loading pipeline config", { configPath });
    const report = buildPlanReport(loadPipelineConfigFile(configPath));
    logger.debug("Wave plan computed", {
      fingerprint: report.fingerprint,
      modules: report.modules.length,
      waves: report.waves.length,
    });
    if (args.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(formatWavePlan(report));
      console.log(`\n${c("green", "✓")} ${configPath} is valid`);
    }
    process.exit(0);
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      logger.debug("Pipeline config rejected", { configPath, issues: err.issues.length });
      console.error(c("red", err.format()));
      process.exit(1);
    }
    if (err instanceof PipelineError) {
      logger.debug("Descriptor set rejected", { configPath, kind: err.kind });
      console.error(c("red", `${err.name} (${err.kind}): ${err.message}`));
      process.exit(1);
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("plan-pipeline.ts") ||
   process.argv[1].endsWith("plan-pipeline.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  }
}
