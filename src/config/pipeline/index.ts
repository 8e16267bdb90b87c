/**
 * Pipeline configuration module.
 *
 * Provides schema-validated, immutable module descriptors and run
 * settings for the prompt pipeline.
 *
 * Usage:
 *   import { loadPipelineConfigFile, resolvePipelineSettings } from "./config/pipeline/index.js";
 *
 *   const pipelineConfig = loadPipelineConfigFile("config/pipeline.json");
 *   const settings = resolvePipelineSettings(pipelineConfig, config);
 */

export type {
  PipelineConfig,
  ModuleDescriptorInput,
} from "./schema.js";

export {
  PipelineConfigSchema,
  ModuleDescriptorSchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  resolvePipelineSettings,
  deepFreeze,
  PipelineConfigError,
  type ConfigValidationIssue,
  type PipelineSettings,
} from "./loader.js";
