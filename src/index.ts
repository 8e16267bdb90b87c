/**
 * Definition prompt pipeline.
 *
 * Public API: build a pipeline from configuration, register prompt
 * modules, and run them into one assembled artifact.
 */

export * from "./types/index.js";
export * from "./pipeline/index.js";
export {
  config,
  loadConfig,
  validateConfig,
  ConfigError,
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  resolvePipelineSettings,
  PipelineConfigError,
  type AppConfig,
  type PipelineConfig,
  type PipelineSettings,
  type ModuleDescriptorInput,
  type ConfigValidationIssue,
} from "./config/index.js";
export {
  createLogger,
  createSilentLogger,
  createLoggerFromConfig,
  initRunId,
  getRunId,
  generateRunId,
  type Logger,
  type LogLevel,
  type LogContext,
} from "./logging/index.js";
export { RuleConfigStore, RuleLoadError, type RuleRecord } from "./rules/index.js";
export {
  createRuleSectionModule,
  formatRuleSection,
  type RuleSectionOptions,
} from "./modules/rule-section.js";
