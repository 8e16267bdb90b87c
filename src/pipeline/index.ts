/**
 * Module pipeline: registry, wave resolution, execution and assembly.
 *
 * Usage:
 *   import { createPipeline } from "./pipeline/index.js";
 *
 *   const pipeline = createPipeline({ pipelineConfig, factories });
 *   const { status, artifact } = await pipeline.runPipeline();
 */

export { Pipeline, createPipeline, type PipelineOptions, type CreatePipelineOptions } from "./pipeline.js";
export { Orchestrator, type OrchestratorOptions, type RunOptions } from "./orchestrator.js";
export {
  ModuleRegistry,
  parseDescriptor,
  validateDescriptorSet,
  type ModuleDefinition,
  type ModuleSummary,
} from "./registry.js";
export {
  DependencyResolver,
  computeWaves,
  findCycleMembers,
  planFingerprint,
  type PlanInput,
} from "./resolver.js";
export {
  CacheLayer,
  cached,
  getSharedCache,
  resetSharedCache,
  type CacheOptions,
  type CacheStats,
  type CacheEntryState,
  type CachedOptions,
} from "./cache.js";
export {
  SharedStateStore,
  MISSING,
  isMissing,
  type Missing,
  type SharedStateReader,
} from "./shared-state.js";
export {
  ContentAssembler,
  defaultPlaceholder,
  type AssemblerOptions,
  type AssemblyInput,
  type AssemblyResult,
} from "./assembler.js";
export { WorkerPool } from "./worker-pool.js";
export { fingerprint, hashText, stableStringify } from "./fingerprint.js";
export * from "./errors.js";
