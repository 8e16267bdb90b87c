/**
 * Pipeline facade.
 *
 * Bundles a module registry, the orchestrator and the cache behind the
 * public API:
 *
 *   const pipeline = createPipeline({ pipelineConfig, factories });
 *   const result = await pipeline.runPipeline(["definition"], { term: "contract" });
 *   if (result.status === RunStatus.Complete) send(result.artifact);
 */

import { config, type AppConfig } from "../config/index.js";
import {
  resolvePipelineSettings,
  type PipelineConfig,
  type PipelineSettings,
} from "../config/pipeline/index.js";
import { createLoggerFromConfig, createSilentLogger, type Logger } from "../logging/index.js";
import type { ModuleDescriptor, ModuleFactory } from "../types/module.js";
import type { PipelineRunResult, WavePlan } from "../types/pipeline.js";
import type { ModuleDescriptorInput } from "../config/pipeline/schema.js";
import { ContentAssembler, type AssemblerOptions } from "./assembler.js";
import { CacheLayer, getSharedCache } from "./cache.js";
import { DescriptorValidationError } from "./errors.js";
import { Orchestrator, type RunOptions } from "./orchestrator.js";
import { ModuleRegistry, type ModuleDefinition, type ModuleSummary } from "./registry.js";
import { DependencyResolver } from "./resolver.js";
import { WorkerPool } from "./worker-pool.js";

export interface PipelineOptions {
  /** Run settings; missing values fall back to the environment config. */
  settings?: Partial<PipelineSettings>;
  cache?: CacheLayer;
  pool?: WorkerPool;
  assembler?: AssemblerOptions;
  logger?: Logger;
}

export class Pipeline {
  readonly registry: ModuleRegistry;
  readonly cache: CacheLayer;
  readonly settings: PipelineSettings;
  private readonly orchestrator: Orchestrator;

  constructor(options: PipelineOptions = {}) {
    const logger = options.logger ?? createSilentLogger();
    this.settings = resolvePipelineSettings(options.settings ?? {}, config);
    this.registry = new ModuleRegistry({ logger });
    this.cache = options.cache ?? getSharedCache();
    this.orchestrator = new Orchestrator({
      registry: this.registry,
      resolver: new DependencyResolver(),
      cache: this.cache,
      pool: options.pool ?? new WorkerPool(this.settings.workerPoolSize),
      runTimeoutMs: this.settings.runTimeoutMs,
      moduleTimeoutMs: this.settings.moduleTimeoutMs,
      assembler: new ContentAssembler(options.assembler),
      logger,
    });
  }

  registerModule(
    descriptor: ModuleDescriptorInput | ModuleDescriptor,
    factory: ModuleFactory
  ): ModuleDescriptor {
    return this.registry.register(descriptor, factory);
  }

  /** Register a batch atomically; members may depend on each other. */
  registerModules(definitions: readonly ModuleDefinition[]): ModuleDescriptor[] {
    return this.registry.registerAll(definitions);
  }

  runPipeline(
    moduleIds?: readonly string[],
    initialContext: Readonly<Record<string, unknown>> = {},
    options: RunOptions = {}
  ): Promise<PipelineRunResult> {
    return this.orchestrator.runPipeline(moduleIds, initialContext, options);
  }

  getOrCompute<T>(key: string, compute: () => T | Promise<T>, ttlMs?: number): Promise<T> {
    return this.cache.getOrCompute(key, compute, ttlMs);
  }

  plan(moduleIds?: readonly string[]): WavePlan {
    return this.orchestrator.plan(moduleIds);
  }

  /** Registered modules ordered by ascending priority. */
  modules(): ModuleSummary[] {
    return this.registry.summaries();
  }
}

export interface CreatePipelineOptions extends Omit<PipelineOptions, "settings"> {
  pipelineConfig: Readonly<PipelineConfig>;
  /** Factory for every module id in the config. */
  factories: Readonly<Record<string, ModuleFactory>>;
  /**
   * Defaults for settings the config leaves out. Also configures the
   * logger when none is given.
   */
  appConfig?: AppConfig;
}

/**
 * Build a pipeline from a loaded pipeline config and register all of its
 * modules in one batch.
 *
 * @throws DescriptorValidationError when a module has no factory
 */
export function createPipeline(options: CreatePipelineOptions): Pipeline {
  const { pipelineConfig, factories, appConfig = config, ...rest } = options;

  const pipeline = new Pipeline({
    ...rest,
    logger: rest.logger ?? createLoggerFromConfig(appConfig),
    settings: resolvePipelineSettings(pipelineConfig, appConfig),
  });

  pipeline.registerModules(
    pipelineConfig.modules.map((descriptor) => {
      const factory = factories[descriptor.id];
      if (!factory) {
        throw new DescriptorValidationError(descriptor.id, ["no module factory provided"]);
      }
      return { descriptor, factory };
    })
  );

  return pipeline;
}
