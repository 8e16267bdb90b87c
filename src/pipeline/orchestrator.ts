/**
 * Pipeline orchestrator.
 *
 * Executes a wave plan for one run:
 *
 *   1. The requested modules are closed over their dependencies and the
 *      wave plan is resolved (memoized per module set).
 *   2. Waves run one after another. Every module of a wave is dispatched
 *      to the bounded worker pool; the next wave starts only once all of
 *      them have settled. Writes returned by a wave are committed to the
 *      run's shared state at that barrier, so wave N+1 sees everything
 *      wave N produced.
 *   3. The assembler joins successful content into the artifact.
 *
 * Failure policy:
 *
 *   - An optional module that fails or times out is recorded and left out
 *     of the artifact. Its siblings and the run status are unaffected.
 *   - A required module that fails or times out lets its wave drain; later
 *     waves are not dispatched and the run ends as partial_failure.
 *   - A per-module timeout aborts that module's signal and discards its
 *     result. The work itself is not interrupted.
 *   - When the run timeout passes, or the caller's signal aborts, no
 *     further wave is dispatched. Modules still running are recorded as
 *     cancelled and give up their worker slots at once; their late
 *     results are discarded. The run ends as cancelled with whatever
 *     completed.
 *   - Unknown module ids, or an initial context that seeds a key a
 *     selected module produces, reject the run before any module runs.
 */

import { performance } from "node:perf_hooks";

import { config } from "../config/index.js";
import {
  createSilentLogger,
  generateRunId,
  type Logger,
} from "../logging/index.js";
import {
  ModuleStatus,
  type ErrorKind,
  type ModuleContext,
  type ModuleDescriptor,
  type ModuleOutput,
} from "../types/module.js";
import {
  RunStatus,
  type ModuleExecutionRecord,
  type PipelineRunResult,
  type WavePlan,
} from "../types/pipeline.js";
import { ContentAssembler } from "./assembler.js";
import { CacheLayer, getSharedCache } from "./cache.js";
import {
  CancelledRunError,
  DuplicateKeyProducerError,
  ModuleExecutionError,
  ModuleTimeoutError,
  PipelineError,
  UndeclaredKeyError,
} from "./errors.js";
import type { ModuleRegistry } from "./registry.js";
import { DependencyResolver } from "./resolver.js";
import { SharedStateStore } from "./shared-state.js";
import { WorkerPool } from "./worker-pool.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface OrchestratorOptions {
  registry: ModuleRegistry;
  resolver?: DependencyResolver;
  cache?: CacheLayer;
  /** Pool to share with other orchestrators; otherwise one is created. */
  pool?: WorkerPool;
  workerPoolSize?: number;
  /** Default run timeout in ms; 0 disables it. */
  runTimeoutMs?: number;
  /** Default per-module timeout in ms; 0 disables it. */
  moduleTimeoutMs?: number;
  assembler?: ContentAssembler;
  logger?: Logger;
}

export interface RunOptions {
  runTimeoutMs?: number;
  moduleTimeoutMs?: number;
  /** Aborting this signal cancels the run. */
  signal?: AbortSignal;
  runId?: string;
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

interface ActiveRun {
  readonly runId: string;
  readonly logger: Logger;
  readonly state: SharedStateStore;
  readonly controller: AbortController;
  readonly moduleTimeoutMs: number;
  cancelled?: CancelledRunError;
}

interface ModuleOutcome {
  readonly record: ModuleExecutionRecord;
  readonly content?: string;
  readonly writes?: Readonly<Record<string, unknown>>;
}

type Preparation =
  | {
      readonly ok: true;
      readonly descriptors: ModuleDescriptor[];
      readonly plan: WavePlan;
      readonly state: SharedStateStore;
    }
  | { readonly ok: false; readonly error: PipelineError };

const TIMED_OUT: unique symbol = Symbol("timed-out");
const RUN_CANCELLED: unique symbol = Symbol("run-cancelled");

function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorKindOf(err: unknown): ErrorKind {
  if (err instanceof PipelineError) {
    switch (err.kind) {
      case "computation_failed":
      case "undeclared_key":
      case "timeout":
      case "cancelled_run":
        return err.kind;
    }
  }
  return "module_execution";
}

/** Resolves once `signal` aborts; `dispose` detaches the listener. */
function whenAborted(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let listener: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    listener = () => resolve();
    signal.addEventListener("abort", listener, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener("abort", listener);
    },
  };
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  private readonly registry: ModuleRegistry;
  private readonly resolver: DependencyResolver;
  private readonly cache: CacheLayer;
  private readonly pool: WorkerPool;
  private readonly runTimeoutMs: number;
  private readonly moduleTimeoutMs: number;
  private readonly assembler: ContentAssembler;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver ?? new DependencyResolver();
    this.cache = options.cache ?? getSharedCache();
    this.pool = options.pool ?? new WorkerPool(options.workerPoolSize ?? config.workerPoolSize);
    this.runTimeoutMs = options.runTimeoutMs ?? config.runTimeoutMs;
    this.moduleTimeoutMs = options.moduleTimeoutMs ?? config.moduleTimeoutMs;
    this.assembler = options.assembler ?? new ContentAssembler();
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Wave plan for `moduleIds` (all registered modules when omitted),
   * including their transitive dependencies.
   */
  plan(moduleIds?: readonly string[]): WavePlan {
    return this.resolver.resolve(this.registry.closure(moduleIds ?? this.allIds()));
  }

  /**
   * Execute one pipeline run. Never throws for module failures; inspect
   * `status` before trusting the artifact.
   */
  async runPipeline(
    moduleIds?: readonly string[],
    initialContext: Readonly<Record<string, unknown>> = {},
    options: RunOptions = {}
  ): Promise<PipelineRunResult> {
    const runId = options.runId ?? generateRunId();
    const startedAt = new Date();
    const started = performance.now();
    const logger = this.logger.child({ runId });

    const prepared = this.prepare(moduleIds ?? this.allIds(), initialContext);
    if (!prepared.ok) {
      logger.error("Pipeline run rejected", {
        kind: prepared.error.kind,
        message: prepared.error.message,
      });
      const { artifact, metadata } = this.assembler.assemble({
        runId,
        status: RunStatus.Rejected,
        startedAt,
        totalDurationMs: roundMs(performance.now() - started),
        waveCount: 0,
        records: [],
        contents: new Map(),
        registrationIndex: () => 0,
      });
      return {
        status: RunStatus.Rejected,
        artifact,
        metadata,
        sharedState: Object.freeze({}),
        error: { kind: prepared.error.kind, message: prepared.error.message },
      };
    }

    const { descriptors, plan, state } = prepared;
    const run: ActiveRun = {
      runId,
      logger,
      state,
      controller: new AbortController(),
      moduleTimeoutMs: options.moduleTimeoutMs ?? this.moduleTimeoutMs,
    };

    const cancel = (reason: "timeout" | "aborted"): void => {
      if (run.cancelled) return;
      run.cancelled = new CancelledRunError(reason);
      run.controller.abort(run.cancelled);
      logger.warn("Pipeline run cancelled", { reason });
    };

    const runTimeoutMs = options.runTimeoutMs ?? this.runTimeoutMs;
    const timer =
      runTimeoutMs > 0 ? setTimeout(() => cancel("timeout"), runTimeoutMs) : undefined;
    const onAbort = (): void => cancel("aborted");
    if (options.signal?.aborted) {
      cancel("aborted");
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    logger.info("Pipeline run started", {
      modules: descriptors.length,
      waves: plan.waves.length,
      plan: plan.fingerprint,
    });

    const records: ModuleExecutionRecord[] = [];
    const contents = new Map<string, string>();
    let haltedBy: string | undefined;

    try {
      for (const [waveIndex, wave] of plan.waves.entries()) {
        if (run.cancelled || haltedBy !== undefined) {
          for (const id of wave) {
            records.push(this.notDispatched(id, waveIndex, run, haltedBy));
          }
          continue;
        }

        logger.debug("Dispatching wave", { wave: waveIndex, modules: wave });
        const outcomes = await this.executeWave(wave, waveIndex, run);

        // Wave barrier: commit writes in dispatch order.
        for (const outcome of outcomes) {
          const { record } = outcome;
          records.push(record);
          if (record.status !== ModuleStatus.Success) continue;
          if (outcome.writes) {
            state.commit(this.registry.descriptor(record.moduleId), outcome.writes);
          }
          contents.set(record.moduleId, outcome.content ?? "");
        }

        const failedRequired = outcomes.find(
          ({ record }) =>
            record.required &&
            (record.status === ModuleStatus.Failure || record.status === ModuleStatus.Timeout)
        );
        if (failedRequired && !run.cancelled) {
          haltedBy = failedRequired.record.moduleId;
          logger.warn("Required module failed; halting after this wave", {
            moduleId: haltedBy,
            wave: waveIndex,
          });
        }
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }

    const status = run.cancelled
      ? RunStatus.Cancelled
      : haltedBy !== undefined
        ? RunStatus.PartialFailure
        : RunStatus.Complete;

    const { artifact, metadata } = this.assembler.assemble({
      runId,
      status,
      startedAt,
      totalDurationMs: roundMs(performance.now() - started),
      waveCount: plan.waves.length,
      records,
      contents,
      registrationIndex: (id) => this.registry.registrationIndex(id),
    });

    logger.info("Pipeline run finished", {
      status,
      durationMs: metadata.totalDurationMs,
      sections: metadata.sections.length,
      artifactLength: metadata.artifactLength,
    });

    return { status, artifact, metadata, sharedState: state.snapshot() };
  }

  // ============================================================
  // Preparation
  // ============================================================

  private allIds(): string[] {
    return this.registry.descriptors().map((d) => d.id);
  }

  private prepare(
    moduleIds: readonly string[],
    initialContext: Readonly<Record<string, unknown>>
  ): Preparation {
    try {
      const descriptors = this.registry.closure(moduleIds);
      const plan = this.resolver.resolve(descriptors);

      for (const key of Object.keys(initialContext)) {
        const producer = descriptors.find((d) => d.producedKeys.includes(key));
        if (producer) {
          throw new DuplicateKeyProducerError(key, ["(initial context)", producer.id]);
        }
      }

      return { ok: true, descriptors, plan, state: new SharedStateStore(initialContext) };
    } catch (err) {
      if (err instanceof PipelineError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  // ============================================================
  // Execution
  // ============================================================

  private async executeWave(
    wave: readonly string[],
    waveIndex: number,
    run: ActiveRun
  ): Promise<ModuleOutcome[]> {
    const waveStarted = performance.now();
    const finished = new Map<string, ModuleOutcome>();

    const all = Promise.all(
      wave.map((id) =>
        this.pool
          .run(() => this.executeModule(id, waveIndex, run))
          .then((outcome) => {
            if (!run.cancelled) finished.set(id, outcome);
          })
      )
    );

    const aborted = whenAborted(run.controller.signal);
    try {
      await Promise.race([all, aborted.promise]);
    } finally {
      aborted.dispose();
    }

    // Cancelled modules have already given up their slots; any work
    // they left behind settles unobserved.
    return wave.map(
      (id) =>
        finished.get(id) ?? {
          record: this.record(id, waveIndex, ModuleStatus.Cancelled, {
            durationMs: roundMs(performance.now() - waveStarted),
            errorKind: "cancelled_run",
            errorMessage: run.cancelled?.message,
          }),
        }
    );
  }

  private async executeModule(
    id: string,
    waveIndex: number,
    run: ActiveRun
  ): Promise<ModuleOutcome> {
    const descriptor = this.registry.descriptor(id);
    const started = performance.now();
    const elapsed = (): number => roundMs(performance.now() - started);
    const logger = run.logger.child({ moduleId: id });

    if (run.cancelled) {
      return {
        record: this.record(id, waveIndex, ModuleStatus.Cancelled, {
          errorKind: "cancelled_run",
          errorMessage: run.cancelled.message,
        }),
      };
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(run.controller.signal.reason);
    run.controller.signal.addEventListener("abort", forwardAbort, { once: true });

    const context: ModuleContext = {
      runId: run.runId,
      moduleId: id,
      state: run.state.viewFor(descriptor),
      cache: this.cache,
      signal: controller.signal,
      logger,
    };

    try {
      const module = this.registry.instance(id);

      if (module.isApplicable && !module.isApplicable(context)) {
        logger.debug("Module not applicable; skipped");
        return {
          record: this.record(id, waveIndex, ModuleStatus.Skipped, {
            durationMs: elapsed(),
            errorMessage: "not applicable to this run",
          }),
        };
      }

      const timeoutMs = descriptor.timeoutMs ?? run.moduleTimeoutMs;
      const output = await this.withTimeout(
        () => module.execute(context),
        timeoutMs,
        () => controller.abort(new ModuleTimeoutError(id, timeoutMs)),
        run.controller.signal
      );

      if (output === RUN_CANCELLED) {
        logger.debug("Module abandoned by run cancellation");
        return {
          record: this.record(id, waveIndex, ModuleStatus.Cancelled, {
            durationMs: elapsed(),
            errorKind: "cancelled_run",
            errorMessage: run.cancelled?.message,
          }),
        };
      }

      if (output === TIMED_OUT) {
        const error = new ModuleTimeoutError(id, timeoutMs);
        logger.warn("Module timed out", { timeoutMs, required: descriptor.required });
        return {
          record: this.record(id, waveIndex, ModuleStatus.Timeout, {
            durationMs: elapsed(),
            errorKind: "timeout",
            errorMessage: error.message,
          }),
        };
      }

      return this.interpret(descriptor, waveIndex, output, elapsed(), logger);
    } catch (err) {
      const error =
        err instanceof PipelineError
          ? err
          : new ModuleExecutionError(id, errorMessage(err), { cause: err });
      logger.warn("Module threw", { kind: errorKindOf(error), error: error.message });
      return {
        record: this.record(id, waveIndex, ModuleStatus.Failure, {
          durationMs: elapsed(),
          errorKind: errorKindOf(error),
          errorMessage: error.message,
        }),
      };
    } finally {
      run.controller.signal.removeEventListener("abort", forwardAbort);
    }
  }

  private interpret(
    descriptor: ModuleDescriptor,
    waveIndex: number,
    output: ModuleOutput,
    durationMs: number,
    logger: Logger
  ): ModuleOutcome {
    if (output.status === ModuleStatus.Failure) {
      const error = new ModuleExecutionError(
        descriptor.id,
        output.error ?? "module reported failure"
      );
      logger.warn("Module reported failure", { error: error.message });
      return {
        record: this.record(descriptor.id, waveIndex, ModuleStatus.Failure, {
          durationMs,
          errorKind: "module_execution",
          errorMessage: error.message,
        }),
      };
    }

    const writes = output.writes ?? {};
    const offending = SharedStateStore.undeclaredWrite(descriptor, writes);
    if (offending !== undefined) {
      const error = new UndeclaredKeyError(descriptor.id, offending, "write");
      logger.warn("Module wrote an undeclared key", { key: offending });
      return {
        record: this.record(descriptor.id, waveIndex, ModuleStatus.Failure, {
          durationMs,
          errorKind: "undeclared_key",
          errorMessage: error.message,
        }),
      };
    }

    logger.debug("Module succeeded", { durationMs, contentLength: output.content.length });
    return {
      record: this.record(descriptor.id, waveIndex, ModuleStatus.Success, {
        durationMs,
        contentLength: output.content.length,
        metadata: output.metadata,
      }),
      content: output.content,
      writes,
    };
  }

  /**
   * Settle with the task's result, TIMED_OUT once `timeoutMs` passes, or
   * RUN_CANCELLED once `runSignal` aborts, whichever comes first. The
   * worker slot is freed as soon as this settles.
   */
  private async withTimeout<T>(
    task: () => T | Promise<T>,
    timeoutMs: number,
    onTimeout: () => void,
    runSignal: AbortSignal
  ): Promise<T | typeof TIMED_OUT | typeof RUN_CANCELLED> {
    const aborted = whenAborted(runSignal);
    const contenders: Array<Promise<T | typeof TIMED_OUT | typeof RUN_CANCELLED>> = [
      Promise.resolve().then(task),
      aborted.promise.then((): typeof RUN_CANCELLED => RUN_CANCELLED),
    ];

    let timer: ReturnType<typeof setTimeout> | undefined;
    if (timeoutMs > 0) {
      contenders.push(
        new Promise<typeof TIMED_OUT>((resolve) => {
          timer = setTimeout(() => {
            onTimeout();
            resolve(TIMED_OUT);
          }, timeoutMs);
        })
      );
    }

    try {
      return await Promise.race(contenders);
    } finally {
      clearTimeout(timer);
      aborted.dispose();
    }
  }

  private notDispatched(
    id: string,
    waveIndex: number,
    run: ActiveRun,
    haltedBy: string | undefined
  ): ModuleExecutionRecord {
    if (run.cancelled) {
      return this.record(id, waveIndex, ModuleStatus.Cancelled, {
        errorKind: "cancelled_run",
        errorMessage: run.cancelled.message,
      });
    }
    return this.record(id, waveIndex, ModuleStatus.Skipped, {
      errorMessage: `halted after required module "${haltedBy}" failed`,
    });
  }

  private record(
    id: string,
    waveIndex: number,
    status: ModuleStatus,
    details: Partial<
      Pick<ModuleExecutionRecord, "durationMs" | "contentLength" | "errorKind" | "errorMessage" | "metadata">
    > = {}
  ): ModuleExecutionRecord {
    const descriptor = this.registry.descriptor(id);
    return {
      moduleId: id,
      status,
      wave: waveIndex,
      priority: descriptor.priority,
      required: descriptor.required,
      durationMs: details.durationMs ?? 0,
      contentLength: details.contentLength ?? 0,
      ...(details.errorKind !== undefined && { errorKind: details.errorKind }),
      ...(details.errorMessage !== undefined && { errorMessage: details.errorMessage }),
      ...(details.metadata !== undefined && { metadata: details.metadata }),
    };
  }
}
