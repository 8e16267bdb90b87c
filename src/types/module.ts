/**
 * Content module definitions.
 * A module contributes one section of the assembled prompt artifact.
 */

import type { Logger } from "../logging/logger.js";
import type { CacheLayer } from "../pipeline/cache.js";
import type { SharedStateReader } from "../pipeline/shared-state.js";

export enum ModuleStatus {
  Success = "success",
  Failure = "failure",
  Timeout = "timeout",
  Cancelled = "cancelled",
  Skipped = "skipped",
}

export type ErrorKind =
  | "module_execution"
  | "timeout"
  | "undeclared_key"
  | "computation_failed"
  | "cancelled_run";

/**
 * Static description of a module, created once from configuration and
 * frozen at registration.
 */
export interface ModuleDescriptor {
  readonly id: string;
  readonly name: string;
  /** Lower values are emitted earlier in the artifact. */
  readonly priority: number;
  readonly dependencies: readonly string[];
  readonly producedKeys: readonly string[];
  readonly consumedKeys: readonly string[];
  /** A failing required module halts the run after its wave. */
  readonly required: boolean;
  /** Per-module timeout override in ms; 0 disables it. */
  readonly timeoutMs?: number;
}

/**
 * Everything a module may touch during one run. Instances are shared
 * between runs, so per-run data only ever arrives through this object.
 */
export interface ModuleContext {
  readonly runId: string;
  readonly moduleId: string;
  readonly state: SharedStateReader;
  readonly cache: CacheLayer;
  /** Aborted when the module times out or the run is cancelled. */
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

export interface ModuleOutput {
  readonly status: ModuleStatus.Success | ModuleStatus.Failure;
  readonly content: string;
  /** Shared-state values to commit at the wave barrier. */
  readonly writes?: Readonly<Record<string, unknown>>;
  readonly error?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface PromptModule {
  execute(context: ModuleContext): ModuleOutput | Promise<ModuleOutput>;
  /** When present and false, the module is skipped for this run. */
  isApplicable?(context: ModuleContext): boolean;
}

export type ModuleFactory = () => PromptModule;

export function moduleSuccess(
  content: string,
  writes?: Readonly<Record<string, unknown>>,
  metadata?: Readonly<Record<string, unknown>>
): ModuleOutput {
  return { status: ModuleStatus.Success, content, writes, metadata };
}

export function moduleFailure(error: string): ModuleOutput {
  return { status: ModuleStatus.Failure, content: "", error };
}
