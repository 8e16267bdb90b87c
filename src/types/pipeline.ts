/**
 * Pipeline run definitions.
 * A run executes a wave plan once and yields one artifact.
 */

import type { ErrorKind, ModuleStatus } from "./module.js";

export enum RunStatus {
  Complete = "complete",
  PartialFailure = "partial_failure",
  Cancelled = "cancelled",
  Rejected = "rejected",
}

/** Ordered waves of module ids; every id depends only on earlier waves. */
export interface WavePlan {
  readonly waves: ReadonlyArray<ReadonlyArray<string>>;
  /** SHA-256 prefix of the descriptor set the plan was computed from. */
  readonly fingerprint: string;
}

export interface ModuleExecutionRecord {
  readonly moduleId: string;
  readonly status: ModuleStatus;
  /** Zero-based wave index. */
  readonly wave: number;
  readonly priority: number;
  readonly required: boolean;
  readonly durationMs: number;
  readonly contentLength: number;
  readonly errorKind?: ErrorKind;
  readonly errorMessage?: string;
  /** Whatever the module attached to a successful output. */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface RunMetadata {
  readonly runId: string;
  readonly status: RunStatus;
  readonly startedAt: string;
  readonly waveCount: number;
  readonly totalDurationMs: number;
  readonly artifactLength: number;
  /** Module ids whose content made it into the artifact, in order. */
  readonly sections: readonly string[];
  readonly modules: readonly ModuleExecutionRecord[];
}

export interface RunRejection {
  readonly kind: string;
  readonly message: string;
}

export interface PipelineRunResult {
  readonly status: RunStatus;
  readonly artifact: string;
  readonly metadata: RunMetadata;
  readonly sharedState: Readonly<Record<string, unknown>>;
  readonly error?: RunRejection;
}
