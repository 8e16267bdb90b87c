/**
 * Pipeline error taxonomy.
 *
 * Registration-time errors (cycles, unknown dependencies, duplicate
 * producers) are fatal and reject construction before any run starts.
 * Run-time errors are recorded per module and never escape a run.
 */

export type PipelineErrorKind =
  | "cyclic_dependency"
  | "unknown_dependency"
  | "unknown_module"
  | "duplicate_module"
  | "duplicate_key_producer"
  | "key_ordering"
  | "descriptor_validation"
  | "module_execution"
  | "timeout"
  | "undeclared_key"
  | "missing_key"
  | "duplicate_write"
  | "computation_failed"
  | "cancelled_run";

export class PipelineError extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

// ---------------------------------------------------------------------------
// Registration-time
// ---------------------------------------------------------------------------

export class CyclicDependencyError extends PipelineError {
  /**
   * @param cycle      - Ids that sit on a dependency cycle, sorted
   * @param unresolved - Every id that never reached in-degree zero
   */
  constructor(
    public readonly cycle: readonly string[],
    public readonly unresolved: readonly string[]
  ) {
    super(
      "cyclic_dependency",
      `Cyclic dependency between modules: ${cycle.join(", ")}`
    );
    this.name = "CyclicDependencyError";
  }
}

export class UnknownDependencyError extends PipelineError {
  constructor(
    public readonly moduleId: string,
    public readonly dependencyId: string
  ) {
    super(
      "unknown_dependency",
      `Module "${moduleId}" depends on unregistered module "${dependencyId}"`
    );
    this.name = "UnknownDependencyError";
  }
}

export class UnknownModuleError extends PipelineError {
  constructor(public readonly moduleIds: readonly string[]) {
    super("unknown_module", `Unknown module(s): ${moduleIds.join(", ")}`);
    this.name = "UnknownModuleError";
  }
}

export class DuplicateModuleError extends PipelineError {
  constructor(public readonly moduleId: string) {
    super("duplicate_module", `Module "${moduleId}" is already registered`);
    this.name = "DuplicateModuleError";
  }
}

export class DuplicateKeyProducerError extends PipelineError {
  constructor(
    public readonly key: string,
    public readonly producers: readonly [string, string]
  ) {
    super(
      "duplicate_key_producer",
      `Shared-state key "${key}" is produced by both "${producers[0]}" and "${producers[1]}"`
    );
    this.name = "DuplicateKeyProducerError";
  }
}

export class KeyOrderingError extends PipelineError {
  constructor(
    public readonly key: string,
    public readonly consumerId: string,
    public readonly producerId: string
  ) {
    super(
      "key_ordering",
      `Module "${consumerId}" consumes "${key}" but does not depend on its producer "${producerId}"`
    );
    this.name = "KeyOrderingError";
  }
}

export class DescriptorValidationError extends PipelineError {
  constructor(
    public readonly moduleId: string | undefined,
    public readonly issues: readonly string[]
  ) {
    super(
      "descriptor_validation",
      `Invalid module descriptor${moduleId ? ` "${moduleId}"` : ""}: ${issues.join("; ")}`
    );
    this.name = "DescriptorValidationError";
  }
}

// ---------------------------------------------------------------------------
// Run-time
// ---------------------------------------------------------------------------

export class ModuleExecutionError extends PipelineError {
  constructor(
    public readonly moduleId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("module_execution", `Module "${moduleId}" failed: ${message}`, options);
    this.name = "ModuleExecutionError";
  }
}

export class ModuleTimeoutError extends PipelineError {
  constructor(
    public readonly moduleId: string,
    public readonly timeoutMs: number
  ) {
    super("timeout", `Module "${moduleId}" timed out after ${timeoutMs}ms`);
    this.name = "ModuleTimeoutError";
  }
}

export class UndeclaredKeyError extends PipelineError {
  constructor(
    public readonly moduleId: string,
    public readonly key: string,
    public readonly access: "read" | "write"
  ) {
    super(
      "undeclared_key",
      access === "read"
        ? `Module "${moduleId}" read "${key}" without declaring it in consumedKeys`
        : `Module "${moduleId}" wrote "${key}" without declaring it in producedKeys`
    );
    this.name = "UndeclaredKeyError";
  }
}

export class MissingKeyError extends PipelineError {
  constructor(
    public readonly moduleId: string,
    public readonly key: string
  ) {
    super("missing_key", `Module "${moduleId}" requires "${key}" but it has no value`);
    this.name = "MissingKeyError";
  }
}

export class DuplicateWriteError extends PipelineError {
  constructor(public readonly key: string) {
    super("duplicate_write", `Shared-state key "${key}" was already written in this run`);
    this.name = "DuplicateWriteError";
  }
}

export class ComputationFailedError extends PipelineError {
  constructor(
    public readonly key: string,
    cause: unknown
  ) {
    super(
      "computation_failed",
      `Computation for cache key "${key}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "ComputationFailedError";
  }
}

export class CancelledRunError extends PipelineError {
  constructor(public readonly reason: "timeout" | "aborted") {
    super(
      "cancelled_run",
      reason === "timeout" ? "Run timeout exceeded" : "Run was aborted"
    );
    this.name = "CancelledRunError";
  }
}
