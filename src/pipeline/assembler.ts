/**
 * Content assembler.
 *
 * Joins the content of successful modules into the final artifact and
 * builds the run metadata returned to the caller.
 *
 * Ordering is independent of execution order: sections are sorted by
 * ascending priority, then wave index, then registration order. Sections
 * with empty or whitespace-only content are left out entirely, so they
 * never contribute a separator.
 */

import { ModuleStatus } from "../types/module.js";
import type {
  ModuleExecutionRecord,
  RunMetadata,
  RunStatus,
} from "../types/pipeline.js";

export interface AssemblerOptions {
  /** Separator between sections (default: one blank line). */
  separator?: string;
  /**
   * Emit a placeholder line for modules that failed or timed out, in the
   * position their content would have taken.
   */
  includeFailurePlaceholders?: boolean;
  placeholder?: (record: ModuleExecutionRecord) => string;
}

export interface AssemblyInput {
  readonly runId: string;
  readonly status: RunStatus;
  readonly startedAt: Date;
  readonly totalDurationMs: number;
  readonly waveCount: number;
  readonly records: readonly ModuleExecutionRecord[];
  /** Content of modules that finished with status success. */
  readonly contents: ReadonlyMap<string, string>;
  readonly registrationIndex: (moduleId: string) => number;
}

export interface AssemblyResult {
  readonly artifact: string;
  readonly metadata: RunMetadata;
}

const PLACEHOLDER_STATUSES = new Set<ModuleStatus>([
  ModuleStatus.Failure,
  ModuleStatus.Timeout,
]);

export function defaultPlaceholder(record: ModuleExecutionRecord): string {
  return `[${record.moduleId} unavailable: ${record.status}]`;
}

export class ContentAssembler {
  private readonly separator: string;
  private readonly includeFailurePlaceholders: boolean;
  private readonly placeholder: (record: ModuleExecutionRecord) => string;

  constructor(options: AssemblerOptions = {}) {
    this.separator = options.separator ?? "\n\n";
    this.includeFailurePlaceholders = options.includeFailurePlaceholders ?? false;
    this.placeholder = options.placeholder ?? defaultPlaceholder;
  }

  assemble(input: AssemblyInput): AssemblyResult {
    const ordered = [...input.records].sort(
      (a, b) =>
        a.priority - b.priority ||
        a.wave - b.wave ||
        input.registrationIndex(a.moduleId) - input.registrationIndex(b.moduleId)
    );

    const sections: string[] = [];
    const parts: string[] = [];

    for (const record of ordered) {
      let text: string | undefined;
      if (record.status === ModuleStatus.Success) {
        text = input.contents.get(record.moduleId);
      } else if (this.includeFailurePlaceholders && PLACEHOLDER_STATUSES.has(record.status)) {
        text = this.placeholder(record);
      }

      if (text === undefined || text.trim() === "") continue;
      sections.push(record.moduleId);
      parts.push(text);
    }

    const artifact = parts.join(this.separator);

    return {
      artifact,
      metadata: {
        runId: input.runId,
        status: input.status,
        startedAt: input.startedAt.toISOString(),
        waveCount: input.waveCount,
        totalDurationMs: input.totalDurationMs,
        artifactLength: artifact.length,
        sections,
        modules: input.records,
      },
    };
  }
}
