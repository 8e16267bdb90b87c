/**
 * Tests for artifact assembly.
 *
 * Run: node --import tsx src/pipeline/assembler.test.ts
 */

import { strict as assert } from "node:assert";

import { ModuleStatus } from "../types/module.js";
import { RunStatus, type ModuleExecutionRecord } from "../types/pipeline.js";
import { ContentAssembler, type AssemblyInput } from "./assembler.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function record(
  moduleId: string,
  priority: number,
  wave = 0,
  status: ModuleStatus = ModuleStatus.Success
): ModuleExecutionRecord {
  return {
    moduleId,
    status,
    wave,
    priority,
    required: false,
    durationMs: 1,
    contentLength: 0,
  };
}

const ORDER = ["context", "semantic", "ess", "str", "template", "late"];

function input(
  records: ModuleExecutionRecord[],
  contents: Record<string, string>
): AssemblyInput {
  return {
    runId: "20240115-abcdef",
    status: RunStatus.Complete,
    startedAt: new Date("2024-01-15T10:00:00.000Z"),
    totalDurationMs: 12.5,
    waveCount: 3,
    records,
    contents: new Map(Object.entries(contents)),
    registrationIndex: (id) => ORDER.indexOf(id),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Ordering");

test("sections follow ascending priority, not execution order", () => {
  const { artifact, metadata } = new ContentAssembler().assemble(
    input([record("template", 90, 2), record("context", 10, 0), record("ess", 40, 1)], {
      template: "T",
      context: "C",
      ess: "E",
    })
  );
  assert.equal(artifact, "C\n\nE\n\nT");
  assert.deepEqual(metadata.sections, ["context", "ess", "template"]);
});

test("equal priority: wave, then registration order", () => {
  const { metadata } = new ContentAssembler().assemble(
    input([record("str", 40, 1), record("ess", 40, 1), record("semantic", 40, 0)], {
      str: "S",
      ess: "E",
      semantic: "M",
    })
  );
  assert.deepEqual(metadata.sections, ["semantic", "ess", "str"]);
});

test("empty and whitespace-only content adds no separator", () => {
  const { artifact } = new ContentAssembler().assemble(
    input([record("context", 10), record("semantic", 20), record("ess", 30)], {
      context: "C",
      semantic: "  \n ",
      ess: "E",
    })
  );
  assert.equal(artifact, "C\n\nE");
});

test("a custom separator", () => {
  const { artifact } = new ContentAssembler({ separator: "\n---\n" }).assemble(
    input([record("context", 10), record("ess", 30)], { context: "C", ess: "E" })
  );
  assert.equal(artifact, "C\n---\nE");
});

// ═══════════════════════════════════════════════════════════════════════════
// NON-SUCCESS
// ═══════════════════════════════════════════════════════════════════════════

section("Failed modules");

const mixed = [
  record("context", 10),
  record("semantic", 20, 1, ModuleStatus.Failure),
  record("ess", 30, 1, ModuleStatus.Timeout),
  record("str", 35, 1, ModuleStatus.Skipped),
  record("template", 40, 2, ModuleStatus.Cancelled),
];

test("left out by default", () => {
  const { artifact, metadata } = new ContentAssembler().assemble(input(mixed, { context: "C" }));
  assert.equal(artifact, "C");
  assert.deepEqual(metadata.sections, ["context"]);
});

test("placeholders for failure and timeout only", () => {
  const { artifact, metadata } = new ContentAssembler({ includeFailurePlaceholders: true }).assemble(
    input(mixed, { context: "C" })
  );
  assert.equal(
    artifact,
    "C\n\n[semantic unavailable: failure]\n\n[ess unavailable: timeout]"
  );
  assert.deepEqual(metadata.sections, ["context", "semantic", "ess"]);
});

test("custom placeholder", () => {
  const { artifact } = new ContentAssembler({
    includeFailurePlaceholders: true,
    placeholder: (r) => `<!-- ${r.moduleId} -->`,
  }).assemble(input([record("semantic", 20, 0, ModuleStatus.Failure)], {}));
  assert.equal(artifact, "<!-- semantic -->");
});

// ═══════════════════════════════════════════════════════════════════════════
// METADATA
// ═══════════════════════════════════════════════════════════════════════════

section("Metadata");

test("carries the run summary and every record", () => {
  const records = [record("context", 10)];
  const { metadata } = new ContentAssembler().assemble(input(records, { context: "Context" }));
  assert.equal(metadata.runId, "20240115-abcdef");
  assert.equal(metadata.status, RunStatus.Complete);
  assert.equal(metadata.startedAt, "2024-01-15T10:00:00.000Z");
  assert.equal(metadata.waveCount, 3);
  assert.equal(metadata.totalDurationMs, 12.5);
  assert.equal(metadata.artifactLength, 7);
  assert.equal(metadata.modules, records);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
