/**
 * Tests for the plan-pipeline CLI helpers.
 *
 * Run: node --import tsx src/cli/plan-pipeline.test.ts
 */

import { strict as assert } from "node:assert";

import { loadPipelineConfig, loadPipelineConfigFile } from "../config/index.js";
import { CyclicDependencyError, KeyOrderingError } from "../pipeline/errors.js";
import { buildPlanReport, formatWavePlan } from "./plan-pipeline.js";

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

const defaults = { workerPoolSize: 2, runTimeoutMs: 5_000, moduleTimeoutMs: 1_000 };

// ═══════════════════════════════════════════════════════════════════════════
// SAMPLE CONFIG
// ═══════════════════════════════════════════════════════════════════════════

section("buildPlanReport (config/pipeline.json)");

const sample = buildPlanReport(loadPipelineConfigFile("config/pipeline.json"), defaults);

test("waves follow dependencies, highest priority first", () => {
  assert.deepEqual(sample.waves, [
    ["rules.VER", "rules.INT", "rules.STR", "context"],
    ["rules.SAM", "rules.CON", "semantic"],
    ["template", "rules.ESS", "rules.ARAI"],
  ]);
});

test("settings come from the file", () => {
  assert.deepEqual(sample.settings, {
    workerPoolSize: 4,
    runTimeoutMs: 30_000,
    moduleTimeoutMs: 10_000,
  });
});

test("modules are listed in assembly order with their wave", () => {
  assert.deepEqual(
    sample.modules.map((m) => `${m.id}@${m.wave}`),
    [
      "context@0",
      "semantic@1",
      "rules.ARAI@2",
      "rules.CON@1",
      "rules.ESS@2",
      "rules.STR@0",
      "rules.INT@0",
      "rules.SAM@1",
      "rules.VER@0",
      "template@2",
    ]
  );
  assert.equal(sample.modules[0].name, "Context analysis");
  assert.equal(sample.modules[2].name, "rules.ARAI");
});

test("the fingerprint is stable across loads", () => {
  const again = buildPlanReport(loadPipelineConfigFile("config/pipeline.json"), defaults);
  assert.equal(again.fingerprint, sample.fingerprint);
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

section("formatWavePlan");

test("renders waves and modules", () => {
  const report = buildPlanReport(
    loadPipelineConfig({
      modules: [
        { id: "context", priority: 10, producedKeys: ["context.domain"], required: true },
        {
          id: "semantic",
          priority: 20,
          dependencies: ["context"],
          consumedKeys: ["context.domain"],
        },
        { id: "template", priority: 90 },
      ],
    }),
    defaults
  );

  assert.equal(
    formatWavePlan(report),
    [
      `Wave plan ${report.fingerprint} (3 modules, 2 waves)`,
      "  workers: 2, run timeout: 5000ms, module timeout: 1000ms",
      "",
      "  wave 0: template, context",
      "  wave 1: semantic",
      "",
      "Modules (assembly order):",
      "    10  context [required]",
      "    20  semantic <- context",
      "    90  template",
    ].join("\n")
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// INVALID DESCRIPTOR SETS
// ═══════════════════════════════════════════════════════════════════════════

section("Invalid descriptor sets");

test("a dependency cycle is reported", () => {
  const cyclic = loadPipelineConfig({
    modules: [
      { id: "a", dependencies: ["b"] },
      { id: "b", dependencies: ["a"] },
    ],
  });
  assert.throws(() => buildPlanReport(cyclic, defaults), CyclicDependencyError);
});

test("a consumer must depend on the key's producer", () => {
  const unordered = loadPipelineConfig({
    modules: [
      { id: "context", producedKeys: ["context.domain"] },
      { id: "semantic", consumedKeys: ["context.domain"] },
    ],
  });
  assert.throws(() => buildPlanReport(unordered, defaults), KeyOrderingError);
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
