/**
 * Tests for pipeline configuration loading.
 *
 * Run: node --import tsx src/config/pipeline/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  loadPipelineConfig,
  loadPipelineConfigFile,
  validatePipelineConfig,
  resolvePipelineSettings,
  deepFreeze,
  PipelineConfigError,
} from "./index.js";

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

function expectConfigError(fn: () => unknown): PipelineConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PipelineConfigError) return err;
    throw err;
  }
  throw new Error("expected PipelineConfigError");
}

const tempDir = mkdtempSync(join(tmpdir(), "pipeline-config-"));

// ═══════════════════════════════════════════════════════════════════════════
// SCHEMA DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

section("Descriptor defaults");

test("fills name, priority, key sets and required", () => {
  const cfg = loadPipelineConfig({ modules: [{ id: "context" }] });
  assert.deepEqual(cfg.modules[0], {
    id: "context",
    name: "context",
    priority: 50,
    dependencies: [],
    producedKeys: [],
    consumedKeys: [],
    required: false,
  });
  assert.equal(cfg.workerPoolSize, undefined);
});

test("keeps explicit values", () => {
  const cfg = loadPipelineConfig({
    workerPoolSize: 2,
    modules: [
      {
        id: "semantic",
        name: "Semantic categorisation",
        priority: 20,
        dependencies: ["context"],
        required: true,
        timeoutMs: 500,
      },
    ],
  });
  const [descriptor] = cfg.modules;
  assert.equal(cfg.workerPoolSize, 2);
  assert.equal(descriptor?.name, "Semantic categorisation");
  assert.equal(descriptor?.priority, 20);
  assert.deepEqual(descriptor?.dependencies, ["context"]);
  assert.equal(descriptor?.required, true);
  assert.equal(descriptor?.timeoutMs, 500);
});

test("loaded config is deeply frozen", () => {
  const cfg = loadPipelineConfig({ modules: [{ id: "a", dependencies: [] }] });
  assert.ok(Object.isFrozen(cfg));
  assert.ok(Object.isFrozen(cfg.modules));
  assert.ok(Object.isFrozen(cfg.modules[0]?.dependencies));
});

test("deepFreeze freezes nested objects", () => {
  const value = deepFreeze({ outer: { inner: [1, 2] } });
  assert.ok(Object.isFrozen(value.outer.inner));
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Validation errors");

test("rejects an id that does not start with a letter", () => {
  const err = expectConfigError(() => loadPipelineConfig({ modules: [{ id: "1st" }] }));
  assert.equal(err.issues.length, 1);
  assert.deepEqual(err.issues[0]?.path, ["modules", 0, "id"]);
  assert.equal(err.message, "Invalid pipeline configuration: 1 validation error(s)");
});

test("rejects duplicate dependencies", () => {
  const err = expectConfigError(() =>
    loadPipelineConfig({ modules: [{ id: "a", dependencies: ["b", "b"] }] })
  );
  assert.deepEqual(err.issues[0]?.path, ["modules", 0, "dependencies"]);
  assert.equal(err.issues[0]?.message, "dependencies must not contain duplicates");
});

test("rejects unknown fields", () => {
  const err = expectConfigError(() => loadPipelineConfig({ modules: [], extra: true }));
  assert.equal(err.issues[0]?.code, "unrecognized_keys");
  assert.deepEqual(err.issues[0]?.path, []);
});

test("rejects a zero worker pool", () => {
  const err = expectConfigError(() => loadPipelineConfig({ workerPoolSize: 0, modules: [] }));
  assert.deepEqual(err.issues[0]?.path, ["workerPoolSize"]);
});

test("format() lists one line per issue", () => {
  const err = new PipelineConfigError("bad", [
    { path: ["modules", 0, "id"], message: "Required", code: "invalid_type" },
    { path: [], message: "broken", code: "custom" },
  ]);
  assert.equal(
    err.format(),
    [
      "Pipeline configuration validation failed:",
      "  - modules.0.id: Required",
      "  - (root): broken",
    ].join("\n")
  );
});

test("validatePipelineConfig reports instead of throwing", () => {
  const bad = validatePipelineConfig({ modules: "none" });
  assert.equal(bad.success, false);
  assert.deepEqual(bad.errors?.[0]?.path, ["modules"]);

  const good = validatePipelineConfig({ modules: [] });
  assert.equal(good.success, true);
  assert.deepEqual(good.config?.modules, []);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Config files");

test("missing file", () => {
  const err = expectConfigError(() => loadPipelineConfigFile(join(tempDir, "absent.json")));
  assert.equal(err.issues[0]?.code, "file_not_found");
});

test("malformed JSON", () => {
  const path = join(tempDir, "broken.json");
  writeFileSync(path, "{ modules: ");
  const err = expectConfigError(() => loadPipelineConfigFile(path));
  assert.equal(err.issues[0]?.code, "invalid_json");
});

test("valid file", () => {
  const path = join(tempDir, "pipeline.json");
  writeFileSync(path, JSON.stringify({ runTimeoutMs: 100, modules: [{ id: "a" }, { id: "b", dependencies: ["a"] }] }));
  const cfg = loadPipelineConfigFile(path);
  assert.equal(cfg.runTimeoutMs, 100);
  assert.deepEqual(cfg.modules.map((m) => m.id), ["a", "b"]);
});

test("the bundled sample config loads", () => {
  const cfg = loadPipelineConfigFile("config/pipeline.json");
  assert.equal(cfg.modules.length, 10);
  assert.equal(cfg.workerPoolSize, 4);
});

// ═══════════════════════════════════════════════════════════════════════════
// SETTINGS
// ═══════════════════════════════════════════════════════════════════════════

section("resolvePipelineSettings");

test("config values win; missing values fall back", () => {
  const settings = resolvePipelineSettings(
    { workerPoolSize: 2 },
    { workerPoolSize: 4, runTimeoutMs: 100, moduleTimeoutMs: 50 }
  );
  assert.deepEqual(settings, { workerPoolSize: 2, runTimeoutMs: 100, moduleTimeoutMs: 50 });
});

test("zero is a value, not a gap", () => {
  const settings = resolvePipelineSettings(
    { runTimeoutMs: 0 },
    { workerPoolSize: 4, runTimeoutMs: 100, moduleTimeoutMs: 50 }
  );
  assert.equal(settings.runTimeoutMs, 0);
});

rmSync(tempDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
