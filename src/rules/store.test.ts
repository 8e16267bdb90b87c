/**
 * Tests for the rule config store.
 *
 * Run: node --import tsx src/rules/store.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { CacheLayer } from "../pipeline/cache.js";
import { RuleConfigStore, RuleLoadError } from "./store.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
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

async function expectLoadError(fn: () => Promise<unknown>): Promise<RuleLoadError> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof RuleLoadError) return err;
    throw err;
  }
  throw new Error("expected RuleLoadError");
}

const rulesDir = mkdtempSync(join(tmpdir(), "rule-store-"));

function writeRules(category: string, content: unknown): void {
  const body = typeof content === "string" ? content : JSON.stringify(content);
  writeFileSync(join(rulesDir, `${category}.json`), body);
}

function newStore(): { store: RuleConfigStore; cache: CacheLayer } {
  const cache = new CacheLayer({ defaultTtlMs: 60_000 });
  return { store: new RuleConfigStore({ rulesDir, cache }), cache };
}

writeRules("ESS", {
  category: "ESS",
  rules: [
    { id: "ESS-01", name: "Essence, not purpose", priority: "high" },
    { id: "ESS-02", name: "State the ontological category" },
  ],
});

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("rulesFor");

await test("loads a category with schema defaults applied", async () => {
  const { store } = newStore();
  const rules = await store.rulesFor("ESS");
  assert.equal(rules.length, 2);
  assert.deepEqual(rules[1], {
    id: "ESS-02",
    name: "State the ontological category",
    priority: "medium",
    goodExamples: [],
    badExamples: [],
  });
  assert.ok(Object.isFrozen(rules));
  assert.ok(Object.isFrozen(rules[0]));
});

await test("concurrent callers share one load", async () => {
  const { store, cache } = newStore();
  const results = await Promise.all([
    store.rulesFor("ESS"),
    store.rulesFor("ESS"),
    store.rulesFor("ESS"),
    store.rulesFor("ESS"),
  ]);

  const stats = cache.stats();
  assert.equal(stats.computations, 1);
  assert.equal(stats.coalesced, 3);
  for (const rules of results) {
    assert.equal(rules, results[0]);
  }
});

await test("a loaded category is served from the cache", async () => {
  const { store, cache } = newStore();
  const first = await store.rulesFor("ESS");
  const second = await store.rulesFor("ESS");
  assert.equal(second, first);
  assert.equal(cache.stats().hits, 1);
  assert.equal(cache.peek(RuleConfigStore.cacheKey("ESS")), first);
});

await test("the bundled rule files load", async () => {
  const store = new RuleConfigStore({
    rulesDir: "config/rules",
    cache: new CacheLayer({ defaultTtlMs: 60_000 }),
  });
  const rules = await store.rulesFor("ESS");
  assert.equal(rules.length, 5);
  assert.equal(rules[0].id, "ESS-01");
  assert.equal(rules[0].name, "Essence, not purpose");
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Load errors");

await test("rejects a malformed category code without reading", async () => {
  const { store, cache } = newStore();
  const err = await expectLoadError(() => store.rulesFor("ess"));
  assert.equal(err.category, "ess");
  assert.equal(err.message, "invalid category code");
  assert.equal(cache.stats().computations, 0);
});

await test("a missing file is a load error", async () => {
  const { store } = newStore();
  const err = await expectLoadError(() => store.rulesFor("XYZ"));
  assert.equal(err.message, `rule file not found: ${join(rulesDir, "XYZ.json")}`);
});

await test("malformed JSON is a load error", async () => {
  writeRules("INT", "{ not json");
  const { store } = newStore();
  const err = await expectLoadError(() => store.rulesFor("INT"));
  assert.ok(err.message.startsWith("rule file is not valid JSON: "));
});

await test("schema violations are listed as issues", async () => {
  writeRules("STR", { category: "STR", rules: [{ id: "STR-01" }] });
  const { store } = newStore();
  const err = await expectLoadError(() => store.rulesFor("STR"));
  assert.equal(err.message, "1 validation error(s)");
  assert.deepEqual(err.issues, ["rules.0.name: Required"]);
  assert.equal(
    err.format(),
    "Rule category STR could not be loaded: 1 validation error(s)\n  - rules.0.name: Required"
  );
});

await test("duplicate rule ids are rejected", async () => {
  writeRules("SAM", {
    category: "SAM",
    rules: [
      { id: "SAM-01", name: "One" },
      { id: "SAM-01", name: "Two" },
    ],
  });
  const { store } = newStore();
  const err = await expectLoadError(() => store.rulesFor("SAM"));
  assert.deepEqual(err.issues, ["rules: rule ids must be unique within a category"]);
});

await test("a file declaring another category is rejected", async () => {
  writeRules("CON", { category: "ESS", rules: [] });
  const { store } = newStore();
  const err = await expectLoadError(() => store.rulesFor("CON"));
  assert.equal(err.message, "file declares category ESS");
});

await test("a failed load is not cached", async () => {
  const { store, cache } = newStore();
  await expectLoadError(() => store.rulesFor("VER"));
  assert.equal(cache.state(RuleConfigStore.cacheKey("VER")), "absent");

  writeRules("VER", { category: "VER", rules: [{ id: "VER-01", name: "Singular form" }] });
  const rules = await store.rulesFor("VER");
  assert.deepEqual(rules.map((r) => r.id), ["VER-01"]);
  assert.equal(cache.stats().computations, 2);
});

rmSync(rulesDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
