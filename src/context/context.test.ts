/**
 * Context tests.
 *
 * Run: node --import tsx src/context/context.test.ts
 *
 * Tests cover:
 *   1. Context — ordering, duplicate keys, overlays, lookup, validation
 *   2. File loading — JSON and YAML, order preservation, format fallback
 *   3. resolveContext — default file discovery and overlay precedence
 *   4. Module surface
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger } from "../logging/index.js";
import * as contextModule from "./index.js";
import {
  Context,
  ContextLoadError,
  defaultContextFile,
  formatContextJson,
  formatsFor,
  loadContextFile,
  parseContextSource,
  resolveContext,
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

const TEST_DIR = join(tmpdir(), `context-test-${Date.now()}`);
mkdirSync(TEST_DIR, { recursive: true });

function writeFixture(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content);
  return filePath;
}

function freshDir(name: string): string {
  const dir = join(TEST_DIR, name);
  mkdirSync(dir, { recursive: true });
  return dir;
}

const quiet = createLogger({ level: "error" });

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

section("Context — ordering and duplicates");

test("keys keep insertion order", () => {
  const ctx = new Context([
    ["zeta", 1],
    ["alpha", 2],
    ["mid", 3],
  ]);
  assert.deepEqual(ctx.keys(), ["zeta", "alpha", "mid"]);
  assert.equal(ctx.size, 3);
});

test("integer-like keys are not hoisted", () => {
  const ctx = new Context([
    ["name", "x"],
    ["2", "two"],
    ["1", "one"],
  ]);
  assert.deepEqual(ctx.keys(), ["name", "2", "1"]);
});

test("a repeated key keeps its first position and last value", () => {
  const ctx = new Context([
    ["a", 1],
    ["b", 2],
    ["a", 3],
  ]);
  assert.deepEqual(ctx.keys(), ["a", "b"]);
  assert.equal(ctx.get("a"), 3);
});

test("context is frozen", () => {
  const ctx = Context.from({ a: 1 });
  assert.equal(Object.isFrozen(ctx), true);
  assert.equal(Object.isFrozen(ctx.entries()), true);
});

section("Context — overlays");

test("overlay replaces in place and appends new keys", () => {
  const base = Context.from({ project_name: "app", version: "0.1.0" });
  const overlay = Context.from({ version: "1.0.0", author: "someone" });
  const merged = base.withOverlay(overlay);

  assert.deepEqual(merged.keys(), ["project_name", "version", "author"]);
  assert.equal(merged.get("version"), "1.0.0");
  assert.equal(merged.get("author"), "someone");
});

test("overlay does not modify the base context", () => {
  const base = Context.from({ version: "0.1.0" });
  base.withOverlay(Context.from({ version: "2.0.0" }));
  assert.equal(base.get("version"), "0.1.0");
});

test("nested mappings are replaced, not merged", () => {
  const base = Context.from({ author: { name: "A", email: "a@example.com" } });
  const merged = base.withOverlay(Context.from({ author: { name: "B" } }));

  assert.equal(merged.lookup(["author", "name"]), "B");
  assert.equal(merged.lookup(["author", "email"]), undefined);
});

section("Context — lookup");

test("dotted lookup through mappings and sequences", () => {
  const ctx = Context.from({
    author: { name: "A" },
    tags: ["cli", "node"],
  });
  assert.equal(ctx.lookup(["author", "name"]), "A");
  assert.equal(ctx.lookup(["tags", "1"]), "node");
});

test("lookup of a missing path returns undefined", () => {
  const ctx = Context.from({ author: { name: "A" }, count: 3 });
  assert.equal(ctx.lookup(["author", "missing"]), undefined);
  assert.equal(ctx.lookup(["count", "x"]), undefined);
  assert.equal(ctx.lookup(["nothing"]), undefined);
});

test("null is a value, not a missing key", () => {
  const ctx = Context.from({ license: null });
  assert.equal(ctx.has("license"), true);
  assert.equal(ctx.lookup(["license"]), null);
});

section("Context — validation");

test("Context.from returns an existing Context unchanged", () => {
  const ctx = Context.from({ a: 1 });
  assert.equal(Context.from(ctx), ctx);
});

test("functions are rejected", () => {
  assert.throws(
    () => Context.from({ bad: () => 1 }, "(overlay)"),
    (err: unknown) => err instanceof ContextLoadError && err.source === "(overlay)"
  );
});

test("a top-level array is rejected", () => {
  assert.throws(() => Context.from(["a", "b"]), ContextLoadError);
});

test("validation issues name the offending path", () => {
  try {
    Context.from({ name: "ok", when: new Date(0) });
    assert.fail("expected ContextLoadError");
  } catch (err) {
    assert.ok(err instanceof ContextLoadError);
    assert.equal(err.reasons.length, 1);
    assert.ok(err.reasons[0].startsWith("when: "));
  }
});

section("Context — JSON output");

test("formatContextJson keeps declared order", () => {
  const ctx = new Context([
    ["b", 1],
    ["2", "two"],
    ["a", true],
  ]);
  assert.equal(formatContextJson(ctx), '{\n  "b": 1,\n  "2": "two",\n  "a": true\n}');
});

test("formatContextJson nests mappings and sequences", () => {
  const ctx = Context.from({ tags: ["x"], meta: {}, empty: [] });
  assert.equal(
    formatContextJson(ctx),
    '{\n  "tags": [\n    "x"\n  ],\n  "meta": {},\n  "empty": []\n}'
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FILE LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("Loading — format order");

test("yaml extensions try yaml first", () => {
  assert.deepEqual(formatsFor("ctx.yml"), ["yaml", "json"]);
  assert.deepEqual(formatsFor("ctx.YAML"), ["yaml", "json"]);
});

test("other extensions try json first", () => {
  assert.deepEqual(formatsFor("ctx.json"), ["json", "yaml"]);
  assert.deepEqual(formatsFor("ctx"), ["json", "yaml"]);
});

section("Loading — order preservation");

test("JSON keys keep file order, integer-like keys included", () => {
  const file = writeFixture("order.json", '{"zeta": 1, "10": "ten", "alpha": true}');
  const ctx = loadContextFile(file);
  assert.deepEqual(ctx.keys(), ["zeta", "10", "alpha"]);
  assert.equal(ctx.get("zeta"), 1);
  assert.equal(ctx.get("10"), "ten");
  assert.equal(ctx.get("alpha"), true);
});

test("YAML yields the same keys and values as the equivalent JSON", () => {
  const jsonCtx = loadContextFile(
    writeFixture("same.json", '{"zeta": 1, "10": "ten", "alpha": true}')
  );
  const yamlCtx = loadContextFile(writeFixture("same.yml", "zeta: 1\n10: ten\nalpha: true\n"));

  assert.deepEqual(yamlCtx.keys(), jsonCtx.keys());
  for (const key of jsonCtx.keys()) {
    assert.equal(yamlCtx.get(key), jsonCtx.get(key));
  }
});

test("nested mappings become nested contexts", () => {
  const ctx = loadContextFile(
    writeFixture("nested.yml", "author:\n  name: A\n  email: a@example.com\ntags:\n  - cli\n")
  );
  const author = ctx.get("author");
  assert.ok(author instanceof Context);
  assert.deepEqual(author.keys(), ["name", "email"]);
  assert.equal(ctx.lookup(["tags", "0"]), "cli");
});

test("JSON repeated keys behave like JSON.parse", () => {
  const ctx = loadContextFile(writeFixture("dupes.json", '{"a": 1, "b": 2, "a": 3}'));
  assert.deepEqual(ctx.keys(), ["a", "b"]);
  assert.equal(ctx.get("a"), 3);
});

test("YAML aliases are resolved", () => {
  const ctx = loadContextFile(writeFixture("alias.yml", "base: &b\n  x: 1\ncopy: *b\n"));
  assert.equal(ctx.lookup(["copy", "x"]), 1);
});

test("an empty YAML value is null", () => {
  const ctx = loadContextFile(writeFixture("empty-value.yml", "license:\nname: demo\n"));
  assert.equal(ctx.get("license"), null);
  assert.equal(ctx.get("name"), "demo");
});

section("Loading — failures and fallback");

test("a .json file holding YAML falls back to the YAML parser", () => {
  const ctx = loadContextFile(writeFixture("really-yaml.json", "name: demo\n"));
  assert.equal(ctx.get("name"), "demo");
});

test("a missing file fails with ContextLoadError naming the path", () => {
  const missing = join(TEST_DIR, "missing.json");
  assert.throws(
    () => loadContextFile(missing),
    (err: unknown) => err instanceof ContextLoadError && err.source === missing
  );
});

test("content that neither format accepts lists both reasons", () => {
  const file = writeFixture("broken.json", "{ not: json: [");
  try {
    loadContextFile(file);
    assert.fail("expected ContextLoadError");
  } catch (err) {
    assert.ok(err instanceof ContextLoadError);
    assert.equal(err.reasons.length, 2);
    assert.ok(err.reasons[0].startsWith("json: "));
    assert.ok(err.reasons[1].startsWith("yaml: "));
  }
});

test("a top-level sequence is not a context", () => {
  try {
    parseContextSource("- a\n- b\n", "list.yml");
    assert.fail("expected ContextLoadError");
  } catch (err) {
    assert.ok(err instanceof ContextLoadError);
    assert.equal(err.reasons[0], "yaml: top level is not a mapping");
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// RESOLVE CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

section("resolveContext — default file");

test("treeplate.json is used when present", () => {
  const dir = freshDir("both");
  writeFileSync(join(dir, "treeplate.json"), '{"source": "json"}');
  writeFileSync(join(dir, "treeplate.yml"), "source: yaml\n");
  assert.equal(defaultContextFile(dir), join(dir, "treeplate.json"));
  assert.equal(resolveContext(undefined, undefined, { baseDir: dir, logger: quiet }).get("source"), "json");
});

test("treeplate.yml is used when treeplate.json is absent", () => {
  const dir = freshDir("yaml-only");
  writeFileSync(join(dir, "treeplate.yml"), "source: yaml\n");
  assert.equal(resolveContext(undefined, undefined, { baseDir: dir, logger: quiet }).get("source"), "yaml");
});

test("no context file at all fails", () => {
  const dir = freshDir("none");
  assert.throws(
    () => resolveContext(undefined, undefined, { baseDir: dir, logger: quiet }),
    ContextLoadError
  );
});

section("resolveContext — overlay precedence");

test("overlay value wins for a shared key", () => {
  const file = writeFixture("overlay.json", '{"project_name": "app", "version": "0.1.0"}');
  const ctx = resolveContext(file, { project_name: "override" }, { logger: quiet });
  assert.equal(ctx.get("project_name"), "override");
  assert.deepEqual(ctx.keys(), ["project_name", "version"]);
});

test("overlay may be a Context", () => {
  const file = writeFixture("overlay-ctx.json", '{"a": 1}');
  const ctx = resolveContext(file, new Context([["b", 2]]), { logger: quiet });
  assert.deepEqual(ctx.keys(), ["a", "b"]);
});

test("an invalid overlay fails with ContextLoadError", () => {
  const file = writeFixture("overlay-bad.json", '{"a": 1}');
  assert.throws(
    () => resolveContext(file, { a: Symbol("x") }, { logger: quiet }),
    (err: unknown) => err instanceof ContextLoadError && err.source === "(overlay)"
  );
});

section("Module surface");

test("validation schemas stay internal to the context module", () => {
  assert.deepEqual(Object.keys(contextModule).sort(), [
    "Context",
    "ContextLoadError",
    "defaultContextFile",
    "formatContextJson",
    "formatsFor",
    "isSequence",
    "loadContextFile",
    "parseContextSource",
    "resolveContext",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
