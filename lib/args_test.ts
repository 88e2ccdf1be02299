import { test } from "node:test";
import assert from "node:assert/strict";
import {
  boolFlag,
  parseFlags,
  positionals,
  stringFlag,
  unknownFlags,
} from "./args.ts";

const opts = { string: ["a"], boolean: ["l", "f", "json"] } as const;

// =============================================================================
// parseFlags
// =============================================================================

test("parseFlags: reads short flags and positionals", () => {
  const args = parseFlags(["-l", "-a", "myapp", "rel", "v3"], opts);
  assert.equal(boolFlag(args, "l"), true);
  assert.equal(boolFlag(args, "f"), false);
  assert.equal(stringFlag(args, "a"), "myapp");
  assert.deepEqual(positionals(args), ["rel", "v3"]);
});

test("parseFlags: keeps numeric positionals as strings", () => {
  const args = parseFlags(["007"], opts);
  assert.deepEqual(positionals(args), ["007"]);
});

test("stringFlag: treats a missing value as absent", () => {
  const args = parseFlags(["-l"], opts);
  assert.equal(stringFlag(args, "a"), undefined);
});

// =============================================================================
// unknownFlags
// =============================================================================

test("unknownFlags: accepts declared flags", () => {
  const args = parseFlags(["-l", "-f", "--json"], opts);
  assert.deepEqual(unknownFlags(args, opts), []);
});

test("unknownFlags: reports undeclared short and long flags", () => {
  const args = parseFlags(["-x", "--org", "acme"], opts);
  assert.deepEqual(unknownFlags(args, opts), ["-x", "--org"]);
});
