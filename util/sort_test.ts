import { test } from "node:test";
import assert from "node:assert/strict";
import { compareStrings, sortByName } from "./sort.ts";

test("compareStrings: orders by code unit, uppercase first", () => {
  assert.equal(compareStrings("Zeta", "alpha"), -1);
  assert.equal(compareStrings("web.2", "web.10"), 1);
  assert.equal(compareStrings("v3", "v3"), 0);
});

test("sortByName: sorts without touching the input", () => {
  const input = [{ name: "web.2" }, { name: "run.1" }, { name: "web.1" }];
  const sorted = sortByName(input);
  assert.deepEqual(sorted.map((d) => d.name), ["run.1", "web.1", "web.2"]);
  assert.deepEqual(input.map((d) => d.name), ["web.2", "run.1", "web.1"]);
});

test("sortByName: keeps input order for equal names", () => {
  const sorted = sortByName([
    { name: "b", tag: 1 },
    { name: "a", tag: 2 },
    { name: "b", tag: 3 },
  ]);
  assert.deepEqual(sorted.map((x) => x.tag), [2, 1, 3]);
});

test("sortByName: string order puts v10 before v2", () => {
  const sorted = sortByName([{ name: "v2" }, { name: "v10" }]);
  assert.deepEqual(sorted.map((r) => r.name), ["v10", "v2"]);
});
