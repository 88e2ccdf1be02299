import { test } from "node:test";
import assert from "node:assert/strict";
import { addonMatch, mergeAddons, normalizeFilters } from "./addons.ts";
import type { MergedAddon } from "./heroku-transforms.ts";

const redis: MergedAddon = {
  id: "a1",
  type: "redistogo:nano",
  owner: "me@example.com",
  name: "soaring-ably-1234",
  configVar: "REDIS_URL",
};

const postgres: MergedAddon = {
  id: "a2",
  type: "heroku-postgresql:dev",
  owner: "me@example.com",
  name: "",
  configVar: "DATABASE_URL",
};

// =============================================================================
// mergeAddons
// =============================================================================

test("mergeAddons: one record per attachment", () => {
  const merged = mergeAddons(
    [
      {
        id: "a1",
        name: "olive-pg-77",
        plan: { name: "heroku-postgresql:dev" },
        owner: { email: "me@example.com" },
      },
    ],
    [
      { id: "t1", name: "HEROKU_POSTGRESQL_RED_URL", addon: { id: "a1", name: "olive-pg-77" } },
      { id: "t2", name: "DATABASE_URL", addon: { id: "a1", name: "olive-pg-77" } },
    ],
  );
  const base = {
    id: "a1",
    type: "heroku-postgresql:dev",
    owner: "me@example.com",
    name: "olive-pg-77",
  };
  assert.deepEqual(merged, [
    { ...base, configVar: "DATABASE_URL" },
    { ...base, configVar: "HEROKU_POSTGRESQL_RED_URL" },
  ]);
});

test("mergeAddons: leaves unattached add-ons without a config var", () => {
  const merged = mergeAddons(
    [{ id: "a9", name: "lonely-1", plan: { name: "papertrail:choklad" } }],
    [],
  );
  assert.equal(merged[0].configVar, "");
  assert.equal(merged[0].owner, "");
});

test("mergeAddons: orders by type, then name", () => {
  const merged = mergeAddons(
    [
      { id: "1", name: "b", plan: { name: "redis:mini" } },
      { id: "2", name: "z", plan: { name: "postgres:dev" } },
      { id: "3", name: "a", plan: { name: "redis:mini" } },
    ],
    [],
  );
  assert.deepEqual(merged.map((m) => m.id), ["2", "3", "1"]);
});

// =============================================================================
// addonMatch / normalizeFilters
// =============================================================================

test("addonMatch: compares config var case-insensitively", () => {
  assert.equal(addonMatch(redis, ["redis_url"]), true);
});

test("addonMatch: matches type and resource name", () => {
  assert.equal(addonMatch(redis, ["redistogo:nano"]), true);
  assert.equal(addonMatch(redis, ["soaring-ably-1234"]), true);
});

test("addonMatch: requires an exact field match", () => {
  assert.equal(addonMatch(redis, ["redis"]), false);
});

test("normalizeFilters: lowercases tokens before matching", () => {
  const tokens = normalizeFilters(["Redis_URL"]);
  assert.deepEqual(tokens, ["redis_url"]);
  assert.equal(addonMatch(redis, tokens), true);
  assert.equal(addonMatch(postgres, tokens), false);
});

test("addonMatch: unmatched token yields no match", () => {
  assert.equal(addonMatch(redis, ["memcache_url"]), false);
  assert.equal(addonMatch(postgres, ["memcache_url"]), false);
});
