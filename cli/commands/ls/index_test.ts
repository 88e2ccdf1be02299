import { test } from "node:test";
import assert from "node:assert/strict";
import { fakeProvider, rawApp } from "../../../providers/heroku_test_utils.ts";
import type { Release } from "../../../util/heroku-transforms.ts";
import { ls, type LsDeps, parseTarget } from "./index.ts";

// =============================================================================
// parseTarget
// =============================================================================

test("parseTarget: no arguments lists apps", () => {
  assert.deepEqual(parseTarget([]), { noun: "apps", names: [] });
});

test("parseTarget: nouns match by prefix", () => {
  assert.deepEqual(parseTarget(["rel", "v3"]), { noun: "releases", names: ["v3"] });
  assert.deepEqual(parseTarget(["a"]), { noun: "addons", names: [] });
  assert.deepEqual(parseTarget(["dynos", "web.1"]), { noun: "dynos", names: ["web.1"] });
});

test("parseTarget: anything else names apps", () => {
  assert.deepEqual(parseTarget(["myapp", "rel"]), { noun: "apps", names: ["myapp", "rel"] });
  assert.deepEqual(parseTarget(["apps"]), { noun: "apps", names: ["apps"] });
  assert.deepEqual(parseTarget(["", "x"]), { noun: "apps", names: ["", "x"] });
});

// =============================================================================
// ls
// =============================================================================

const RED_CROSS = "\x1b[31m✗\x1b[0m";

const heroku = fakeProvider({
  "/apps/myapp": { body: rawApp("myapp", "me@example.com") },
  "/apps/myapp/addons": {
    body: [{ id: "a1", name: "soaring-ably-1234", plan: { name: "redistogo:nano" }, owner: { email: "me@example.com" } }],
  },
  "/apps/myapp/addon-attachments": {
    body: [{ id: "t1", name: "REDIS_URL", addon: { id: "a1", name: "soaring-ably-1234" } }],
  },
  "/apps/myapp/dynos": {
    body: [{ name: "web.1", state: "up", command: "bash", updated_at: "2013-06-14T08:59:59Z" }],
  },
  "/apps/myapp/releases": { body: [] },
});

const deps = (over: LsDeps = {}): LsDeps => ({
  session: () => Promise.resolve({ heroku }),
  resolve: (flag) => Promise.resolve(flag ?? "myapp"),
  describe: (rels: readonly Release[]) => Promise.resolve(rels.map(() => "")),
  now: () => new Date("2013-06-14T09:00:00Z"),
  env: {},
  ...over,
});

test("ls: prints matching add-ons in long form", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  await ls(["-l", "addons", "redis_url"], deps());
  assert.deepEqual(log.mock.calls.map((c) => c.arguments[0]), [
    "redistogo:nano  me  soaring-ably-1234  REDIS_URL",
  ]);
});

test("ls: an unmatched add-on filter prints nothing", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  await ls(["addons", "memcache_url"], deps());
  assert.equal(log.mock.callCount(), 0);
});

test("ls: reports failed apps on stderr and lists the rest", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  const err = t.mock.method(console, "error", () => {});
  await ls(["myapp", "nope"], deps());
  assert.deepEqual(log.mock.calls.map((c) => c.arguments[0]), ["myapp"]);
  assert.deepEqual(err.mock.calls.map((c) => c.arguments[0]), [
    `${RED_CROSS} GET /apps/nope: Couldn't find /apps/nope.`,
  ]);
});

test("ls: passes -a to app resolution", async (t) => {
  t.mock.method(console, "log", () => {});
  const seen: Array<string | undefined> = [];
  await ls(["-a", "myapp", "dynos"], deps({
    resolve: (flag) => {
      seen.push(flag);
      return Promise.resolve(flag ?? null);
    },
  }));
  assert.deepEqual(seen, ["myapp"]);
});

test("ls: dies without an app for app-scoped nouns", async (t) => {
  const err = t.mock.method(console, "error", () => {});
  await assert.rejects(
    ls(["releases"], deps({ resolve: () => Promise.resolve(null) })),
    { message: "exit" },
  );
  assert.deepEqual(err.mock.calls.map((c) => c.arguments[0]), [
    `${RED_CROSS} Must Specify App. Use -a <app> or Set HKAPP`,
  ]);
});

test("ls: a failed full listing is fatal", async (t) => {
  const err = t.mock.method(console, "error", () => {});
  await assert.rejects(ls([], deps()), { message: "exit" });
  assert.deepEqual(err.mock.calls.map((c) => c.arguments[0]), [
    `${RED_CROSS} GET /apps: Couldn't find /apps.`,
  ]);
});

test("ls: rejects unknown flags", async (t) => {
  const err = t.mock.method(console, "error", () => {});
  await assert.rejects(ls(["-x"], deps()), { message: "exit" });
  assert.deepEqual(err.mock.calls.map((c) => c.arguments[0]), [
    `${RED_CROSS} Unknown Flag(s): -x. Run 'hk ls --help' for Usage.`,
  ]);
});

test("ls: --json prints the records and errors", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  await ls(["--json", "-l", "dynos"], deps());
  assert.equal(log.mock.callCount(), 1);
  assert.deepEqual(JSON.parse(String(log.mock.calls[0].arguments[0])), {
    ok: true,
    app: "myapp",
    dynos: [{
      name: "web.1",
      state: "up",
      command: "bash",
      updatedAt: "2013-06-14T08:59:59.000Z",
    }],
    errors: [],
  });
});

test("ls: --help prints usage without calling the API", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  let sessions = 0;
  await ls(["--help"], deps({
    session: () => {
      sessions++;
      return Promise.resolve({ heroku });
    },
  }));
  assert.equal(sessions, 0);
  assert.match(String(log.mock.calls[0].arguments[0]), /hk ls \[-l\] \[-f\] \[app\.\.\.\]/);
});
