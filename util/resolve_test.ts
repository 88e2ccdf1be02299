import { test } from "node:test";
import assert from "node:assert/strict";
import { CmdResult, type CommandRunner } from "../lib/command.ts";
import { parseRemoteUrl, resolveApp } from "./resolve.ts";

const remote = (stdout: string, code = 0): CommandRunner => () =>
  Promise.resolve(new CmdResult(code, stdout, ""));

// =============================================================================
// parseRemoteUrl
// =============================================================================

test("parseRemoteUrl: reads https remotes", () => {
  assert.equal(parseRemoteUrl("https://git.heroku.com/myapp.git\n"), "myapp");
});

test("parseRemoteUrl: reads ssh remotes", () => {
  assert.equal(parseRemoteUrl("git@heroku.com:my-app-2.git"), "my-app-2");
  assert.equal(parseRemoteUrl("ssh://git@heroku.com/myapp.git"), "myapp");
});

test("parseRemoteUrl: ignores other hosts", () => {
  assert.equal(parseRemoteUrl("git@github.com:someone/myapp.git"), null);
});

// =============================================================================
// resolveApp
// =============================================================================

test("resolveApp: the flag wins", async () => {
  const app = await resolveApp({
    flag: "flagged",
    env: { HKAPP: "from-env" },
    run: remote("https://git.heroku.com/from-git.git"),
  });
  assert.equal(app, "flagged");
});

test("resolveApp: falls back to HKAPP", async () => {
  const app = await resolveApp({
    env: { HKAPP: "from-env" },
    run: remote("https://git.heroku.com/from-git.git"),
  });
  assert.equal(app, "from-env");
});

test("resolveApp: falls back to the git remote", async () => {
  const app = await resolveApp({
    env: {},
    run: remote("https://git.heroku.com/from-git.git\n"),
  });
  assert.equal(app, "from-git");
});

test("resolveApp: null without flag, env or remote", async () => {
  const app = await resolveApp({ env: {}, run: remote("", 1) });
  assert.equal(app, null);
});
