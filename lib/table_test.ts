import { test } from "node:test";
import assert from "node:assert/strict";
import { formatRows } from "./table.ts";

test("formatRows: pads columns to the widest cell", () => {
  const out = formatRows([
    ["run.3794", "up", " 1m", "bash"],
    ["web.1", "crashed", "15h", '"blog /app /tmp/dst"'],
  ]);
  assert.equal(
    out,
    [
      "run.3794  up        1m  bash",
      'web.1     crashed  15h  "blog /app /tmp/dst"',
    ].join("\n"),
  );
});

test("formatRows: passes single-field rows through", () => {
  assert.equal(formatRows([["myapp"], ["myapp2"]]), "myapp\nmyapp2");
});

test("formatRows: aligns rows with different field counts", () => {
  const out = formatRows([
    ["-", "app", "me", "1k"],
    [" ", "heroku-postgresql:dev", "me", "?k", "DATABASE_URL"],
  ]);
  assert.equal(
    out,
    [
      "-  app                    me  1k",
      "   heroku-postgresql:dev  me  ?k  DATABASE_URL",
    ].join("\n"),
  );
});

test("formatRows: trims trailing blanks", () => {
  assert.equal(formatRows([["a", ""], ["bb", "c"]]), "a\nbb  c");
});

test("formatRows: renders nothing for no rows", () => {
  assert.equal(formatRows([]), "");
});
