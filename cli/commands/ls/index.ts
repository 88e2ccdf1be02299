// =============================================================================
// ls Command - List Apps, Releases, Dynos and Add-ons
// =============================================================================

import { bold } from "../../../lib/cli.ts";
import {
  boolFlag,
  checkArgs,
  parseFlags,
  positionals,
  stringFlag,
} from "../../../lib/args.ts";
import { createOutput } from "../../../lib/output.ts";
import { formatRows } from "../../../lib/table.ts";
import { registerCommand } from "../../mod.ts";
import type { HerokuProvider } from "../../../providers/heroku.ts";
import { ENV_APP, ENV_DEBUG } from "../../../util/constants.ts";
import { resolveApp } from "../../../util/resolve.ts";
import { initSession } from "../../../util/session.ts";
import { listAddons } from "./addons.ts";
import { listApps } from "./apps.ts";
import { listDynos } from "./dynos.ts";
import { type Describe, listReleases } from "./releases.ts";
import { type Listing, ListError, type ListOptions } from "./types.ts";

// =============================================================================
// Help
// =============================================================================

const showLsHelp = (): void => {
  console.log(`
${bold("hk ls")} - List Apps, Releases, Dynos and Add-ons

${bold("USAGE")}
  hk ls [-l] [-f] [app...]
  hk ls [-l] [-a <app>] releases [name...]
  hk ls [-l] [-a <app>] addons [name...]
  hk ls [-l] [-a <app>] dynos [name...]

  Nouns may be abbreviated to any prefix: 'hk ls rel', 'hk ls d'.

${bold("OPTIONS")}
  -l          Long listing. Apps show owner, slug size, last release time
              (or creation time) and name. Releases show the commit, who
              made the release, when, its name and description. Add-ons show
              type, owner, resource name and config var. Dynos show name,
              state, age and command.
  -f          Follow attachments: list each app's add-ons under it
  -a <app>    App name (defaults to $${ENV_APP}, then the 'heroku' git remote)
  --json      Output as JSON

${bold("EXAMPLES")}
  $ hk ls
  myapp
  myapp2

  $ hk ls -l
  app  me     1234k  Jan  2 12:34  myapp
  app  me     4567k  Jan  2 12:34  myapp2

  $ hk ls -l dynos
  run.3794  up   1m  bash
  web.1     up  15h  "blog /app /tmp/dst"

  $ hk ls -l rel v3
  ed39b69  me  Jun 13 18:31  v3  Deploy ed39b69

  $ hk ls -l addons REDIS_URL
  redistogo:nano  me  soaring-ably-1234  REDIS_URL
`);
};

// =============================================================================
// Target Parsing
// =============================================================================

export type Noun = "apps" | "releases" | "addons" | "dynos";

/** Checked in this order, so "r" is releases and "a" is addons. */
const NOUNS = ["releases", "addons", "dynos"] as const;

export interface Target {
  noun: Noun;
  names: string[];
}

/**
 * The first argument selects a noun when it is a non-empty prefix of one;
 * otherwise every argument names an app.
 */
export const parseTarget = (args: readonly string[]): Target => {
  const [first, ...rest] = args;
  if (first === undefined) return { noun: "apps", names: [] };

  const noun = first === "" ? undefined : NOUNS.find((n) => n.startsWith(first));
  return noun ? { noun, names: rest } : { noun: "apps", names: [...args] };
};

// =============================================================================
// Dispatch
// =============================================================================

const runListing = (
  heroku: HerokuProvider,
  target: Target,
  app: string,
  opts: ListOptions,
  describe?: Describe,
): Promise<Listing<Record<string, unknown>>> => {
  switch (target.noun) {
    case "releases":
      return listReleases(heroku, app, target.names, opts, describe);
    case "addons":
      return listAddons(heroku, app, target.names, opts);
    case "dynos":
      return listDynos(heroku, app, target.names, opts);
    case "apps":
      return listApps(heroku, target.names, opts);
  }
};

// =============================================================================
// ls Command
// =============================================================================

/** Collaborators the command reaches for; tests substitute them. */
export interface LsDeps {
  session?: () => Promise<{ heroku: HerokuProvider }>;
  resolve?: (flag: string | undefined) => Promise<string | null>;
  describe?: Describe;
  now?: () => Date;
  env?: Record<string, string | undefined>;
}

export const ls = async (argv: string[], deps: LsDeps = {}): Promise<void> => {
  const opts = { string: ["a"], boolean: ["l", "f", "help", "json"] } as const;
  const args = parseFlags(argv, opts);
  checkArgs(args, opts, "hk ls");

  if (boolFlag(args, "help")) {
    showLsHelp();
    return;
  }

  const env = deps.env ?? process.env;
  const out = createOutput<Record<string, unknown>>(
    boolFlag(args, "json"),
    Boolean(env[ENV_DEBUG]),
  );

  const target = parseTarget(positionals(args));
  const listOpts: ListOptions = {
    long: boolFlag(args, "l"),
    follow: boolFlag(args, "f"),
    now: deps.now?.() ?? new Date(),
  };

  const { heroku } = await (deps.session ?? (() => initSession(out, env)))();

  let app = "";
  if (target.noun !== "apps") {
    const resolve = deps.resolve ?? ((flag) => resolveApp({ flag, env }));
    const resolved = await resolve(stringFlag(args, "a"));
    if (!resolved) {
      return out.die(`Must Specify App. Use -a <app> or Set ${ENV_APP}`);
    }
    app = resolved;
  }

  let listing: Listing<Record<string, unknown>>;
  try {
    listing = await runListing(heroku, target, app, listOpts, deps.describe);
  } catch (error) {
    if (error instanceof ListError) return out.die(error.message);
    throw error;
  }

  for (const e of listing.errors) out.err(e);
  if (listing.rows.length > 0) out.text(formatRows(listing.rows));
  out.done({ ...listing.data, errors: listing.errors });
  out.print();
};

// =============================================================================
// Register Command
// =============================================================================

registerCommand({
  name: "ls",
  description: "List apps, addons, dynos, and releases",
  usage: "hk ls [-l] [-f] [-a <app>] [releases|addons|dynos] [name...]",
  run: (argv) => ls(argv),
});
