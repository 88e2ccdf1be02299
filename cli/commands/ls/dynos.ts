// =============================================================================
// ls dynos — List an App's Dynos
// =============================================================================

import type { HerokuProvider } from "../../../providers/heroku.ts";
import type { Dyno } from "../../../util/heroku-transforms.ts";
import { sortByName } from "../../../util/sort.ts";
import { dynoRow } from "./render.ts";
import { type Listing, type ListOptions, orThrow } from "./types.ts";

export type ListDynosResult = { app: string; dynos: Dyno[] };

/**
 * Dynos come back as one list. Without names, all of them by name; with
 * names, each name's dynos in the order the names were given.
 */
export const listDynos = async (
  heroku: HerokuProvider,
  app: string,
  names: readonly string[],
  opts: ListOptions,
): Promise<Listing<ListDynosResult>> => {
  const dynos = sortByName(orThrow(await heroku.dynos.list(app)));

  const picked = names.length === 0
    ? dynos
    : names.flatMap((name) => dynos.filter((d) => d.name === name));

  return {
    rows: picked.map((d) => dynoRow(d, opts)),
    errors: [],
    data: { app, dynos: picked },
  };
};
