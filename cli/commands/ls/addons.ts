// =============================================================================
// ls addons — List an App's Add-ons
// =============================================================================

import type { HerokuProvider } from "../../../providers/heroku.ts";
import { abbrevOwners } from "../../../util/abbrev.ts";
import { addonMatch, normalizeFilters } from "../../../util/addons.ts";
import type { MergedAddon } from "../../../util/heroku-transforms.ts";
import { addonRow } from "./render.ts";
import { type AddonView, type Listing, type ListOptions, orThrow } from "./types.ts";

export type ListAddonsResult = { app: string; addons: MergedAddon[] };

/**
 * The app's add-ons joined with their attachments. Names filter by type,
 * resource name or config var, case-insensitively; a filter that matches
 * nothing lists nothing.
 */
export const listAddons = async (
  heroku: HerokuProvider,
  app: string,
  names: readonly string[],
  opts: ListOptions,
): Promise<Listing<ListAddonsResult>> => {
  const merged = orThrow(await heroku.addons.merged(app));
  const { owners } = abbrevOwners(merged.map((m) => m.owner));

  const tokens = normalizeFilters(names);
  const views: AddonView[] = merged
    .map((addon, i) => ({ addon, owner: owners[i] }))
    .filter((v) => tokens.length === 0 || addonMatch(v.addon, tokens));

  return {
    rows: views.map((v) => addonRow(v, opts)),
    errors: [],
    data: { app, addons: views.map((v) => v.addon) },
  };
};
