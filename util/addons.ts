// =============================================================================
// Add-ons — Attachment Merge and Name Filter
// =============================================================================

import type { HerokuAddon, HerokuAttachment } from "../schemas/heroku.ts";
import type { MergedAddon } from "./heroku-transforms.ts";
import { compareStrings } from "./sort.ts";

// =============================================================================
// Merge
// =============================================================================

/**
 * One record per attachment, so an add-on exposed under several config vars
 * appears once for each. An add-on with no attachment gets a single record
 * with an empty config var. Ordered by type, resource name, then config var.
 */
export const mergeAddons = (
  addons: readonly HerokuAddon[],
  attachments: readonly HerokuAttachment[],
): MergedAddon[] => {
  const vars = new Map<string, string[]>();
  for (const att of attachments) {
    const names = vars.get(att.addon.id) ?? [];
    names.push(att.name);
    vars.set(att.addon.id, names);
  }

  return addons
    .flatMap((a): MergedAddon[] => {
      const configVars = vars.get(a.id) ?? [""];
      return configVars.map((configVar) => ({
        id: a.id,
        type: a.plan.name,
        owner: a.owner?.email ?? "",
        name: a.name,
        configVar,
      }));
    })
    .sort((a, b) =>
      compareStrings(a.type, b.type) ||
      compareStrings(a.name, b.name) ||
      compareStrings(a.configVar, b.configVar)
    );
};

// =============================================================================
// Filter
// =============================================================================

/** Lowercase the filter tokens once, up front. */
export const normalizeFilters = (tokens: readonly string[]): string[] =>
  tokens.map((t) => t.toLowerCase());

/** True when any of type, name or config var equals any (lowercased) token. */
export const addonMatch = (
  addon: MergedAddon,
  tokens: readonly string[],
): boolean => {
  const fields = [addon.type, addon.name, addon.configVar].map((f) =>
    f.toLowerCase()
  );
  return tokens.some((t) => fields.includes(t));
};
