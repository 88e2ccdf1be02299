// =============================================================================
// Abbreviation — Shared Email Suffixes and Truncation
// =============================================================================
//
// Long listings repeat the owner's domain on every row. When most owners
// share one "@domain", it is dropped for display:
//
//   a@x.com, b@x.com, c@y.com   →   a, b, c@y.com
//
// Only display projections are shortened; domain records keep full values.
//
// =============================================================================

import { compareStrings } from "./sort.ts";

/**
 * The "@domain" suffix shared by the most owners, or "" when none has one.
 * Candidates are visited in sorted order and the first maximum wins, so ties
 * resolve the same way on every run.
 */
export const commonSuffix = (owners: readonly string[]): string => {
  const tally = new Map<string, number>();
  for (const owner of owners) {
    const at = owner.indexOf("@");
    if (at < 0) continue;
    const suffix = owner.slice(at);
    tally.set(suffix, (tally.get(suffix) ?? 0) + 1);
  }

  let best = "";
  let max = 0;
  for (const suffix of [...tally.keys()].sort(compareStrings)) {
    const n = tally.get(suffix) ?? 0;
    if (n > max) {
      best = suffix;
      max = n;
    }
  }
  return best;
};

export const stripSuffix = (owner: string, suffix: string): string =>
  suffix !== "" && owner.endsWith(suffix)
    ? owner.slice(0, owner.length - suffix.length)
    : owner;

export interface Abbreviated {
  /** The suffix that was stripped; "" when nothing was. */
  suffix: string;
  owners: string[];
}

/**
 * Strip a shared suffix from every owner. A non-empty `suffix` is reused as
 * is (follow mode threads the app list's suffix into each add-on list);
 * otherwise one is computed from `owners`.
 */
export const abbrevOwners = (
  owners: readonly string[],
  suffix = "",
): Abbreviated => {
  const chosen = suffix !== "" ? suffix : commonSuffix(owners);
  return {
    suffix: chosen,
    owners: owners.map((o) => stripSuffix(o, chosen)),
  };
};

/** Truncate to `n` characters, the last one becoming an ellipsis. */
export const abbrev = (s: string, n: number): string => {
  const chars = [...s];
  if (chars.length > n) {
    return chars.slice(0, n - 1).join("") + "…";
  }
  return s;
};
