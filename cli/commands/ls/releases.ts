// =============================================================================
// ls releases — List an App's Releases
// =============================================================================

import type { HerokuProvider } from "../../../providers/heroku.ts";
import { abbrevOwners } from "../../../util/abbrev.ts";
import { fetchEach } from "../../../util/fanout.ts";
import { describeCommits } from "../../../util/git.ts";
import type { Release } from "../../../util/heroku-transforms.ts";
import { sortByName } from "../../../util/sort.ts";
import { releaseRow, type ReleaseView } from "./render.ts";
import { type Listing, type ListOptions, orThrow } from "./types.ts";

export type ListReleasesResult = { app: string; releases: Release[] };

/** Maps releases to display refs, one per release. */
export type Describe = (releases: readonly Release[]) => Promise<string[]>;

/**
 * All releases in API (version) order, or the named ones fetched
 * concurrently and sorted by name.
 */
export const listReleases = async (
  heroku: HerokuProvider,
  app: string,
  names: readonly string[],
  opts: ListOptions,
  describe: Describe = describeCommits,
): Promise<Listing<ListReleasesResult>> => {
  let releases: Release[];
  let errors: string[] = [];

  if (names.length === 0) {
    releases = orThrow(await heroku.releases.list(app));
  } else {
    const fetched = await fetchEach(names, (name) => heroku.releases.get(app, name));
    releases = sortByName(fetched.values);
    errors = fetched.errors;
  }

  const refs = await describe(releases);
  const { owners } = abbrevOwners(releases.map((r) => r.user));
  const views: ReleaseView[] = releases
    .map((release, i) => ({ release, user: owners[i], ref: refs[i] }))
    .filter((v) => v.release.name !== "");

  return {
    rows: views.map((v) => releaseRow(v, opts)),
    errors,
    data: { app, releases: views.map((v) => v.release) },
  };
};
