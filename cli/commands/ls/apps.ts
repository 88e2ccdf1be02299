// =============================================================================
// ls apps — List Apps, Optionally Following Attachments
// =============================================================================

import { Result } from "../../../lib/result.ts";
import type { HerokuProvider } from "../../../providers/heroku.ts";
import { abbrevOwners } from "../../../util/abbrev.ts";
import { fetchEach } from "../../../util/fanout.ts";
import type { App, MergedAddon } from "../../../util/heroku-transforms.ts";
import { sortByName } from "../../../util/sort.ts";
import { appRows, type AppView } from "./render.ts";
import { type Listing, type ListOptions, orThrow } from "./types.ts";

// =============================================================================
// Types
// =============================================================================

type AppData = App & { attachments?: MergedAddon[] };

export type ListAppsResult = { apps: AppData[] };

// =============================================================================
// Stage: Follow Attachments
// =============================================================================

/**
 * Fetch every app's add-ons concurrently. An app whose add-ons cannot be
 * fetched keeps an empty list and contributes an error. Owners are shortened
 * with the app list's suffix when it had one.
 */
const stageFollow = async (
  heroku: HerokuProvider,
  views: AppView[],
  suffix: string,
): Promise<{ views: AppView[]; errors: string[] }> => {
  const results = await Promise.all(
    views.map((v) =>
      v.app.name === ""
        ? Promise.resolve(Result.ok<MergedAddon[]>([]))
        : heroku.addons.merged(v.app.name)
    ),
  );

  const errors: string[] = [];
  const followed = views.map((v, i): AppView => {
    const addons = results[i].match({
      ok: (list) => list,
      err: (error) => {
        errors.push(error);
        return [];
      },
    });
    const { owners } = abbrevOwners(addons.map((a) => a.owner), suffix);
    return {
      ...v,
      attachments: addons.map((addon, j) => ({ addon, owner: owners[j] })),
    };
  });

  return { views: followed, errors };
};

// =============================================================================
// Stage: Render
// =============================================================================

const stageRender = async (
  heroku: HerokuProvider,
  apps: App[],
  errors: string[],
  opts: ListOptions,
): Promise<Listing<ListAppsResult>> => {
  const sorted = sortByName(apps);
  const { suffix, owners } = abbrevOwners(sorted.map((a) => a.owner));
  let views: AppView[] = sorted.map((app, i) => ({
    app,
    owner: owners[i],
    attachments: [],
  }));

  const allErrors = [...errors];
  if (opts.follow) {
    const followed = await stageFollow(heroku, views, suffix);
    views = followed.views;
    allErrors.push(...followed.errors);
  }

  const shown = views.filter((v) => v.app.name !== "");
  return {
    rows: shown.flatMap((v) => appRows(v, opts)),
    errors: allErrors,
    data: {
      apps: shown.map((v) =>
        opts.follow ? { ...v.app, attachments: v.attachments.map((a) => a.addon) } : v.app
      ),
    },
  };
};

// =============================================================================
// List Apps
// =============================================================================

/**
 * Every app visible to the account, or just the named ones. Named apps are
 * fetched concurrently; the ones that fail are reported and left out.
 */
export const listApps = async (
  heroku: HerokuProvider,
  names: readonly string[],
  opts: ListOptions,
): Promise<Listing<ListAppsResult>> => {
  if (names.length === 0) {
    const apps = orThrow(await heroku.apps.list());
    return stageRender(heroku, apps, [], opts);
  }

  const { values, errors } = await fetchEach(names, (name) => heroku.apps.get(name));
  return stageRender(heroku, values, errors, opts);
};
