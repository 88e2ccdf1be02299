// =============================================================================
// ls — Row Rendering
// =============================================================================
//
// Each renderer turns one record into the fields of one or more rows; the
// caller aligns all rows at once with formatRows(). Short form is the name
// alone, long form:
//
//   app  me    1234k  Jan  2 12:34  myapp           (app)
//   3ae20c2  me  Jun 12 18:28  v1  Deploy 3ae20c2     (release)
//   web.1  up  15h  "blog /app /tmp/dst"              (dyno)
//   redistogo:nano  me  soaring-ably-1234  REDIS_URL  (add-on)
//
// =============================================================================

import type { Row } from "../../../lib/table.ts";
import { abbrev } from "../../../util/abbrev.ts";
import type { App, Dyno, Release } from "../../../util/heroku-transforms.ts";
import { maybeQuote, prettyDuration, prettyTime } from "../../../util/pretty.ts";
import type { AddonView, ListOptions } from "./types.ts";

/** Owners and commit refs are cut to this many characters. */
const FIELD_WIDTH = 10;

/** Slug sizes are never known for add-ons; this keeps the column shape. */
const UNKNOWN_SIZE = "     ?k";

const orUnknown = (s: string): string => (s === "" ? "?" : s);

// =============================================================================
// Apps
// =============================================================================

export interface AppView {
  app: App;
  owner: string;
  /** Filled only in follow mode. */
  attachments: AddonView[];
}

/** Bytes to kilobytes, right-justified to six digits. */
export const formatSlugSize = (bytes: number | null): string =>
  `${String(Math.floor(((bytes ?? 0) + 501) / 1000)).padStart(6)}k`;

export const appRows = (view: AppView, opts: ListOptions): Row[] => {
  const { app } = view;

  if (!opts.long) {
    const rows: Row[] = [[app.name]];
    if (opts.follow) {
      for (const a of view.attachments) {
        rows.push([a.addon.name || `(${a.addon.type})`]);
      }
    }
    return rows;
  }

  const row = [
    "app",
    abbrev(view.owner, FIELD_WIDTH),
    formatSlugSize(app.slugSize),
    prettyTime(app.releasedAt ?? app.createdAt, opts.now),
    app.name,
  ];
  if (!opts.follow) return [row];

  return [
    ["-", ...row],
    ...view.attachments.map((a) => [
      " ",
      a.addon.type,
      abbrev(a.owner, FIELD_WIDTH),
      UNKNOWN_SIZE,
      "",
      orUnknown(a.addon.name),
      orUnknown(a.addon.configVar),
    ]),
  ];
};

// =============================================================================
// Releases
// =============================================================================

export interface ReleaseView {
  release: Release;
  user: string;
  /** Described commit: a tag name or short SHA. */
  ref: string;
}

export const releaseRow = (view: ReleaseView, opts: ListOptions): Row => {
  const { release } = view;
  if (!opts.long) return [release.name];
  return [
    abbrev(view.ref, FIELD_WIDTH),
    abbrev(view.user, FIELD_WIDTH),
    prettyTime(release.createdAt, opts.now),
    release.name,
    release.description,
  ];
};

// =============================================================================
// Dynos
// =============================================================================

export const dynoRow = (dyno: Dyno, opts: ListOptions): Row => {
  if (!opts.long) return [dyno.name];
  return [
    dyno.name,
    dyno.state,
    prettyDuration(opts.now.getTime() - dyno.updatedAt.getTime()),
    maybeQuote(dyno.command),
  ];
};

// =============================================================================
// Add-ons
// =============================================================================

export const addonRow = (view: AddonView, opts: ListOptions): Row => {
  const { addon } = view;
  if (!opts.long) return [addon.configVar || `(${addon.type})`];
  return [
    addon.type,
    abbrev(view.owner, FIELD_WIDTH),
    orUnknown(addon.name),
    orUnknown(addon.configVar),
  ];
};
