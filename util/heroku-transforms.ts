// =============================================================================
// Platform Transforms — Pure Data Transformations
// =============================================================================

import type { HerokuApp, HerokuDyno, HerokuRelease } from "../schemas/heroku.ts";

// =============================================================================
// Domain Records
// =============================================================================

export interface App {
  name: string;
  owner: string;
  createdAt: Date;
  releasedAt: Date | null;
  /** Compiled slug size in bytes. */
  slugSize: number | null;
}

export interface Release {
  name: string;
  commit: string;
  user: string;
  createdAt: Date;
  description: string;
}

export interface Dyno {
  name: string;
  state: string;
  command: string;
  updatedAt: Date;
}

/** An add-on joined with the config vars its attachments expose. */
export interface MergedAddon {
  id: string;
  type: string;
  owner: string;
  name: string;
  configVar: string;
}

// =============================================================================
// Mapping
// =============================================================================

export const mapApp = (raw: HerokuApp): App => ({
  name: raw.name,
  owner: raw.owner.email,
  createdAt: new Date(raw.created_at),
  releasedAt: raw.released_at ? new Date(raw.released_at) : null,
  slugSize: raw.slug_size ?? null,
});

export const mapRelease = (raw: HerokuRelease): Release => ({
  name: raw.name,
  commit: raw.commit ?? "",
  user: raw.user,
  createdAt: new Date(raw.created_at),
  description: raw.description,
});

export const mapDyno = (raw: HerokuDyno): Dyno => ({
  name: raw.name,
  state: raw.state,
  command: raw.command,
  updatedAt: new Date(raw.updated_at),
});
