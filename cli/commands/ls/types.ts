// =============================================================================
// ls — Shared Types
// =============================================================================

import type { Result } from "../../../lib/result.ts";
import type { Row } from "../../../lib/table.ts";
import type { MergedAddon } from "../../../util/heroku-transforms.ts";

export interface ListOptions {
  /** Multi-column rows instead of bare names. */
  long: boolean;
  /** Nest each app's attached add-ons under it. */
  follow: boolean;
  /** Reference point for ages and "recent" timestamps. */
  now: Date;
}

/** What a listing produced: rows to print, per-item errors, JSON payload. */
export type Listing<D extends Record<string, unknown>> = {
  rows: Row[];
  errors: string[];
  data: D;
};

/** An add-on with its owner shortened for display. */
export interface AddonView {
  addon: MergedAddon;
  owner: string;
}

// =============================================================================
// Errors
// =============================================================================

/** A request the whole listing depends on failed. */
export class ListError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ListError";
  }
}

/** The value, or a ListError carrying the request's message. */
export const orThrow = <T>(result: Result<T>): T =>
  result.match({
    ok: (value) => value,
    err: (error) => {
      throw new ListError(error);
    },
  });
