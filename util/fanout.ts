// =============================================================================
// Fan-Out — One Concurrent Fetch per Name
// =============================================================================
//
//   names ──┬── fetch(name[0]) ──► slot[0]
//           ├── fetch(name[1]) ──► slot[1]
//           └── ...                          ──► join ──► { values, errors }
//
// Each fetch owns its slot; nothing is read until every fetch has settled.
// Failures are collected, never thrown, so one bad name cannot hide the rest.
//
// =============================================================================

import { Result } from "../lib/result.ts";

export interface FanOut<T> {
  /** Successful results, in the order of their names. */
  values: T[];
  /** One message per failed fetch, in the order of their names. */
  errors: string[];
}

/**
 * Fetch every non-empty name concurrently and wait for all of them. Empty
 * names are skipped without a request.
 */
export const fetchEach = async <T>(
  names: readonly string[],
  fetchOne: (name: string) => Promise<Result<T>>,
): Promise<FanOut<T>> => {
  const slots = await Promise.all(
    names.map((name) =>
      name === ""
        ? Promise.resolve(null)
        : fetchOne(name).catch((error: unknown) =>
          Result.err<T>(error instanceof Error ? error.message : String(error))
        )
    ),
  );

  const out: FanOut<T> = { values: [], errors: [] };
  for (const slot of slots) {
    slot?.match({
      ok: (value) => out.values.push(value),
      err: (error) => out.errors.push(error),
    });
  }
  return out;
};
