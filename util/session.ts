// =============================================================================
// Session — Shared Prerequisites Initialization
// =============================================================================

import { createHerokuProvider, type HerokuProvider } from "../providers/heroku.ts";
import type { Output } from "../lib/output.ts";
import { getCredentialStore, requireApiKey } from "./credentials.ts";
import { DEFAULT_API_URL, ENV_API_URL } from "./constants.ts";

/**
 * Resolve the API key and endpoint and build the API client. Requests are
 * traced through `out.debug`, which only prints when debugging is on.
 */
export const initSession = async <T extends Record<string, unknown>>(
  out: Output<T>,
  env: Record<string, string | undefined> = process.env,
): Promise<{ heroku: HerokuProvider }> => {
  const apiKey = await requireApiKey(out, getCredentialStore(env));
  const heroku = createHerokuProvider({
    apiKey,
    apiUrl: env[ENV_API_URL] || DEFAULT_API_URL,
    trace: (line) => out.debug(line),
  });
  return { heroku };
};
