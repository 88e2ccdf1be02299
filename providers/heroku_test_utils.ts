// =============================================================================
// In-Process Platform API Stand-In for Tests
// =============================================================================

import { createHerokuProvider, type HerokuProvider } from "./heroku.ts";

export interface FakeRoute {
  status?: number;
  /** Serialized with JSON.stringify unless already a string. */
  body: unknown;
  delayMs?: number;
}

const urlOf = (input: string | URL | Request): URL =>
  new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);

/**
 * A fetch that answers from `routes`, keyed by decoded path. Unknown paths
 * get the API's 404 body. Every requested path is appended to `calls`.
 */
export const fakeFetch = (
  routes: Record<string, FakeRoute>,
  calls: string[] = [],
): typeof fetch =>
async (input) => {
  const path = decodeURIComponent(urlOf(input).pathname);
  calls.push(path);

  const route: FakeRoute | undefined = routes[path];
  if (!route) {
    return new Response(
      JSON.stringify({ id: "not_found", message: `Couldn't find ${path}.` }),
      { status: 404 },
    );
  }
  if (route.delayMs) {
    await new Promise((resolve) => setTimeout(resolve, route.delayMs));
  }
  const body = typeof route.body === "string" ? route.body : JSON.stringify(route.body);
  return new Response(body, { status: route.status ?? 200 });
};

export const fakeProvider = (
  routes: Record<string, FakeRoute>,
  calls: string[] = [],
): HerokuProvider =>
  createHerokuProvider({
    apiKey: "test-secret",
    apiUrl: "https://api.test",
    fetch: fakeFetch(routes, calls),
  });

// =============================================================================
// Fixtures
// =============================================================================

export const rawApp = (
  name: string,
  owner: string,
  extra: Record<string, unknown> = {},
): Record<string, unknown> => ({
  name,
  owner: { email: owner },
  created_at: "2013-01-02T12:34:00Z",
  released_at: null,
  slug_size: null,
  ...extra,
});

export const rawRelease = (
  name: string,
  extra: Record<string, unknown> = {},
): Record<string, unknown> => ({
  name,
  commit: null,
  user: "me@example.com",
  created_at: "2013-06-12T18:28:00Z",
  description: "Set config vars",
  ...extra,
});
