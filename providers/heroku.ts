// =============================================================================
// Platform API Client
// =============================================================================

import type { z } from "zod";
import { Result } from "../lib/result.ts";
import {
  type HerokuAddon,
  HerokuAddonsListSchema,
  HerokuAppSchema,
  HerokuAppsListSchema,
  type HerokuAttachment,
  HerokuAttachmentsListSchema,
  HerokuDynosListSchema,
  HerokuErrorSchema,
  HerokuReleaseSchema,
  HerokuReleasesListSchema,
} from "../schemas/heroku.ts";
import {
  type App,
  type Dyno,
  mapApp,
  mapDyno,
  mapRelease,
  type MergedAddon,
  type Release,
} from "../util/heroku-transforms.ts";
import { mergeAddons } from "../util/addons.ts";
import { API_ACCEPT, CLI_NAME, CLI_VERSION, DEFAULT_API_URL } from "../util/constants.ts";

// =============================================================================
// Provider Interface
// =============================================================================

export interface HerokuProvider {
  apps: {
    list(): Promise<Result<App[]>>;
    get(name: string): Promise<Result<App>>;
  };
  releases: {
    list(app: string): Promise<Result<Release[]>>;
    get(app: string, name: string): Promise<Result<Release>>;
  };
  dynos: {
    list(app: string): Promise<Result<Dyno[]>>;
  };
  addons: {
    list(app: string): Promise<Result<HerokuAddon[]>>;
    attachments(app: string): Promise<Result<HerokuAttachment[]>>;
    /** Add-ons joined with their attachments; fails if either request does. */
    merged(app: string): Promise<Result<MergedAddon[]>>;
  };
}

export interface HerokuProviderOptions {
  apiKey: string;
  apiUrl?: string;
  /** Swapped out by tests; defaults to the global fetch. */
  fetch?: typeof fetch;
  /** Called once per request with a one-line trace. */
  trace?: (line: string) => void;
}

// =============================================================================
// Error Formatting
// =============================================================================

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((i) =>
      i.path.length > 0 ? `${i.path.map(String).join(".")}: ${i.message}` : i.message
    )
    .join("; ");

/** The API's error message when the body carries one, else the status. */
const errorMessage = (status: number, body: string): string => {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return `HTTP ${status}`;
  }
  const parsed = HerokuErrorSchema.safeParse(json);
  return parsed.success ? parsed.data.message : `HTTP ${status}`;
};

// =============================================================================
// Create Provider
// =============================================================================

export const createHerokuProvider = (
  opts: HerokuProviderOptions,
): HerokuProvider => {
  const base = (opts.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
  const doFetch = opts.fetch ?? fetch;

  const headers = (): Record<string, string> => ({
    Accept: API_ACCEPT,
    Authorization: `Basic ${btoa(":" + opts.apiKey)}`,
    "User-Agent": `${CLI_NAME}/${CLI_VERSION}`,
  });

  /** GET `path` and validate the body; every failure becomes a Result error. */
  const get = async <T>(path: string, schema: z.ZodType<T>): Promise<Result<T>> => {
    opts.trace?.(`GET ${path}`);

    let response: Response;
    let text: string;
    try {
      response = await doFetch(`${base}${path}`, {
        method: "GET",
        headers: headers(),
      });
      text = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Result.err(`GET ${path}: ${message}`);
    }

    opts.trace?.(`${response.status} ${path}`);

    if (!response.ok) {
      return Result.err(`GET ${path}: ${errorMessage(response.status, text)}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return Result.err(`GET ${path}: Invalid JSON: ${text.slice(0, 100)}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return Result.err(`GET ${path}: Unexpected Response: ${describeIssues(parsed.error)}`);
    }
    return Result.ok(parsed.data);
  };

  const app = (name: string): string => `/apps/${encodeURIComponent(name)}`;

  const provider: HerokuProvider = {
    apps: {
      async list(): Promise<Result<App[]>> {
        return (await get("/apps", HerokuAppsListSchema)).map((apps) => apps.map(mapApp));
      },

      async get(name: string): Promise<Result<App>> {
        return (await get(app(name), HerokuAppSchema)).map(mapApp);
      },
    },

    releases: {
      async list(appName: string): Promise<Result<Release[]>> {
        return (await get(`${app(appName)}/releases`, HerokuReleasesListSchema))
          .map((rels) => rels.map(mapRelease));
      },

      async get(appName: string, name: string): Promise<Result<Release>> {
        return (await get(
          `${app(appName)}/releases/${encodeURIComponent(name)}`,
          HerokuReleaseSchema,
        )).map(mapRelease);
      },
    },

    dynos: {
      async list(appName: string): Promise<Result<Dyno[]>> {
        return (await get(`${app(appName)}/dynos`, HerokuDynosListSchema))
          .map((dynos) => dynos.map(mapDyno));
      },
    },

    addons: {
      list(appName: string): Promise<Result<HerokuAddon[]>> {
        return get(`${app(appName)}/addons`, HerokuAddonsListSchema);
      },

      attachments(appName: string): Promise<Result<HerokuAttachment[]>> {
        return get(`${app(appName)}/addon-attachments`, HerokuAttachmentsListSchema);
      },

      async merged(appName: string): Promise<Result<MergedAddon[]>> {
        const [addons, attachments] = await Promise.all([
          provider.addons.list(appName),
          provider.addons.attachments(appName),
        ]);
        return addons.flatMap((a) => attachments.map((t) => mergeAddons(a, t)));
      },
    },
  };

  return provider;
};
