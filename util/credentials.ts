// =============================================================================
// Credential Store - API Key from Environment or Config File
// =============================================================================

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileExists, getConfigDir } from "../lib/cli.ts";
import { CredentialsSchema } from "../schemas/heroku.ts";
import { ENV_API_KEY } from "./constants.ts";

// =============================================================================
// Credential Store Interface
// =============================================================================

export interface CredentialStore {
  getApiKey(): Promise<string | null>;
}

// =============================================================================
// Config File Implementation
// =============================================================================

const getCredentialsPath = (dir: string): string => join(dir, "credentials.json");

/** Reads `{ "apiKey": "..." }`; a missing, unreadable or invalid file is null. */
export const createConfigCredentialStore = (
  dir: string = getConfigDir(),
): CredentialStore => {
  return {
    async getApiKey(): Promise<string | null> {
      const path = getCredentialsPath(dir);
      if (!(await fileExists(path))) {
        return null;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(await readFile(path, "utf8"));
      } catch {
        return null;
      }
      const result = CredentialsSchema.safeParse(raw);
      return result.success ? result.data.apiKey : null;
    },
  };
};

// =============================================================================
// Default Credential Store (env var → file)
// =============================================================================

export const getCredentialStore = (
  env: Record<string, string | undefined> = process.env,
  fileStore: CredentialStore = createConfigCredentialStore(),
): CredentialStore => {
  return {
    async getApiKey(): Promise<string | null> {
      const envKey = env[ENV_API_KEY];
      if (envKey) return envKey;

      return await fileStore.getApiKey();
    },
  };
};

// =============================================================================
// Require Credentials
// =============================================================================

export const requireApiKey = async (
  out: { die(msg: string): never },
  store: CredentialStore = getCredentialStore(),
): Promise<string> => {
  const key = await store.getApiKey();
  if (!key) {
    return out.die(
      `API Key Required. Set ${ENV_API_KEY} or Write ${getCredentialsPath(getConfigDir())}`,
    );
  }
  return key;
};
