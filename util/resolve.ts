// =============================================================================
// Resolve — Which App a Command Targets
// =============================================================================

import { type CommandRunner, runCommand } from "../lib/command.ts";
import { ENV_APP, GIT_REMOTE } from "./constants.ts";

const REMOTE_URL =
  /^(?:https:\/\/git\.heroku\.com\/|git@heroku\.com:|ssh:\/\/git@heroku\.com\/)([a-z0-9][a-z0-9-]*?)(?:\.git)?\/?$/;

/** The app a platform git remote URL points at, or null. */
export const parseRemoteUrl = (url: string): string | null => {
  const match = url.trim().match(REMOTE_URL);
  return match ? match[1] : null;
};

export interface ResolveAppOptions {
  flag?: string;
  env?: Record<string, string | undefined>;
  run?: CommandRunner;
}

/**
 * The target app, in order: the -a flag, $HKAPP, then the "heroku" git
 * remote of the current directory. Null when none of them names one.
 */
export const resolveApp = async (
  opts: ResolveAppOptions,
): Promise<string | null> => {
  if (opts.flag) return opts.flag;

  const fromEnv = (opts.env ?? process.env)[ENV_APP];
  if (fromEnv) return fromEnv;

  const run = opts.run ?? runCommand;
  const result = await run(["git", "config", `remote.${GIT_REMOTE}.url`]);
  return result.ok ? parseRemoteUrl(result.stdout) : null;
};
