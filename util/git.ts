// =============================================================================
// Git — Describe Release Commits with Local Tags
// =============================================================================

import { type CommandRunner, runCommand } from "../lib/command.ts";
import type { Release } from "./heroku-transforms.ts";

const DEPLOY_PREFIX = "Deploy ";
const SHORT_SHA_LENGTH = 7;
const FULL_SHA = /^[0-9a-f]{40}$/;

/** "Deploy 3ae20c2": the description the platform writes for git pushes. */
export const isDeploy = (description: string): boolean =>
  description.length === DEPLOY_PREFIX.length + SHORT_SHA_LENGTH &&
  description.startsWith(DEPLOY_PREFIX);

/** The commit a release was built from, falling back to its deploy message. */
export const releaseCommit = (r: Release): string =>
  isDeploy(r.description) ? r.description.slice(DEPLOY_PREFIX.length) : r.commit;

/** Full SHAs shrink to 7 characters; tags and short SHAs pass through. */
export const gitRef = (commit: string): string =>
  FULL_SHA.test(commit) ? commit.slice(0, SHORT_SHA_LENGTH) : commit;

/**
 * Parse `git name-rev` output ("<commit> <name>" per line) into a map,
 * dropping the "tags/" prefix and "^0" suffix name-rev adds.
 */
export const parseNameRev = (stdout: string): Map<string, string> => {
  const names = new Map<string, string>();
  for (const line of stdout.split("\n")) {
    const [commit, name] = line.trim().split(/\s+/, 2);
    if (!commit || !name) continue;
    let ref = name;
    if (ref.startsWith("tags/")) ref = ref.slice("tags/".length);
    if (ref.endsWith("^0")) ref = ref.slice(0, -2);
    names.set(commit, ref);
  }
  return names;
};

/**
 * Describe release commits against the tags of the current directory's
 * repository.
 * Returns one display ref per release, in order. Outside a git repository
 * (or without git) the commits are returned shortened but undescribed.
 */
export const describeCommits = async (
  releases: readonly Release[],
  run: CommandRunner = runCommand,
): Promise<string[]> => {
  const commits = releases.map(releaseCommit);
  const known = commits.filter((c) => c !== "");
  if (known.length === 0) return commits.map(gitRef);

  const result = await run([
    "git",
    "name-rev",
    "--tags",
    "--no-undefined",
    "--always",
    "--",
    ...known,
  ]);
  const names = result.ok ? parseNameRev(result.stdout) : new Map<string, string>();

  return commits.map((c) => gitRef(names.get(c) ?? c));
};
