// =============================================================================
// Strict Argument Validation — rejects unknown flags via out.die()
// =============================================================================

import minimist from "minimist";
import { createOutput } from "./output.ts";

export interface FlagSpec {
  string?: readonly string[];
  boolean?: readonly string[];
  alias?: Record<string, string | string[]>;
}

/** minimist with positionals kept as strings ("007" must not become 7). */
export const parseFlags = (
  argv: string[],
  opts: FlagSpec,
): minimist.ParsedArgs =>
  minimist(argv, {
    string: [...(opts.string ?? []), "_"],
    boolean: [...(opts.boolean ?? [])],
    alias: opts.alias,
  });

/** Positional arguments, always as strings. */
export const positionals = (args: minimist.ParsedArgs): string[] =>
  args._.map((a) => String(a));

/** A string flag's value, or undefined when absent or empty. */
export const stringFlag = (
  args: minimist.ParsedArgs,
  name: string,
): string | undefined => {
  const value: unknown = args[name];
  return typeof value === "string" && value !== "" ? value : undefined;
};

export const boolFlag = (args: minimist.ParsedArgs, name: string): boolean =>
  args[name] === true;

/** Render a flag the way the user typed it: `-l`, `--json`. */
const flagName = (key: string): string =>
  key.length === 1 ? `-${key}` : `--${key}`;

/** Flags in `args` that `opts` does not declare. */
export const unknownFlags = (
  args: minimist.ParsedArgs,
  opts: FlagSpec,
): string[] => {
  const known = new Set<string>(["_", "--"]);
  for (const k of opts.string ?? []) known.add(k);
  for (const k of opts.boolean ?? []) known.add(k);
  for (const [k, v] of Object.entries(opts.alias ?? {})) {
    known.add(k);
    for (const a of Array.isArray(v) ? v : [v]) known.add(a);
  }

  return Object.keys(args)
    .filter((k) => !known.has(k))
    .map(flagName);
};

/**
 * Validates parsed args against the declared flag set.
 * Dies with a Title Case error if unknown flags are found.
 * Pass the same options object you gave to parseFlags.
 */
export const checkArgs = (
  args: minimist.ParsedArgs,
  opts: FlagSpec,
  command: string,
): void => {
  const bad = unknownFlags(args, opts);

  if (bad.length > 0) {
    const out = createOutput<Record<string, unknown>>(boolFlag(args, "json"));
    out.die(
      `Unknown Flag(s): ${bad.join(", ")}. Run '${command} --help' for Usage.`,
    );
  }
};
