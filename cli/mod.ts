// =============================================================================
// Command Registry & Dispatcher
// =============================================================================

import { bold } from "../lib/cli.ts";
import { CLI_NAME, CLI_VERSION } from "../util/constants.ts";

// =============================================================================
// Types
// =============================================================================

export interface Command {
  name: string;
  description: string;
  usage: string;
  run: (argv: string[]) => Promise<void>;
}

// =============================================================================
// Registry
// =============================================================================

const commands = new Map<string, Command>();

/** Commands call this at import time; `main.ts` imports them for effect. */
export const registerCommand = (command: Command): void => {
  commands.set(command.name, command);
};

export const getCommand = (name: string): Command | undefined =>
  commands.get(name);

export const listCommands = (): Command[] =>
  [...commands.values()].sort((a, b) => (a.name < b.name ? -1 : 1));

// =============================================================================
// Help
// =============================================================================

export const helpText = (): string => {
  const width = Math.max(0, ...listCommands().map((c) => c.name.length));
  const lines = listCommands().map(
    (c) => `  ${c.name.padEnd(width)}   ${c.description}`,
  );
  return `
${bold(CLI_NAME)} - Platform API Client

${bold("USAGE")}
  ${CLI_NAME} <command> [options]

${bold("COMMANDS")}
${lines.join("\n")}

Run '${CLI_NAME} <command> --help' for details.
`;
};

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Run the command named by `argv[0]`. Unknown commands print help and throw
 * so the process exits non-zero.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const [name, ...rest] = argv;

  if (name === "--version" || name === "version") {
    console.log(`${CLI_NAME} ${CLI_VERSION}`);
    return;
  }

  if (name === undefined || name === "--help" || name === "-h" || name === "help") {
    console.log(helpText());
    return;
  }

  const command = getCommand(name);
  if (!command) {
    console.log(helpText());
    throw new Error(`Unknown Command: '${name}'`);
  }

  await command.run(rest);
};
