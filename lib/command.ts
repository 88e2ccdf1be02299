// =============================================================================
// Shell Command Helpers
// =============================================================================

import { spawn } from "node:child_process";

// =============================================================================
// Command Result
// =============================================================================

export class CmdResult {
  readonly ok: boolean;

  constructor(
    readonly code: number,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    this.ok = code === 0;
  }
}

/** Signature of `runCommand`, so callers can take a stand-in. */
export type CommandRunner = (args: string[]) => Promise<CmdResult>;

// =============================================================================
// Run Command
// =============================================================================

/**
 * Run a command and capture its output. Never rejects: a missing binary
 * resolves with code -1 and the spawn error as stderr.
 */
export const runCommand: CommandRunner = (args) => {
  const [cmd, ...cmdArgs] = args;

  return new Promise((resolve) => {
    const child = spawn(cmd, cmdArgs, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: string[] = [];
    const stderr: string[] = [];

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => stdout.push(chunk));
    child.stderr.on("data", (chunk: string) => stderr.push(chunk));

    child.on("error", (error) => {
      resolve(new CmdResult(-1, "", error.message));
    });

    child.on("close", (code) => {
      resolve(new CmdResult(code ?? 1, stdout.join(""), stderr.join("")));
    });
  });
};
