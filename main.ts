#!/usr/bin/env -S node --import tsx
// =============================================================================
// hk CLI - Platform API Client
// =============================================================================
//
// Usage:
//   npx tsx main.ts <command> [options]
//   hk <command> [options]
//
// Commands:
//   ls         List apps, releases, dynos and add-ons
//
// Examples:
//   hk ls
//   hk ls -l -f
//   hk ls -l -a myapp releases v3
//   hk ls -a myapp addons REDIS_URL
//
// =============================================================================

import { runCli } from "./cli/mod.ts";
import { statusErr } from "./lib/cli.ts";
import { EXIT_SENTINEL } from "./lib/output.ts";

// Import commands to register them
import "./cli/commands/ls/index.ts";

// =============================================================================
// Main
// =============================================================================

const main = async (): Promise<void> => {
  process.on("SIGINT", () => process.exit(130));
  process.on("SIGTERM", () => process.exit(143));

  await runCli(process.argv.slice(2));
};

// =============================================================================
// Entry
// =============================================================================

main().catch((error: unknown) => {
  if (!(error instanceof Error) || error.message !== EXIT_SENTINEL) {
    statusErr(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
