// =============================================================================
// CLI Utilities - Colors, Status Output, Config Paths
// =============================================================================

import { access } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

// ANSI Color Codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";

// =============================================================================
// Text Formatting
// =============================================================================

export const bold = (text: string): string => `${BOLD}${text}${RESET}`;
export const dim = (text: string): string => `${DIM}${text}${RESET}`;
export const red = (text: string): string => `${RED}${text}${RESET}`;

// =============================================================================
// Status Output
// =============================================================================
//
// Listings own standard output; everything else goes to standard error so
// `hk ls | cut -f1` keeps working while fetches fail.
//

export const statusErr = (message: string): void => {
  console.error(`${red("✗")} ${message}`);
};

export const statusDebug = (message: string): void => {
  console.error(dim(`» ${message}`));
};

// =============================================================================
// File Utilities
// =============================================================================

export const fileExists = async (path: string): Promise<boolean> => {
  return access(path)
    .then(() => true)
    .catch(() => false);
};

// =============================================================================
// Config Directory
// =============================================================================

export const getConfigDir = (): string => {
  const home = process.env.HOME || process.env.USERPROFILE || homedir();
  return join(home, ".config", "hk");
};
