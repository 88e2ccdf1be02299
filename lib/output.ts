// =============================================================================
// Output - Unified Output Handling for CLI Commands
// =============================================================================

import { statusDebug, statusErr } from "./cli.ts";

/** Thrown by `die()` once the message is out; `main` maps it to exit 1. */
export const EXIT_SENTINEL = "exit";

// =============================================================================
// Output Class
// =============================================================================

export class Output<T extends Record<string, unknown>> {
  private data: T | null = null;
  private readonly jsonMode: boolean;
  private readonly debugMode: boolean;

  constructor(jsonMode: boolean, debugMode = false) {
    this.jsonMode = jsonMode;
    this.debugMode = debugMode;
  }

  // ===========================================================================
  // Result Data
  // ===========================================================================

  // Set success result — printed as { ok: true, ...data }
  done(data: T): this {
    this.data = data;
    return this;
  }

  print(): void {
    if (this.jsonMode && this.data) {
      console.log(JSON.stringify({ ok: true, ...this.data }, null, 2));
    }
  }

  // ===========================================================================
  // Human-Mode Output (no-op in JSON mode)
  // ===========================================================================

  err(text: string): this {
    if (!this.jsonMode) statusErr(text);
    return this;
  }

  text(text: string): this {
    if (!this.jsonMode) console.log(text);
    return this;
  }

  // Request traces stay on stderr, so they show in JSON mode too
  debug(text: string): this {
    if (this.debugMode) statusDebug(text);
    return this;
  }

  // ===========================================================================
  // Terminal Output
  // ===========================================================================

  die(message: string): never {
    if (this.jsonMode) {
      console.log(JSON.stringify({ ok: false, error: message }, null, 2));
    } else {
      statusErr(message);
    }
    throw new Error(EXIT_SENTINEL);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createOutput<T extends Record<string, unknown>>(
  jsonMode: boolean,
  debugMode = false,
): Output<T> {
  return new Output(jsonMode, debugMode);
}
