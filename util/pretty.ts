// =============================================================================
// Pretty Printing — Times, Durations, Commands
// =============================================================================

const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/** Older than this, a timestamp shows its year instead of its clock time. */
const RECENT = 12 * 30 * DAY;

const pad2 = (n: number): string => String(n).padStart(2, "0");

// =============================================================================
// Time
// =============================================================================

/**
 * `Jun 12 18:28` for recent times, `Jun 12  2012` for older ones, in local
 * time with the day space-padded. `null` renders as an empty cell.
 */
export const prettyTime = (t: Date | null, now: Date): string => {
  if (t === null) return "";
  const day = `${MONTHS[t.getMonth()]} ${String(t.getDate()).padStart(2)}`;
  if (now.getTime() - t.getTime() < RECENT) {
    return `${day} ${pad2(t.getHours())}:${pad2(t.getMinutes())}`;
  }
  return `${day}  ${t.getFullYear()}`;
};

// =============================================================================
// Duration
// =============================================================================

const UNITS: ReadonlyArray<readonly [number, string]> = [
  [DAY, "d"],
  [HOUR, "h"],
  [MINUTE, "m"],
];

const roundTo = (ms: number, unit: number): number =>
  Math.floor((ms + unit / 2 - 1) / unit);

/**
 * Largest unit the duration exceeds twice of, rounded, e.g. ` 3d`, `15h`,
 * ` 1s`. Anything up to two minutes is counted in seconds.
 */
export const prettyDuration = (ms: number): string => {
  const [unit, code] = UNITS.find(([u]) => ms > 2 * u) ?? [SECOND, "s"];
  return `${String(roundTo(ms, unit)).padStart(2)}${code}`;
};

// =============================================================================
// Commands
// =============================================================================

const PLAIN = /^[0-9A-Za-z_-]*$/;

/** JSON-quote a command unless it is a single plain word. */
export const maybeQuote = (s: string): string =>
  PLAIN.test(s) ? s : JSON.stringify(s);
