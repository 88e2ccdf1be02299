// =============================================================================
// Sorting — Byte-Wise Name Order
// =============================================================================

/** Code-unit comparison; matches byte order for ASCII names. */
export const compareStrings = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * A sorted copy ordered by `name`. Array#sort is stable, so equal names keep
 * their input order.
 */
export const sortByName = <T extends { name: string }>(items: readonly T[]): T[] =>
  [...items].sort((a, b) => compareStrings(a.name, b.name));
