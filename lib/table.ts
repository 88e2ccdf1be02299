// =============================================================================
// Table - Column-Aligned Record Output
// =============================================================================

import table from "text-table";

/** One output line, already split into its fields. */
export type Row = readonly string[];

/** Gap between columns. */
export const COLUMN_GAP = "  ";

/**
 * Align rows into columns: each column but the last is padded to its
 * widest cell and joined with a two-space gap. Rows may have different field
 * counts; single-field rows come out unchanged.
 */
export const formatRows = (rows: readonly Row[]): string => {
  if (rows.length === 0) return "";
  return table(
    rows.map((r) => [...r]),
    { hsep: COLUMN_GAP },
  );
};
