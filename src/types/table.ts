/**
 * Result table type definitions
 *
 * A ResultTable is the value that flows from a data source through the
 * pipeline stages into artifacts and save targets.
 */

export type ColumnType = "date" | "number" | "string";

/**
 * Single cell value. Missing values are always null, never undefined or "".
 */
export type Cell = string | number | null;

export type Row = Record<string, Cell>;

export interface ColumnSpec {
  name: string;
  type: ColumnType;
}

export interface ResultTable {
  columns: ColumnSpec[];
  rows: Row[];
}

/**
 * Descriptive statistics for one numeric column
 */
export type NumericSummary = {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  p50: number | null;
  p75: number | null;
  max: number | null;
};

export type TopValue = {
  value: string;
  count: number;
};

/**
 * Summary view of a table (job result --summary)
 */
export type TableSummary = {
  row_count: number;
  column_count: number;
  columns: string[];
  dtypes: Record<string, ColumnType>;
  null_counts: Record<string, number>;
  numeric_summary: Record<string, NumericSummary>;
  top_values: Record<string, TopValue[]>;
};
