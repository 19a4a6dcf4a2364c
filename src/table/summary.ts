/**
 * Table summary statistics (job result --summary)
 */

import type { NumericSummary, ResultTable, TableSummary, TopValue } from "@/types";
import { SUMMARY_NULL_LABEL, SUMMARY_TOP_VALUES_LIMIT } from "@/constants";
import { columnNames, columnValues } from "./resultTable";

/**
 * Quantile with linear interpolation between closest ranks
 *
 * @param sorted - Ascending values, non-empty
 */
export function quantile(sorted: number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

function numericSummary(values: number[]): NumericSummary {
  const count = values.length;
  if (count === 0) {
    return { count, mean: null, std: null, min: null, p25: null, p50: null, p75: null, max: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mean = values.reduce((acc, v) => acc + v, 0) / count;
  // Sample standard deviation (n - 1); undefined for a single value
  const std =
    count > 1
      ? Math.sqrt(values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (count - 1))
      : null;

  return {
    count,
    mean,
    std,
    min: sorted[0] ?? null,
    p25: quantile(sorted, 0.25),
    p50: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted[sorted.length - 1] ?? null,
  };
}

/**
 * Most frequent values, ties kept in first-seen order
 */
function topValues(values: (string | number | null)[]): TopValue[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    const label = value === null ? SUMMARY_NULL_LABEL : String(value);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, SUMMARY_TOP_VALUES_LIMIT);
}

export function summarizeTable(table: ResultTable): TableSummary {
  const summary: TableSummary = {
    row_count: table.rows.length,
    column_count: table.columns.length,
    columns: columnNames(table),
    dtypes: {},
    null_counts: {},
    numeric_summary: {},
    top_values: {},
  };

  for (const column of table.columns) {
    const values = columnValues(table, column.name);
    summary.dtypes[column.name] = column.type;
    summary.null_counts[column.name] = values.filter((v) => v === null).length;

    if (column.type === "number") {
      summary.numeric_summary[column.name] = numericSummary(
        values.filter((v): v is number => typeof v === "number"),
      );
    } else {
      summary.top_values[column.name] = topValues(values);
    }
  }

  return summary;
}
