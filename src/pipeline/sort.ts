/**
 * Sort stage
 */

import type { ResultTable, SortDirection, SortKey } from "@/types";
import { QueryError } from "@/errors";
import { hasColumn, withRows } from "@/table";
import { compareValues, splitList } from "./compare";

/**
 * Parse `col DESC,col2 ASC` (direction optional, default ASC, case-insensitive)
 *
 * @throws QueryError INVALID_SORT
 */
export function parseSort(expr: string): SortKey[] {
  const items = splitList(expr);
  if (items.length === 0) {
    throw new QueryError("INVALID_SORT", "Invalid sort expression: expression is empty");
  }
  return items.map((item) => {
    const parts = item.split(/\s+/);
    const last = parts[parts.length - 1]?.toUpperCase();
    let direction: SortDirection = "asc";
    let column = item;
    if (parts.length > 1 && (last === "ASC" || last === "DESC")) {
      direction = last === "DESC" ? "desc" : "asc";
      column = parts.slice(0, -1).join(" ");
    }
    return { column, direction };
  });
}

/**
 * Stable multi-key sort; nulls last in both directions
 *
 * @throws QueryError INVALID_SORT on an unknown column
 */
export function applySort(table: ResultTable, expr: string): ResultTable {
  const keys = parseSort(expr);
  const unknown = keys.map((k) => k.column).filter((name) => !hasColumn(table, name));
  if (unknown.length > 0) {
    throw new QueryError("INVALID_SORT", `Unknown sort column(s): ${unknown.join(", ")}`, {
      details: { columns: unknown },
    });
  }

  const indexed = table.rows.map((row, index) => ({ row, index }));
  indexed.sort((a, b) => {
    for (const key of keys) {
      const left = a.row[key.column] ?? null;
      const right = b.row[key.column] ?? null;
      if (left === null && right === null) continue;
      if (left === null) return 1;
      if (right === null) return -1;
      const order = compareValues(left, right);
      if (order !== 0) return key.direction === "desc" ? -order : order;
    }
    return a.index - b.index;
  });
  return withRows(
    table,
    indexed.map((entry) => entry.row),
  );
}
