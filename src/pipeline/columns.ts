/**
 * Columns (projection) and head stages
 */

import type { ResultTable, Row } from "@/types";
import { QueryError } from "@/errors";
import { getColumn } from "@/table";
import { splitList } from "./compare";

/**
 * Keep only the listed columns, in the listed order
 *
 * @throws QueryError INVALID_COLUMNS on an empty list, unknown or duplicate names
 */
export function applyColumns(table: ResultTable, expr: string): ResultTable {
  const names = splitList(expr);
  if (names.length === 0) {
    throw new QueryError("INVALID_COLUMNS", "Invalid columns expression: expression is empty");
  }

  const duplicates = [...new Set(names.filter((name, index) => names.indexOf(name) !== index))];
  if (duplicates.length > 0) {
    throw new QueryError("INVALID_COLUMNS", `Duplicate column(s): ${duplicates.join(", ")}`, {
      details: { columns: duplicates },
    });
  }

  const columns = names.map((name) => getColumn(table, name));
  const unknown = names.filter((_, i) => columns[i] === undefined);
  if (unknown.length > 0) {
    throw new QueryError("INVALID_COLUMNS", `Unknown column(s): ${unknown.join(", ")}`, {
      details: { columns: unknown, available: table.columns.map((c) => c.name) },
    });
  }

  return {
    columns: columns.flatMap((c) => (c ? [{ ...c }] : [])),
    rows: table.rows.map((row) => {
      const out: Row = {};
      for (const name of names) {
        out[name] = row[name] ?? null;
      }
      return out;
    }),
  };
}

/**
 * First `n` rows
 *
 * @throws QueryError INVALID_ARGUMENT when n is negative or not an integer
 */
export function applyHead(table: ResultTable, n: number): ResultTable {
  if (!Number.isInteger(n) || n < 0) {
    throw new QueryError("INVALID_ARGUMENT", `head must be a non-negative integer: ${n}`);
  }
  return { columns: table.columns.map((c) => ({ ...c })), rows: table.rows.slice(0, n) };
}
