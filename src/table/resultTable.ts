/**
 * ResultTable helpers
 *
 * Tables are treated as immutable values: helpers return new tables and
 * never modify their input.
 */

import type { Cell, ColumnSpec, ColumnType, ResultTable, Row } from "@/types";

const DATE_VALUE_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Infer a column type from its values (nulls ignored)
 *
 * - every value a number -> number
 * - every value a YYYY-MM-DD string -> date
 * - otherwise (or no values) -> string
 */
export function inferColumnType(values: Cell[]): ColumnType {
  const present = values.filter((v): v is string | number => v !== null);
  if (present.length === 0) {
    return "string";
  }
  if (present.every((v) => typeof v === "number")) {
    return "number";
  }
  if (present.every((v) => typeof v === "string" && DATE_VALUE_RE.test(v))) {
    return "date";
  }
  return "string";
}

export function columnValues(table: ResultTable, name: string): Cell[] {
  return table.rows.map((row) => row[name] ?? null);
}

export function columnNames(table: ResultTable): string[] {
  return table.columns.map((c) => c.name);
}

export function hasColumn(table: ResultTable, name: string): boolean {
  return table.columns.some((c) => c.name === name);
}

export function getColumn(table: ResultTable, name: string): ColumnSpec | undefined {
  return table.columns.find((c) => c.name === name);
}

/**
 * Build a table from column names and rows, inferring every column type.
 * Missing cells are filled with null.
 */
export function createTable(names: string[], rows: Row[]): ResultTable {
  const normalized = rows.map((row) => {
    const out: Row = {};
    for (const name of names) {
      out[name] = row[name] ?? null;
    }
    return out;
  });
  return {
    columns: names.map((name) => ({
      name,
      type: inferColumnType(normalized.map((row) => row[name] ?? null)),
    })),
    rows: normalized,
  };
}

/**
 * Same columns, new rows (types kept)
 */
export function withRows(table: ResultTable, rows: Row[]): ResultTable {
  return { columns: table.columns.map((c) => ({ ...c })), rows };
}

/**
 * Re-infer the types of the named columns
 */
export function reinferColumns(table: ResultTable, names: string[]): ResultTable {
  return {
    columns: table.columns.map((c) =>
      names.includes(c.name)
        ? { name: c.name, type: inferColumnType(columnValues(table, c.name)) }
        : { ...c },
    ),
    rows: table.rows,
  };
}
