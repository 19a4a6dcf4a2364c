/**
 * CSV codec for result tables
 *
 * Writes UTF-8 with BOM (spreadsheet friendly). Reading maps "" to null.
 * Without declared columns, numeric text becomes a number and column types
 * are inferred; with them, only number columns parse numbers.
 */

import { readFileSync, writeFileSync, appendFileSync, existsSync, mkdirSync, statSync } from "fs";
import { dirname } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { Cell, ColumnSpec, ColumnType, ResultTable, Row } from "@/types";
import { columnNames, createTable } from "./resultTable";

const NUMERIC_TEXT_RE = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Convert CSV text to a cell value
 */
export function parseCell(text: string): Cell {
  if (text === "") {
    return null;
  }
  if (NUMERIC_TEXT_RE.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value)) {
      return value;
    }
  }
  return text;
}

/**
 * Convert CSV text to a cell of a declared column type
 */
export function parseTypedCell(text: string, type: ColumnType): Cell {
  if (type === "number") {
    return parseCell(text);
  }
  return text === "" ? null : text;
}

function formatCell(value: Cell): string {
  return value === null ? "" : String(value);
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

function sameNames(header: string[], columns: ColumnSpec[]): boolean {
  return header.length === columns.length && header.every((name, i) => columns[i]?.name === name);
}

/**
 * Parse CSV text (first record is the header) into a table
 *
 * @param columns - Declared columns; the header must list the same names in order
 * @throws Error when the header does not match the declared columns
 */
export function csvToTable(text: string, columns?: ColumnSpec[]): ResultTable {
  const records: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringMatrix(records) || records.length === 0) {
    return columns ? { columns: columns.map((c) => ({ ...c })), rows: [] } : createTable([], []);
  }

  const [header, ...body] = records;
  if (columns) {
    if (!sameNames(header, columns)) {
      throw new Error(
        `CSV header (${header.join(", ")}) does not match columns (${columns.map((c) => c.name).join(", ")})`,
      );
    }
    const rows: Row[] = body.map((record) => {
      const row: Row = {};
      columns.forEach((column, index) => {
        row[column.name] = parseTypedCell(record[index] ?? "", column.type);
      });
      return row;
    });
    return { columns: columns.map((c) => ({ ...c })), rows };
  }

  const rows: Row[] = body.map((record) => {
    const row: Row = {};
    header.forEach((name, index) => {
      row[name] = parseCell(record[index] ?? "");
    });
    return row;
  });
  return createTable(header, rows);
}

/**
 * Serialize a table to CSV text
 */
export function tableToCsv(
  table: ResultTable,
  options: { header?: boolean; bom?: boolean } = {},
): string {
  const names = columnNames(table);
  const records = table.rows.map((row) => names.map((name) => formatCell(row[name] ?? null)));
  const includeHeader = options.header ?? true;
  return stringify(includeHeader ? [names, ...records] : records, {
    bom: options.bom ?? true,
  });
}

export function readCsvFile(path: string, columns?: ColumnSpec[]): ResultTable {
  return csvToTable(readFileSync(path, "utf-8"), columns);
}

function ensureParentDir(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

/**
 * Write a table to a CSV file, replacing any existing file
 */
export function writeCsvFile(path: string, table: ResultTable): void {
  ensureParentDir(path);
  writeFileSync(path, tableToCsv(table), "utf-8");
}

/**
 * Append a table's rows to a CSV file. The header (and BOM) are written only
 * when the file is new or empty.
 */
export function appendCsvFile(path: string, table: ResultTable): void {
  ensureParentDir(path);
  const isNew = !existsSync(path) || statSync(path).size === 0;
  appendFileSync(path, tableToCsv(table, { header: isNew, bom: isNew }), "utf-8");
}
