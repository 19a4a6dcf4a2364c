/**
 * Key-based row merge for sheet upserts
 */

import type { SheetCellValue } from "@/types/clients/googleSheets";

export type UpsertMerge = {
  header: string[];
  rows: SheetCellValue[][];
  updated: number;
  inserted: number;
};

function keyOf(values: SheetCellValue[], indexes: number[]): string {
  return JSON.stringify(indexes.map((i) => {
    const value = values[i];
    return value === null || value === undefined ? "" : String(value);
  }));
}

/**
 * Merge incoming rows into existing sheet rows by `keys`
 *
 * - the header is the existing header plus any new columns, appended
 * - a row whose key matches an existing row replaces that row's values for
 *   the incoming columns; other columns keep their values
 * - rows with new keys are appended in incoming order
 * - key values are compared as text, so 1 and "1" match
 *
 * @throws Error when a key column is missing from the incoming header
 */
export function mergeUpsertRows(
  existingHeader: string[],
  existingRows: SheetCellValue[][],
  incomingHeader: string[],
  incomingRows: SheetCellValue[][],
  keys: string[],
): UpsertMerge {
  const missing = keys.filter((k) => !incomingHeader.includes(k));
  if (missing.length > 0) {
    throw new Error(`Upsert key column(s) not in result: ${missing.join(", ")}`);
  }

  const header = [...existingHeader];
  for (const name of incomingHeader) {
    if (!header.includes(name)) header.push(name);
  }

  const width = header.length;
  const pad = (row: SheetCellValue[]): SheetCellValue[] =>
    Array.from({ length: width }, (_, i) => row[i] ?? "");

  const rows = existingRows.map(pad);
  const keyIndexes = keys.map((k) => header.indexOf(k));
  const positions = new Map<string, number>();
  rows.forEach((row, i) => {
    const key = keyOf(row, keyIndexes);
    if (!positions.has(key)) positions.set(key, i);
  });

  const incomingIndexes = incomingHeader.map((name) => header.indexOf(name));
  let updated = 0;
  let inserted = 0;

  for (const incoming of incomingRows) {
    const aligned: SheetCellValue[] = Array.from({ length: width }, () => "");
    incomingIndexes.forEach((target, source) => {
      aligned[target] = incoming[source] ?? "";
    });
    const key = keyOf(aligned, keyIndexes);
    const position = positions.get(key);
    const existing = position === undefined ? undefined : rows[position];
    if (position !== undefined && existing) {
      incomingIndexes.forEach((target) => {
        existing[target] = aligned[target] ?? "";
      });
      updated += 1;
    } else {
      positions.set(key, rows.length);
      rows.push(aligned);
      inserted += 1;
    }
  }

  return { header, rows, updated, inserted };
}
