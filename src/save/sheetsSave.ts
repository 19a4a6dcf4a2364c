/**
 * Google Sheets save target
 */

import type { Cell, ResultTable, SaveResult, SheetsSaveSpec } from "@/types";
import type { SheetCellValue, SheetsWriter } from "@/types/clients/googleSheets";
import { spreadsheetIdFromUrl } from "@/clients/googleSheets";
import * as logger from "@/logger";
import { mergeUpsertRows } from "./upsert";

/**
 * Quoted sheet name for A1 notation
 */
export function sheetRef(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

function toSheetValue(cell: Cell): SheetCellValue {
  return cell === null ? "" : cell;
}

function tableValues(table: ResultTable): { header: string[]; rows: SheetCellValue[][] } {
  const header = table.columns.map((c) => c.name);
  return {
    header,
    rows: table.rows.map((row) => header.map((name) => toSheetValue(row[name] ?? null))),
  };
}

export async function saveSheets(
  table: ResultTable,
  spec: SheetsSaveSpec,
  writerFor: (spreadsheetId: string) => SheetsWriter,
): Promise<SaveResult> {
  const writer = writerFor(spreadsheetIdFromUrl(spec.sheet_url));
  const sheet = sheetRef(spec.sheet_name);
  const anchor = `${sheet}!A1`;
  const { header, rows } = tableValues(table);

  switch (spec.mode) {
    case "overwrite":
      await writer.clearRange(sheet);
      await writer.updateRange([header, ...rows], anchor);
      break;
    case "append": {
      const firstRow = await writer.readRange(`${sheet}!1:1`);
      const empty = firstRow.values.length === 0;
      await writer.appendRows(empty ? [header, ...rows] : rows, anchor);
      break;
    }
    case "upsert": {
      const existing = await writer.readRange(sheet);
      const [existingHeader = [], ...existingRows] = existing.values;
      const merged = mergeUpsertRows(
        existingHeader.map((v) => (v === null ? "" : String(v))),
        existingRows,
        header,
        rows,
        spec.keys ?? [],
      );
      logger.debug("Sheets upsert merged", {
        updated: merged.updated,
        inserted: merged.inserted,
      });
      await writer.clearRange(sheet);
      await writer.updateRange([merged.header, ...merged.rows], anchor);
      break;
    }
  }

  return {
    target: "sheets",
    mode: spec.mode,
    destination: `${spec.sheet_url}#${spec.sheet_name}`,
    rows_written: table.rows.length,
  };
}
