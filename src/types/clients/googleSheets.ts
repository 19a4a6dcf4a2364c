/**
 * Google Sheets API type definitions
 *
 * These types represent the data shapes used by the Google Sheets client.
 * They are intentionally NOT exported from the global types barrel (@/types)
 * and should only be imported within src/clients/googleSheets/ and src/save/
 */

import type { AccessTokenProvider } from "./google";
import type { HttpRequestFn } from "./http";

/**
 * Google Sheets client configuration
 */
export type GoogleSheetsConfig = {
  /**
   * Target spreadsheet ID (required)
   */
  spreadsheetId: string;

  /**
   * Token source for authentication
   */
  auth: AccessTokenProvider;

  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;
};

/**
 * Cell value accepted by the values API
 */
export type SheetCellValue = string | number | boolean | null;

/**
 * Result type for read operations
 */
export type SheetReadResult = {
  range: string;
  values: SheetCellValue[][];
};

/**
 * Result type for write/update operations
 */
export type SheetWriteResult = {
  updatedRange: string;
  updatedRows: number;
  updatedColumns: number;
  updatedCells: number;
};

/**
 * Result type for append operations
 */
export type SheetAppendResult = {
  tableRange: string;
  updates: SheetWriteResult;
};

/**
 * Operations the sheets save target needs (implemented by GoogleSheetsClient,
 * replaced by an in-memory fake in tests)
 */
export interface SheetsWriter {
  readRange(range: string): Promise<SheetReadResult>;
  clearRange(range: string): Promise<void>;
  updateRange(values: SheetCellValue[][], range: string): Promise<SheetWriteResult>;
  appendRows(values: SheetCellValue[][], range: string): Promise<SheetAppendResult>;
}
