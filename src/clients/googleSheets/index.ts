/**
 * Google Sheets client public API
 */

export { GoogleSheetsClient, GoogleSheetsError, spreadsheetIdFromUrl } from "./googleSheetsClient";
export type {
  GoogleSheetsConfig,
  SheetCellValue,
  SheetReadResult,
  SheetWriteResult,
  SheetAppendResult,
  SheetsWriter,
} from "@/types/clients/googleSheets";
