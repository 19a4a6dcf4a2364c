/**
 * Save target seams
 */

import type { Row } from "@/types";
import type { SheetsWriter } from "@/types/clients/googleSheets";
import type { BigQueryTableRef } from "@/clients/google";

/**
 * Operations the BigQuery save target needs (implemented by BigQueryClient)
 */
export interface BigQueryWriter {
  truncateTable(ref: BigQueryTableRef): Promise<void>;
  insertRows(ref: BigQueryTableRef, rows: Row[]): Promise<void>;
}

/**
 * Factories for remote save targets, injected so tests can use fakes
 */
export interface SaveContext {
  sheets(spreadsheetId: string): SheetsWriter;
  bigQuery(): BigQueryWriter;
}
