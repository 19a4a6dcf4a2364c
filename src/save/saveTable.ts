/**
 * Save dispatch
 */

import type { HttpRequestFn, ResultTable, SaveResult, SaveSpec } from "@/types";
import type { AccessTokenProvider } from "@/types/clients/google";
import { BigQueryClient, ServiceAccountAuth } from "@/clients/google";
import { GoogleSheetsClient } from "@/clients/googleSheets";
import { QueryError, errorMessage } from "@/errors";
import * as logger from "@/logger";
import { saveBigQuery } from "./bigQuerySave";
import { saveCsv } from "./csvSave";
import { saveSheets } from "./sheetsSave";
import type { SaveContext } from "./types";

export type GoogleSaveContextConfig = {
  auth?: AccessTokenProvider;
  httpRequest?: HttpRequestFn;
};

/**
 * Production save context backed by the Google API clients
 */
export function createGoogleSaveContext(config: GoogleSaveContextConfig = {}): SaveContext {
  const auth = config.auth ?? new ServiceAccountAuth({ httpRequest: config.httpRequest });
  return {
    sheets: (spreadsheetId) =>
      new GoogleSheetsClient({ spreadsheetId, auth, httpRequest: config.httpRequest }),
    bigQuery: () => new BigQueryClient({ auth, httpRequest: config.httpRequest }),
  };
}

function dispatch(table: ResultTable, spec: SaveSpec, context: SaveContext): Promise<SaveResult> {
  switch (spec.to) {
    case "csv":
      return Promise.resolve(saveCsv(table, spec));
    case "sheets":
      return saveSheets(table, spec, (id) => context.sheets(id));
    case "bigquery":
      return saveBigQuery(table, spec, context.bigQuery());
  }
}

/**
 * Write a table to the target a SaveSpec names
 *
 * @throws QueryError SAVE_FAILED
 */
export async function saveTable(
  table: ResultTable,
  spec: SaveSpec,
  context: SaveContext,
): Promise<SaveResult> {
  try {
    const result = await dispatch(table, spec, context);
    logger.info("Result saved", { ...result });
    return result;
  } catch (err) {
    if (err instanceof QueryError && err.code === "SAVE_FAILED") {
      throw err;
    }
    throw new QueryError("SAVE_FAILED", `Save to ${spec.to} failed: ${errorMessage(err)}`, {
      details: { target: spec.to, mode: spec.mode },
      cause: err,
    });
  }
}
