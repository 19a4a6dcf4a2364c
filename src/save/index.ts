export { saveTable, createGoogleSaveContext, type GoogleSaveContextConfig } from "./saveTable";
export { mergeUpsertRows, type UpsertMerge } from "./upsert";
export { sheetRef } from "./sheetsSave";
export type { SaveContext, BigQueryWriter } from "./types";
