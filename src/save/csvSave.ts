/**
 * CSV save target
 */

import type { CsvSaveSpec, ResultTable, SaveResult } from "@/types";
import { appendCsvFile, writeCsvFile } from "@/table";

export function saveCsv(table: ResultTable, spec: CsvSaveSpec): SaveResult {
  if (spec.mode === "append") {
    appendCsvFile(spec.path, table);
  } else {
    writeCsvFile(spec.path, table);
  }
  return {
    target: "csv",
    mode: spec.mode,
    destination: spec.path,
    rows_written: table.rows.length,
  };
}
