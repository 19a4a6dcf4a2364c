/**
 * BigQuery save target
 */

import type { BigQuerySaveSpec, ResultTable, SaveResult } from "@/types";
import { BIGQUERY_INSERT_BATCH_SIZE } from "@/constants/clients/google";
import type { BigQueryWriter } from "./types";

export async function saveBigQuery(
  table: ResultTable,
  spec: BigQuerySaveSpec,
  writer: BigQueryWriter,
): Promise<SaveResult> {
  const ref = { projectId: spec.project_id, dataset: spec.dataset, table: spec.table };

  if (spec.mode === "overwrite") {
    await writer.truncateTable(ref);
  }
  for (let start = 0; start < table.rows.length; start += BIGQUERY_INSERT_BATCH_SIZE) {
    await writer.insertRows(ref, table.rows.slice(start, start + BIGQUERY_INSERT_BATCH_SIZE));
  }

  return {
    target: "bigquery",
    mode: spec.mode,
    destination: `${spec.project_id}.${spec.dataset}.${spec.table}`,
    rows_written: table.rows.length,
  };
}
