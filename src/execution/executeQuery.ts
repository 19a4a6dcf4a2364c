/**
 * Query execution
 *
 * fetch -> pipeline -> save for one validated descriptor. Shared by the
 * synchronous CLI path, the job runner and the batch runner.
 */

import type { DataSources } from "@/interfaces";
import type {
  Checkpoint,
  PipelineMeta,
  QueryDescriptor,
  ResultTable,
  SaveResult,
} from "@/types";
import { fetchTable } from "@/clients/google";
import { HttpError } from "@/clients/http";
import { JobCanceledError, QueryError, errorMessage } from "@/errors";
import { isEmptyPipelineSpec } from "@/params";
import { executePipeline } from "@/pipeline";
import { saveTable, type SaveContext } from "@/save";
import * as logger from "@/logger";

export type ExecutionContext = {
  dataSources: DataSources;
  saveContext: SaveContext;
};

export type ExecuteOptions = {
  /**
   * Called before each pipeline stage and before the save step
   */
  checkpoint?: Checkpoint;
};

export type QueryOutcome = {
  table: ResultTable;
  fetched_rows: number;
  pipeline: PipelineMeta | null;
  save: SaveResult | null;
};

async function fetchOrFail(descriptor: QueryDescriptor, sources: DataSources): Promise<ResultTable> {
  try {
    return await fetchTable(sources, descriptor);
  } catch (err) {
    if (err instanceof QueryError) {
      throw err;
    }
    if (err instanceof HttpError) {
      throw new QueryError(
        "QUERY_EXECUTION_FAILED",
        `${descriptor.source} query failed: ${err.apiMessage ?? err.message}`,
        { details: { source: descriptor.source, http_status: err.status }, cause: err },
      );
    }
    throw new QueryError(
      "QUERY_EXECUTION_FAILED",
      `${descriptor.source} query failed: ${errorMessage(err)}`,
      { details: { source: descriptor.source }, cause: err },
    );
  }
}

/**
 * Run a descriptor end to end
 *
 * @throws QueryError QUERY_EXECUTION_FAILED, NO_DATA_RETURNED, a pipeline
 * stage code, PIPELINE_FAILED or SAVE_FAILED
 * @throws JobCanceledError when the checkpoint reports cancellation
 */
export async function executeQuery(
  descriptor: QueryDescriptor,
  context: ExecutionContext,
  options: ExecuteOptions = {},
): Promise<QueryOutcome> {
  const fetched = await fetchOrFail(descriptor, context.dataSources);
  if (fetched.rows.length === 0) {
    throw new QueryError("NO_DATA_RETURNED", `${descriptor.source} query returned no rows`, {
      details: { source: descriptor.source },
    });
  }
  logger.info("Query fetched", { source: descriptor.source, rows: fetched.rows.length });

  let table = fetched;
  let pipeline: PipelineMeta | null = null;
  if (descriptor.pipeline && !isEmptyPipelineSpec(descriptor.pipeline)) {
    try {
      const result = executePipeline(fetched, descriptor.pipeline, {
        checkpoint: options.checkpoint,
      });
      table = result.table;
      pipeline = result.meta;
    } catch (err) {
      if (err instanceof QueryError || err instanceof JobCanceledError) {
        throw err;
      }
      throw new QueryError("PIPELINE_FAILED", `Pipeline failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    logger.info("Pipeline applied", { ...pipeline });
  }

  let save: SaveResult | null = null;
  if (descriptor.save) {
    options.checkpoint?.("save");
    save = await saveTable(table, descriptor.save, context.saveContext);
  }

  return { table, fetched_rows: fetched.rows.length, pipeline, save };
}
