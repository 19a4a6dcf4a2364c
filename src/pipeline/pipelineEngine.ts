/**
 * Pipeline engine
 *
 * Runs the configured stages of a PipelineSpec in the fixed order
 * transform -> where -> group_aggregate -> sort -> columns -> head.
 * Each stage returns a new table; the input table is never modified.
 */

import type {
  PipelineMeta,
  PipelineOptions,
  PipelineSpec,
  PipelineStage,
  ResultTable,
} from "@/types";
import { PIPELINE_STAGE_ORDER } from "@/constants";
import { PipelineStageError, QueryError, errorMessage } from "@/errors";
import * as logger from "@/logger";
import { hasText } from "@/utils";
import { applyColumns, applyHead } from "./columns";
import { applyGroupAggregate } from "./groupAggregate";
import { applySort } from "./sort";
import { applyTransforms, parseTransforms } from "./transform";
import { applyWhere } from "./where";

export type PipelineResult = {
  table: ResultTable;
  meta: PipelineMeta;
};

/**
 * Stages that a spec configures, in execution order
 */
export function configuredStages(spec: PipelineSpec): PipelineStage[] {
  return PIPELINE_STAGE_ORDER.filter((stage) => {
    switch (stage) {
      case "transform":
        return hasText(spec.transform);
      case "where":
        return hasText(spec.where);
      case "group_aggregate":
        return hasText(spec.group_by) && hasText(spec.aggregate);
      case "sort":
        return hasText(spec.sort);
      case "columns":
        return hasText(spec.columns);
      case "head":
        return spec.head !== undefined;
    }
  });
}

function runStage(stage: PipelineStage, table: ResultTable, spec: PipelineSpec): ResultTable {
  switch (stage) {
    case "transform":
      return applyTransforms(table, parseTransforms(spec.transform ?? ""));
    case "where":
      return applyWhere(table, spec.where ?? "");
    case "group_aggregate":
      return applyGroupAggregate(table, spec.group_by ?? "", spec.aggregate ?? "");
    case "sort":
      return applySort(table, spec.sort ?? "");
    case "columns":
      return applyColumns(table, spec.columns ?? "");
    case "head":
      return applyHead(table, spec.head ?? 0);
  }
}

/**
 * Apply a pipeline to a table
 *
 * `options.checkpoint` is called with the stage name before every stage;
 * whatever it throws propagates unchanged.
 *
 * @throws QueryError INVALID_ARGUMENT when only one of group_by/aggregate is set
 * @throws PipelineStageError when a stage fails
 */
export function executePipeline(
  table: ResultTable,
  spec: PipelineSpec,
  options: PipelineOptions = {},
): PipelineResult {
  if (hasText(spec.group_by) !== hasText(spec.aggregate)) {
    throw new QueryError("INVALID_ARGUMENT", "group_by and aggregate must be specified together");
  }

  const stages = configuredStages(spec);
  const completed: PipelineStage[] = [];
  let current = table;

  for (const stage of stages) {
    options.checkpoint?.(stage);
    try {
      current = runStage(stage, current, spec);
    } catch (err) {
      const source =
        err instanceof QueryError
          ? err
          : new QueryError("PIPELINE_FAILED", `Pipeline stage ${stage} failed: ${errorMessage(err)}`, {
              cause: err,
            });
      logger.debug("Pipeline stage failed", { stage, code: source.code });
      throw new PipelineStageError(source, stage, [...completed], current);
    }
    completed.push(stage);
  }

  return {
    table: current,
    meta: {
      input_rows: table.rows.length,
      output_rows: current.rows.length,
      stages: completed,
    },
  };
}
