/**
 * PipelineStageError: a pipeline stage failed
 *
 * Carries the stage name, the stages that completed before it and the table
 * as it entered the failed stage. The failed stage's partial effects are
 * never exposed.
 */

import type { PipelineStage, ResultTable } from "@/types";
import { QueryError } from "./queryError";

export class PipelineStageError extends QueryError {
  public readonly stage: PipelineStage;
  public readonly completedStages: PipelineStage[];
  public readonly tableBeforeStage: ResultTable;

  constructor(
    source: QueryError,
    stage: PipelineStage,
    completedStages: PipelineStage[],
    tableBeforeStage: ResultTable,
  ) {
    super(source.code, source.message, {
      hint: source.hint,
      details: {
        ...source.details,
        stage,
        completed_stages: completedStages,
        rows_before_stage: tableBeforeStage.rows.length,
        columns_before_stage: tableBeforeStage.columns.map((c) => c.name),
      },
      cause: source,
    });
    this.name = "PipelineStageError";
    this.stage = stage;
    this.completedStages = completedStages;
    this.tableBeforeStage = tableBeforeStage;
  }
}
