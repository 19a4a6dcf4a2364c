/**
 * Pipeline constants
 */

import type { AggregateFunction, ColumnType, PipelineStage, TransformFunction } from "@/types";

/**
 * Fixed stage order. Field order in a PipelineSpec never changes it.
 */
export const PIPELINE_STAGE_ORDER: readonly PipelineStage[] = [
  "transform",
  "where",
  "group_aggregate",
  "sort",
  "columns",
  "head",
];

export const TRANSFORM_FUNCTIONS: readonly TransformFunction[] = [
  "date_format",
  "url_decode",
  "path_only",
  "strip_qs",
];

/**
 * Transform functions that accept `:args`
 */
export const TRANSFORM_FUNCTIONS_WITH_ARGS: readonly TransformFunction[] = ["strip_qs"];

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = [
  "sum",
  "mean",
  "median",
  "min",
  "max",
  "count",
];

/**
 * Aggregates that require a number column
 */
export const NUMERIC_AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = [
  "sum",
  "mean",
  "median",
];

/**
 * Number of most frequent values reported per non-numeric column in a summary
 */
export const SUMMARY_TOP_VALUES_LIMIT = 5;

/**
 * Label for null values in summary top values
 */
export const SUMMARY_NULL_LABEL = "<NA>";

export const COLUMN_TYPES: readonly ColumnType[] = ["date", "number", "string"];
