/**
 * Error taxonomy
 *
 * Stable error codes surfaced in error envelopes, job records and batch items.
 */

export type ErrorCode =
  | "PARAMS_VALIDATION_FAILED"
  | "INVALID_JSON"
  | "PARAMS_FILE_NOT_FOUND"
  | "INVALID_SITE_ALIAS"
  | "INVALID_ARGUMENT"
  | "INVALID_TRANSFORM"
  | "INVALID_WHERE"
  | "INVALID_SORT"
  | "INVALID_COLUMNS"
  | "INVALID_AGGREGATE"
  | "JOB_NOT_FOUND"
  | "JOB_NOT_READY"
  | "JOB_NOT_CANCELABLE"
  | "QUERY_EXECUTION_FAILED"
  | "NO_DATA_RETURNED"
  | "PIPELINE_FAILED"
  | "SAVE_FAILED"
  | "ARTIFACT_NOT_FOUND"
  | "RESULT_READ_FAILED"
  | "BATCH_FAILED"
  | "INTERNAL_ERROR";

export type QueryErrorOptions = {
  hint?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
};
