/**
 * Job type definitions
 *
 * Types for job records, job logs and job result views.
 */

import type { LogLevel } from "./logger";
import type { QueryDescriptor, SourceKind } from "./params";
import type { PipelineMeta, PipelineSpec } from "./pipeline";
import type { SaveResult } from "./save";
import type { ResultTable, TableSummary } from "./table";

export type JobStatus = "queued" | "running" | "canceled" | "succeeded" | "failed";

export type JobError = {
  /** Error class name (QueryError, HttpError, ...) */
  type: string;
  code?: string;
  message: string;
};

/**
 * Job record, stored whole in jobs.record_json
 */
export type JobRecord = {
  job_id: string;
  status: JobStatus;
  source: SourceKind;
  params_path: string | null;
  params: QueryDescriptor;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  finished_at: string | null;
  canceled_at: string | null;
  runner_pid: number | null;
  row_count: number | null;
  artifact_path: string | null;
  error: JobError | null;
  pipeline: PipelineMeta | null;
  save: SaveResult | null;
};

export type JobLogEntry = {
  job_id: string;
  logged_at: string;
  level: LogLevel;
  message: string;
  meta: Record<string, unknown> | null;
};

export type SubmitOptions = {
  paramsPath?: string | null;
};

export type CancelResult = {
  job: JobRecord;
  already_canceled: boolean;
};

export type ResultRequest = {
  head?: number;
  summary?: boolean;
  pipeline?: PipelineSpec;
};

export type JobRowsView = {
  kind: "rows";
  job_id: string;
  table: ResultTable;
  /** Row count of the stored artifact */
  total_rows: number;
  pipeline: PipelineMeta | null;
};

export type JobSummaryView = {
  kind: "summary";
  job_id: string;
  summary: TableSummary;
};

export type JobResultView = JobRowsView | JobSummaryView;

/**
 * Outcome data recorded when a job succeeds
 */
export type JobCompletion = {
  table: ResultTable;
  pipeline: PipelineMeta | null;
  save: SaveResult | null;
};
