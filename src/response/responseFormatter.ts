/**
 * Response formatter
 *
 * Every CLI outcome becomes exactly one envelope: SuccessEnvelope or
 * ErrorEnvelope. The data builders keep payload shapes in one place.
 */

import type {
  Envelope,
  ErrorEnvelope,
  JobRecord,
  JobResultView,
  PipelineMeta,
  ResponseMode,
  ResultTable,
  SaveResult,
  SourceKind,
  SuccessEnvelope,
} from "@/types";
import { QueryError, errorMessage } from "@/errors";
import { columnNames } from "@/table";

export function ok<T>(mode: ResponseMode, data: T): SuccessEnvelope<T> {
  return { status: "ok", mode, data };
}

/**
 * Error envelope for any thrown value. Non-QueryErrors are INTERNAL_ERROR.
 */
export function errorEnvelope(err: unknown): ErrorEnvelope {
  const error =
    err instanceof QueryError ? err : new QueryError("INTERNAL_ERROR", errorMessage(err));
  return {
    status: "error",
    error_code: error.code,
    message: error.message,
    hint: error.hint,
    ...(error.details !== undefined && { details: error.details }),
  };
}

export function serializeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope, null, 2);
}

export type TablePayload = {
  row_count: number;
  columns: string[];
  rows: ResultTable["rows"];
};

export function tablePayload(table: ResultTable): TablePayload {
  return { row_count: table.rows.length, columns: columnNames(table), rows: table.rows };
}

export type QueryData = TablePayload & {
  source: SourceKind;
  fetched_rows: number;
  pipeline: PipelineMeta | null;
  save: SaveResult | null;
  output_path?: string;
};

export function queryData(
  source: SourceKind,
  outcome: { table: ResultTable; fetched_rows: number; pipeline: PipelineMeta | null; save: SaveResult | null },
  outputPath?: string,
): QueryData {
  return {
    source,
    fetched_rows: outcome.fetched_rows,
    ...tablePayload(outcome.table),
    pipeline: outcome.pipeline,
    save: outcome.save,
    ...(outputPath !== undefined && { output_path: outputPath }),
  };
}

export type SubmitData = {
  job_id: string;
  status: JobRecord["status"];
  source: SourceKind;
  created_at: string;
  runner_pid: number | null;
  autorun: boolean;
};

export function submitData(job: JobRecord, autorun: boolean, runnerPid: number | null): SubmitData {
  return {
    job_id: job.job_id,
    status: job.status,
    source: job.source,
    created_at: job.created_at,
    runner_pid: runnerPid,
    autorun,
  };
}

export function cancelData(job: JobRecord, alreadyCanceled: boolean) {
  return { job_id: job.job_id, status: job.status, already_canceled: alreadyCanceled };
}

export function jobResultData(view: JobResultView, outputPath?: string) {
  if (view.kind === "summary") {
    return { job_id: view.job_id, summary: view.summary };
  }
  return {
    job_id: view.job_id,
    total_rows: view.total_rows,
    ...tablePayload(view.table),
    pipeline: view.pipeline,
    ...(outputPath !== undefined && { output_path: outputPath }),
  };
}

export type JobListItem = Pick<
  JobRecord,
  "job_id" | "status" | "source" | "created_at" | "finished_at" | "row_count"
>;

export function jobListData(jobs: JobRecord[]): { count: number; jobs: JobListItem[] } {
  return {
    count: jobs.length,
    jobs: jobs.map((job) => ({
      job_id: job.job_id,
      status: job.status,
      source: job.source,
      created_at: job.created_at,
      finished_at: job.finished_at,
      row_count: job.row_count,
    })),
  };
}
