/**
 * JobManager: durable job lifecycle
 *
 * queued -> running -> succeeded | failed, and queued | running -> canceled.
 * Terminal states never change. Every transition is a whole-record replace
 * inside one immediate transaction (see mutateJob).
 */

import type {
  CancelResult,
  JobCompletion,
  JobError,
  JobLogEntry,
  JobRecord,
  JobResultView,
  JobStatus,
  QueryDescriptor,
  ResultRequest,
  SubmitOptions,
} from "@/types";
import {
  DEFAULT_JOB_LIST_LIMIT,
  JOB_ERROR_MESSAGE_MAX_LENGTH,
  JOB_ID_MAX_ATTEMPTS,
} from "@/constants";
import { findOldestQueuedJobId, getJob, insertJob, listJobLogs, listJobs, mutateJob } from "@/db";
import { QueryError, errorMessage } from "@/errors";
import { isEmptyPipelineSpec } from "@/params";
import { executePipeline } from "@/pipeline";
import { summarizeTable } from "@/table";
import * as logger from "@/logger";
import { isUniqueConstraintError } from "@/utils";
import { ArtifactStore } from "./artifactStore";
import { generateJobId } from "./jobId";

const TERMINAL_STATUSES: readonly JobStatus[] = ["canceled", "succeeded", "failed"];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type JobManagerOptions = {
  artifacts?: ArtifactStore;
  /** Clock (for tests) */
  now?: () => Date;
  /** Job ID factory (for tests) */
  newJobId?: (now: Date) => string;
};

/**
 * Convert any thrown value to the error stored on a failed job
 */
export function toJobError(err: unknown): JobError {
  const message = errorMessage(err).slice(0, JOB_ERROR_MESSAGE_MAX_LENGTH);
  if (err instanceof QueryError) {
    return { type: err.name, code: err.code, message };
  }
  return { type: err instanceof Error ? err.name : "Error", message };
}

export class JobManager {
  private readonly artifacts: ArtifactStore;
  private readonly now: () => Date;
  private readonly newJobId: (now: Date) => string;

  constructor(options: JobManagerOptions = {}) {
    this.artifacts = options.artifacts ?? new ArtifactStore();
    this.now = options.now ?? (() => new Date());
    this.newJobId = options.newJobId ?? ((now) => generateJobId(now));
  }

  private nowIso(): string {
    return this.now().toISOString();
  }

  private notFound(jobId: string): QueryError {
    return new QueryError("JOB_NOT_FOUND", `Job not found: ${jobId}`, {
      details: { job_id: jobId },
    });
  }

  /**
   * Create a queued job for a validated descriptor
   */
  submit(params: QueryDescriptor, options: SubmitOptions = {}): JobRecord {
    for (let attempt = 1; attempt <= JOB_ID_MAX_ATTEMPTS; attempt++) {
      const now = this.now();
      const timestamp = now.toISOString();
      const record: JobRecord = {
        job_id: this.newJobId(now),
        status: "queued",
        source: params.source,
        params_path: options.paramsPath ?? null,
        params,
        created_at: timestamp,
        updated_at: timestamp,
        started_at: null,
        finished_at: null,
        canceled_at: null,
        runner_pid: null,
        row_count: null,
        artifact_path: null,
        error: null,
        pipeline: null,
        save: null,
      };
      try {
        insertJob(record);
        logger.info("Job submitted", { job_id: record.job_id, source: record.source });
        return record;
      } catch (err) {
        if (!isUniqueConstraintError(err)) {
          throw err;
        }
        logger.debug("Job ID collision, retrying", { job_id: record.job_id, attempt });
      }
    }
    throw new QueryError("INTERNAL_ERROR", "Could not allocate a unique job ID");
  }

  /**
   * @throws QueryError JOB_NOT_FOUND
   */
  status(jobId: string): JobRecord {
    const record = getJob(jobId);
    if (!record) {
      throw this.notFound(jobId);
    }
    return record;
  }

  /**
   * Cancel a queued or running job. Canceling a canceled job succeeds with
   * already_canceled: true.
   *
   * @throws QueryError JOB_NOT_FOUND or JOB_NOT_CANCELABLE
   */
  cancel(jobId: string): CancelResult {
    const mutation = mutateJob(jobId, (current) => {
      if (current.status !== "queued" && current.status !== "running") {
        return null;
      }
      const timestamp = this.nowIso();
      return {
        ...current,
        status: "canceled",
        canceled_at: timestamp,
        finished_at: timestamp,
        updated_at: timestamp,
      };
    });
    if (!mutation) {
      throw this.notFound(jobId);
    }
    if (mutation.changed) {
      logger.info("Job canceled", { job_id: jobId, previous_status: mutation.before.status });
      return { job: mutation.after, already_canceled: false };
    }
    if (mutation.before.status === "canceled") {
      return { job: mutation.before, already_canceled: true };
    }
    throw new QueryError(
      "JOB_NOT_CANCELABLE",
      `Job ${jobId} is ${mutation.before.status} and cannot be canceled`,
      { details: { job_id: jobId, job_status: mutation.before.status } },
    );
  }

  /**
   * Read a succeeded job's result: full table, first `head` rows, a summary,
   * or the output of a pipeline run over the stored artifact
   *
   * @throws QueryError INVALID_ARGUMENT, JOB_NOT_FOUND, JOB_NOT_READY,
   * ARTIFACT_NOT_FOUND, RESULT_READ_FAILED or a pipeline stage error
   */
  result(jobId: string, request: ResultRequest = {}): JobResultView {
    const hasPipeline = request.pipeline !== undefined && !isEmptyPipelineSpec(request.pipeline);
    if (request.head !== undefined && request.summary) {
      throw new QueryError("INVALID_ARGUMENT", "head and summary cannot be used together");
    }
    if (request.summary && hasPipeline) {
      throw new QueryError("INVALID_ARGUMENT", "summary cannot be combined with pipeline options");
    }
    if (request.head !== undefined && (!Number.isInteger(request.head) || request.head < 0)) {
      throw new QueryError("INVALID_ARGUMENT", `head must be a non-negative integer: ${request.head}`);
    }

    const record = this.status(jobId);
    if (record.status !== "succeeded") {
      throw new QueryError("JOB_NOT_READY", `Job ${jobId} is ${record.status}; no result is available`, {
        details: { job_id: jobId, job_status: record.status },
      });
    }

    const table = this.artifacts.read(jobId, record.artifact_path);

    if (request.summary) {
      return { kind: "summary", job_id: jobId, summary: summarizeTable(table) };
    }

    if (request.pipeline && hasPipeline) {
      const spec =
        request.head !== undefined ? { ...request.pipeline, head: request.head } : request.pipeline;
      const { table: output, meta } = executePipeline(table, spec);
      return { kind: "rows", job_id: jobId, table: output, total_rows: table.rows.length, pipeline: meta };
    }

    const rows = request.head !== undefined ? table.rows.slice(0, request.head) : table.rows;
    return {
      kind: "rows",
      job_id: jobId,
      table: { columns: table.columns, rows },
      total_rows: table.rows.length,
      pipeline: null,
    };
  }

  /**
   * Most recent jobs first, at most max(1, limit)
   */
  list(limit: number = DEFAULT_JOB_LIST_LIMIT): JobRecord[] {
    return listJobs(Math.max(1, Math.floor(limit)));
  }

  logs(jobId: string): JobLogEntry[] {
    this.status(jobId);
    return listJobLogs(jobId);
  }

  /**
   * Claim a queued job for execution (queued -> running)
   *
   * @returns The running record, or null when the job is not queued
   * @throws QueryError JOB_NOT_FOUND
   */
  start(jobId: string, runnerPid: number = process.pid): JobRecord | null {
    const mutation = mutateJob(jobId, (current) => {
      if (current.status !== "queued") {
        return null;
      }
      const timestamp = this.nowIso();
      return {
        ...current,
        status: "running",
        started_at: timestamp,
        updated_at: timestamp,
        runner_pid: runnerPid,
      };
    });
    if (!mutation) {
      throw this.notFound(jobId);
    }
    return mutation.changed ? mutation.after : null;
  }

  /**
   * Claim the oldest queued job, if any
   */
  claimNext(runnerPid: number = process.pid): JobRecord | null {
    for (;;) {
      const jobId = findOldestQueuedJobId();
      if (!jobId) {
        return null;
      }
      const claimed = this.start(jobId, runnerPid);
      if (claimed) {
        return claimed;
      }
      // Another worker claimed or canceled it first; look again
    }
  }

  /**
   * True when the job has been canceled
   */
  isCanceled(jobId: string): boolean {
    return getJob(jobId)?.status === "canceled";
  }

  /**
   * Publish the artifact and mark a running job succeeded
   *
   * The artifact is written to temporary files first; they are renamed into
   * place only if the job is still running when the record is updated. When
   * the update fails after the rename, the published files are removed again.
   *
   * @returns The record after the call (unchanged when the job was no longer running)
   */
  complete(jobId: string, completion: JobCompletion): JobRecord {
    const temp = this.artifacts.writeTemp(jobId, completion.table);
    let publishing = false;
    let committed = false;
    try {
      const mutation = mutateJob(jobId, (current) => {
        if (current.status !== "running") {
          return null;
        }
        publishing = true;
        const artifactPath = this.artifacts.publish(temp, jobId);
        const timestamp = this.nowIso();
        return {
          ...current,
          status: "succeeded",
          finished_at: timestamp,
          updated_at: timestamp,
          row_count: completion.table.rows.length,
          artifact_path: artifactPath,
          pipeline: completion.pipeline,
          save: completion.save,
        };
      });
      committed = true;
      if (!mutation) {
        throw this.notFound(jobId);
      }
      if (mutation.changed) {
        logger.info("Job succeeded", { job_id: jobId, row_count: completion.table.rows.length });
      } else {
        logger.info("Job result discarded", { job_id: jobId, status: mutation.before.status });
      }
      return mutation.after;
    } finally {
      if (!committed && publishing) {
        this.artifacts.remove(jobId);
      }
      this.artifacts.discard(temp);
    }
  }

  /**
   * Mark a queued or running job failed (terminal jobs are left unchanged)
   */
  fail(jobId: string, err: unknown): JobRecord {
    const error = toJobError(err);
    const mutation = mutateJob(jobId, (current) => {
      if (isTerminal(current.status)) {
        return null;
      }
      const timestamp = this.nowIso();
      return {
        ...current,
        status: "failed",
        finished_at: timestamp,
        updated_at: timestamp,
        error,
      };
    });
    if (!mutation) {
      throw this.notFound(jobId);
    }
    if (mutation.changed) {
      logger.warn("Job failed", { job_id: jobId, code: error.code, message: error.message });
    }
    return mutation.after;
  }
}
