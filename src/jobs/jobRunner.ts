/**
 * Job runner: executes one claimed job
 *
 * Cancellation is cooperative: the checkpoint re-reads the record before each
 * pipeline stage, before the save step and before publishing the artifact.
 */

import type { JobRecord } from "@/types";
import { JobCanceledError, errorMessage } from "@/errors";
import { executeQuery, type ExecutionContext } from "@/execution";
import { createJobLogger } from "./jobLogger";
import type { JobManager } from "./jobManager";

export type JobRunnerDeps = {
  manager: JobManager;
  context: ExecutionContext;
};

/**
 * Run a job that is already in `running`
 *
 * Never throws for execution failures: they are recorded on the job.
 *
 * @returns The record after execution
 */
export async function executeClaimedJob(record: JobRecord, deps: JobRunnerDeps): Promise<JobRecord> {
  const { manager, context } = deps;
  const jobId = record.job_id;
  const log = createJobLogger(jobId);

  const checkpoint = (stage: string): void => {
    if (manager.isCanceled(jobId)) {
      throw new JobCanceledError(jobId, stage);
    }
  };

  log.info("Job started", { source: record.source, runner_pid: record.runner_pid });

  try {
    const outcome = await executeQuery(record.params, context, { checkpoint });
    checkpoint("publish");
    const finished = manager.complete(jobId, {
      table: outcome.table,
      pipeline: outcome.pipeline,
      save: outcome.save,
    });
    log.info("Job finished", { status: finished.status, row_count: finished.row_count });
    return finished;
  } catch (err) {
    if (err instanceof JobCanceledError) {
      log.info("Job canceled during execution", { stage: err.stage });
      return manager.status(jobId);
    }
    log.error("Job execution failed", { error: errorMessage(err) });
    return manager.fail(jobId, err);
  }
}

/**
 * Claim and run a job by ID
 *
 * @returns The record after execution, or the current record when the job
 * was not queued (already claimed, canceled or finished)
 */
export async function runJob(jobId: string, deps: JobRunnerDeps): Promise<JobRecord> {
  const claimed = deps.manager.start(jobId);
  if (!claimed) {
    const current = deps.manager.status(jobId);
    createJobLogger(jobId).warn("Job not started: it is not queued", { status: current.status });
    return current;
  }
  return executeClaimedJob(claimed, deps);
}
