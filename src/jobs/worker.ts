/**
 * Job worker: claims queued jobs and runs them one at a time
 *
 * Modes:
 * - once: drain the queue, then return
 * - forever: poll until the abort signal fires
 */

import { WORKER_POLL_INTERVAL_MS } from "@/constants";
import * as logger from "@/logger";
import { sleep } from "@/utils";
import { executeClaimedJob, type JobRunnerDeps } from "./jobRunner";

export type WorkerMode = "once" | "forever";

export type WorkerOptions = JobRunnerDeps & {
  mode: WorkerMode;
  pollIntervalMs?: number;
  signal?: AbortSignal;
};

export type WorkerResult = {
  processed: number;
  succeeded: number;
  failed: number;
  canceled: number;
};

export function parseWorkerMode(value: string | undefined): WorkerMode | null {
  const mode = (value || "once").trim().toLowerCase();
  return mode === "once" || mode === "forever" ? mode : null;
}

export async function runWorker(options: WorkerOptions): Promise<WorkerResult> {
  const result: WorkerResult = { processed: 0, succeeded: 0, failed: 0, canceled: 0 };
  const pollIntervalMs = options.pollIntervalMs ?? WORKER_POLL_INTERVAL_MS;

  logger.info("Worker started", { mode: options.mode, pid: process.pid });

  while (!options.signal?.aborted) {
    const claimed = options.manager.claimNext();
    if (!claimed) {
      if (options.mode === "once") {
        break;
      }
      await sleep(pollIntervalMs);
      continue;
    }

    const finished = await executeClaimedJob(claimed, options);
    result.processed += 1;
    if (finished.status === "succeeded") result.succeeded += 1;
    else if (finished.status === "failed") result.failed += 1;
    else if (finished.status === "canceled") result.canceled += 1;
  }

  logger.info("Worker stopped", { ...result });
  return result;
}
