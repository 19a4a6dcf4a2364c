/**
 * Worker entrypoint: runs queued jobs
 *
 * Modes:
 * - once: runs every queued job, then exits
 * - forever: keeps polling for queued jobs until SIGINT/SIGTERM
 *
 * Usage:
 *   npm run worker
 *   WORKER_MODE=forever npm run worker
 *
 * Environment variables:
 *   - WORKER_MODE: Execution mode (once|forever, defaults to once)
 *   - LOG_LEVEL, DB_PATH, QUERY_JOB_DIR and the Google credential variables
 *     as for the CLI
 */

import "dotenv/config";
import { createGoogleDataSources } from "./clients/google";
import { closeDb, runMigrations } from "./db";
import { JobManager, parseWorkerMode, runWorker } from "./jobs";
import * as logger from "./logger";
import { createGoogleSaveContext } from "./save";
import { errorMessage } from "./errors";

async function main(): Promise<number> {
  const mode = parseWorkerMode(process.env.WORKER_MODE);
  if (!mode) {
    logger.error("Invalid WORKER_MODE", {
      workerMode: process.env.WORKER_MODE,
      validModes: ["once", "forever"],
    });
    return 1;
  }

  runMigrations();

  const controller = new AbortController();
  const stop = (signal: string) => {
    logger.info("Stopping worker after the current job", { signal });
    controller.abort();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  try {
    const result = await runWorker({
      manager: new JobManager(),
      context: {
        dataSources: createGoogleDataSources(),
        saveContext: createGoogleSaveContext(),
      },
      mode,
      signal: controller.signal,
    });

    if (result.failed > 0) {
      logger.warn("Some jobs failed - exiting with code 1", { failed: result.failed });
      return 1;
    }
    return 0;
  } finally {
    closeDb();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error("Worker failed with fatal error", {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exitCode = 1;
  });
