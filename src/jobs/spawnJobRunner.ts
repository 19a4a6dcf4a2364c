/**
 * Detached runner process for a submitted job
 */

import { spawn } from "child_process";
import { RUN_JOB_FLAG } from "@/constants";
import * as logger from "@/logger";

/**
 * True unless QUERY_JOB_AUTORUN disables spawning (false/0/no/off)
 */
export function isAutorunEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = (env.QUERY_JOB_AUTORUN ?? "").trim().toLowerCase();
  return !["false", "0", "no", "off"].includes(value);
}

/**
 * Re-invoke the current CLI entrypoint with `--run-job <id>` in a detached
 * process that outlives this one
 *
 * @returns The child PID, or null when the process could not be started
 */
export function spawnJobRunner(jobId: string): number | null {
  const entry = process.argv[1];
  if (!entry) {
    logger.warn("Cannot spawn job runner: entrypoint unknown", { job_id: jobId });
    return null;
  }

  const child = spawn(process.execPath, [...process.execArgv, entry, RUN_JOB_FLAG, jobId], {
    detached: true,
    stdio: "ignore",
    env: process.env,
  });
  child.on("error", (err) => {
    logger.error("Job runner process failed to start", { job_id: jobId, error: err.message });
  });
  child.unref();

  logger.debug("Job runner spawned", { job_id: jobId, pid: child.pid });
  return child.pid ?? null;
}
