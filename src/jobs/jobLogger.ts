/**
 * Job logger
 *
 * Writes to the process log (stderr) and appends the same line to the job's
 * persisted log.
 */

import type { LogLevel, Logger } from "@/types";
import { appendJobLog } from "@/db";
import * as logger from "@/logger";
import { nowIso } from "@/utils";

export function createJobLogger(jobId: string): Logger {
  const processLogger = logger.withContext({ job_id: jobId });

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    processLogger[level](message, meta);
    try {
      appendJobLog({
        job_id: jobId,
        logged_at: nowIso(),
        level,
        message,
        meta: meta && Object.keys(meta).length > 0 ? meta : null,
      });
    } catch (err) {
      logger.warn("Failed to persist job log line", {
        job_id: jobId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}
