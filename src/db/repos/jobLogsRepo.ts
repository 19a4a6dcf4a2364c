/**
 * Job logs repository
 *
 * Append-only log lines per job.
 */

import type { JobLogEntry, LogLevel } from "@/types";
import { getDb } from "@/db";

type JobLogRow = {
  job_id: string;
  logged_at: string;
  level: LogLevel;
  message: string;
  meta_json: string | null;
};

export function appendJobLog(entry: JobLogEntry): void {
  getDb()
    .prepare(
      `
      INSERT INTO job_logs (job_id, logged_at, level, message, meta_json)
      VALUES (?, ?, ?, ?, ?)
    `,
    )
    .run(
      entry.job_id,
      entry.logged_at,
      entry.level,
      entry.message,
      entry.meta ? JSON.stringify(entry.meta) : null,
    );
}

/**
 * Log lines of a job in insertion order
 */
export function listJobLogs(jobId: string): JobLogEntry[] {
  return getDb()
    .prepare<[string], JobLogRow>(
      `
      SELECT job_id, logged_at, level, message, meta_json
      FROM job_logs
      WHERE job_id = ?
      ORDER BY id ASC
    `,
    )
    .all(jobId)
    .map((row) => {
      const meta: Record<string, unknown> | null = row.meta_json ? JSON.parse(row.meta_json) : null;
      return {
        job_id: row.job_id,
        logged_at: row.logged_at,
        level: row.level,
        message: row.message,
        meta,
      };
    });
}
