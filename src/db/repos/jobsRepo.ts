/**
 * Jobs repository
 *
 * One row per job. The whole JobRecord lives in record_json; status and
 * timestamps are mirrored into columns for claiming and listing. Every
 * read-modify-write goes through mutateJob, which holds an immediate
 * (write-locked) transaction for its whole duration.
 */

import type { JobRecord } from "@/types";
import { getDb } from "@/db";

type JobRow = {
  job_id: string;
  record_json: string;
};

function parseRecord(row: JobRow): JobRecord {
  const record: JobRecord = JSON.parse(row.record_json);
  return record;
}

/**
 * Insert a new job record
 *
 * @throws SqliteError (unique constraint) when the job_id already exists
 */
export function insertJob(record: JobRecord): void {
  getDb()
    .prepare(
      `
      INSERT INTO jobs (job_id, status, source, created_at, updated_at, record_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `,
    )
    .run(
      record.job_id,
      record.status,
      record.source,
      record.created_at,
      record.updated_at,
      JSON.stringify(record),
    );
}

/**
 * Get a job record by ID
 */
export function getJob(jobId: string): JobRecord | undefined {
  const row = getDb()
    .prepare<[string], JobRow>("SELECT job_id, record_json FROM jobs WHERE job_id = ?")
    .get(jobId);
  return row ? parseRecord(row) : undefined;
}

function replaceJob(record: JobRecord): void {
  getDb()
    .prepare(
      `
      UPDATE jobs
      SET status = ?, updated_at = ?, record_json = ?
      WHERE job_id = ?
    `,
    )
    .run(record.status, record.updated_at, JSON.stringify(record), record.job_id);
}

export type JobMutation = {
  before: JobRecord;
  after: JobRecord;
  changed: boolean;
};

/**
 * Read-modify-write a job record atomically
 *
 * `mutate` receives the current record and returns the replacement, or null
 * to leave it unchanged. It runs inside the transaction, so it must not do
 * slow work; throwing from it rolls back.
 *
 * @returns undefined when the job does not exist
 */
export function mutateJob(
  jobId: string,
  mutate: (current: JobRecord) => JobRecord | null,
): JobMutation | undefined {
  const db = getDb();
  const transaction = db.transaction((): JobMutation | undefined => {
    const before = getJob(jobId);
    if (!before) {
      return undefined;
    }
    const after = mutate(before);
    if (!after) {
      return { before, after: before, changed: false };
    }
    replaceJob(after);
    return { before, after, changed: true };
  });
  return transaction.immediate();
}

/**
 * Most recent jobs first
 */
export function listJobs(limit: number): JobRecord[] {
  return getDb()
    .prepare<[number], JobRow>(
      `
      SELECT job_id, record_json FROM jobs
      ORDER BY created_at DESC, job_id DESC
      LIMIT ?
    `,
    )
    .all(limit)
    .map(parseRecord);
}

/**
 * Oldest queued job, if any
 */
export function findOldestQueuedJobId(): string | undefined {
  const row = getDb()
    .prepare<[], { job_id: string }>(
      `
      SELECT job_id FROM jobs
      WHERE status = 'queued'
      ORDER BY created_at ASC, job_id ASC
      LIMIT 1
    `,
    )
    .get();
  return row?.job_id;
}
