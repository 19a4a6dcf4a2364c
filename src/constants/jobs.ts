/**
 * Job store and worker constants
 */

/**
 * SQLite job store, relative to cwd (overridable via DB_PATH)
 */
export const DEFAULT_DB_PATH = "data/jobs.db";

/**
 * How long a connection waits for another process's write lock
 */
export const DB_BUSY_TIMEOUT_MS = 5_000;

/**
 * Root directory for job artifacts, relative to cwd (overridable via QUERY_JOB_DIR)
 */
export const DEFAULT_JOB_DIR = "output/jobs";

export const JOB_ARTIFACTS_SUBDIR = "artifacts";

/**
 * Column types of an artifact, stored beside <job_id>.csv
 */
export const ARTIFACT_SCHEMA_SUFFIX = ".schema.json";

export const JOB_ID_PREFIX = "job";

/**
 * Random bytes in the job ID suffix (8 hex chars)
 */
export const JOB_ID_RANDOM_BYTES = 4;

/**
 * Attempts to generate a non-colliding job ID before giving up
 */
export const JOB_ID_MAX_ATTEMPTS = 5;

export const DEFAULT_JOB_LIST_LIMIT = 20;

/**
 * Maximum stored length of a job error message
 */
export const JOB_ERROR_MESSAGE_MAX_LENGTH = 2000;

/**
 * Worker poll interval between empty queue checks (forever mode)
 */
export const WORKER_POLL_INTERVAL_MS = 5_000;

/**
 * Flag the CLI passes to a spawned runner process
 */
export const RUN_JOB_FLAG = "--run-job";
