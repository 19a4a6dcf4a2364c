/**
 * SQLite job store connection
 *
 * One process-wide handle. The CLI, detached job runners and the worker open
 * the same file concurrently, so the handle runs in WAL mode and waits on
 * locks instead of failing with SQLITE_BUSY.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { DB_BUSY_TIMEOUT_MS, DEFAULT_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Job store path from DB_PATH (relative paths resolve against cwd)
 */
export function getDbPath(): string {
  const dbPath = process.env.DB_PATH || DEFAULT_DB_PATH;
  return dbPath === ":memory:" ? dbPath : resolve(process.cwd(), dbPath);
}

/**
 * Open the job store, or return the handle already open
 */
export function openDb(dbPath: string = getDbPath()): Database.Database {
  if (db) {
    return db;
  }

  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const handle = new Database(dbPath);
  handle.pragma("foreign_keys = ON");
  handle.pragma("journal_mode = WAL");
  handle.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
  db = handle;
  return handle;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Current handle
 *
 * @throws Error when no handle is open (entry points call runMigrations first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Job store is not open. Call openDb() or runMigrations() first.");
  }
  return db;
}

/**
 * Inject a handle (tests only). Pass null to detach.
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
