/**
 * SQLite error classification
 */

import Database from "better-sqlite3";

const UNIQUE_CONSTRAINT_CODES = new Set(["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"]);

/**
 * True for a UNIQUE or PRIMARY KEY violation (e.g. a job ID collision)
 */
export function isUniqueConstraintError(err: unknown): boolean {
  if (err instanceof Database.SqliteError) {
    return UNIQUE_CONSTRAINT_CODES.has(err.code);
  }
  return err instanceof Error && err.message.startsWith("UNIQUE constraint failed:");
}
