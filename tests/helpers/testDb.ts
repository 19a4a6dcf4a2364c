/**
 * Test Database Harness
 *
 * Creates fresh temporary SQLite databases per test.
 * Runs real migrations, injects the handle into the db singleton, handles cleanup.
 *
 * Usage:
 *   const harness = createTestDbSync();
 *   // ... JobManager and repos now use harness.db ...
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { applyPendingMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  /** The SQLite database connection */
  db: Database.Database;
  /** Path to the temp database file */
  dbPath: string;
  /** Clean up: close connection and delete temp file */
  cleanup: () => void;
}

function testRoot(): string {
  const root = join(tmpdir(), "report-query-tests");
  mkdirSync(root, { recursive: true });
  return root;
}

/**
 * Generate a unique temp file path for a test database
 */
function generateTempDbPath(): string {
  const random = Math.random().toString(36).substring(2, 8);
  return join(testRoot(), `test-${Date.now()}-${random}.db`);
}

/**
 * Create a fresh temp directory (job artifacts, batch configs, CSV output)
 */
export function createTempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(testRoot(), `${prefix}-`));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Create a fresh test database with all migrations applied.
 *
 * IMPORTANT: Always call cleanup() after the test completes.
 */
export function createTestDbSync(): TestDbHarness {
  const dbPath = generateTempDbPath();

  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  applyPendingMigrations(db);

  // Inject into production singleton so repos work
  setDbForTesting(db);

  const cleanup = () => {
    setDbForTesting(null);
    db.close();
    rmSync(dbPath, { force: true });
    rmSync(dbPath + "-wal", { force: true });
    rmSync(dbPath + "-shm", { force: true });
  };

  return { db, dbPath, cleanup };
}
