/**
 * Migration entrypoint
 *
 * Usage: npm run migrate
 */

import "dotenv/config";
import * as logger from "@/logger";
import { closeDb } from "./connection";
import { runMigrations } from "./migrate";

try {
  runMigrations();
  logger.info("Database schema is up to date");
  closeDb();
} catch (err) {
  logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
  closeDb();
  process.exit(1);
}
