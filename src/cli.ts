#!/usr/bin/env tsx
/**
 * report-query CLI entrypoint
 *
 * Usage:
 *   npm run query -- --params input/params.json --json
 *   npm run query -- --submit --params input/params.json
 *   npm run query -- --result <job_id> --where "clicks > 10" --sort "clicks DESC" --head 5
 *   npm run query -- --batch configs/
 *
 * Environment variables:
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - DB_PATH: SQLite job store (optional, defaults to data/jobs.db)
 *   - QUERY_JOB_DIR: Job artifact root (optional, defaults to output/jobs)
 *   - QUERY_JOB_AUTORUN: Set to false to queue jobs without spawning a runner
 *   - GOOGLE_APPLICATION_CREDENTIALS: Service account JSON key file, or
 *     GOOGLE_SERVICE_ACCOUNT_EMAIL + GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY
 */

import "dotenv/config";
import { createGoogleDataSources } from "./clients/google";
import { runCli, reportError, type CliContext } from "./cli/program";
import { closeDb, runMigrations } from "./db";
import { JobManager, isAutorunEnabled, spawnJobRunner } from "./jobs";
import { createGoogleSaveContext } from "./save";

const io = {
  stdout: (text: string) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text: string) => {
    process.stderr.write(`${text}\n`);
  },
};

async function main(argv: string[]): Promise<number> {
  runMigrations();

  const context: CliContext = {
    ...io,
    jobManager: new JobManager(),
    execution: {
      dataSources: createGoogleDataSources(),
      saveContext: createGoogleSaveContext(),
    },
    spawnRunner: isAutorunEnabled() ? spawnJobRunner : null,
  };

  try {
    return await runCli(argv, context);
  } finally {
    closeDb();
  }
}

const argv = process.argv.slice(2);

main(argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    reportError(err, argv.includes("--json"), io);
    process.exitCode = 1;
  });
