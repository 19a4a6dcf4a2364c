/**
 * Job artifact store
 *
 * Artifacts are CSV files at <QUERY_JOB_DIR>/artifacts/<job_id>.csv, with the
 * column types in <job_id>.schema.json beside them (CSV alone cannot tell
 * "20240115" the string from 20240115 the number). Both are written to
 * temporary files first and renamed into place, schema before CSV, so a
 * reader that finds the CSV also finds its schema.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import type { ColumnSpec, ColumnType, ResultTable } from "@/types";
import {
  ARTIFACT_SCHEMA_SUFFIX,
  COLUMN_TYPES,
  DEFAULT_JOB_DIR,
  JOB_ARTIFACTS_SUBDIR,
} from "@/constants";
import { QueryError, errorMessage } from "@/errors";
import { readCsvFile, writeCsvFile } from "@/table";
import { isPlainObject } from "@/utils";

/**
 * Job directory from QUERY_JOB_DIR (relative paths resolve against cwd)
 */
export function getJobDir(): string {
  return resolve(process.cwd(), process.env.QUERY_JOB_DIR || DEFAULT_JOB_DIR);
}

/**
 * Temporary files of an unpublished artifact
 */
export type ArtifactTemp = {
  csvPath: string;
  schemaPath: string;
};

function isColumnType(value: unknown): value is ColumnType {
  return COLUMN_TYPES.some((type) => type === value);
}

/**
 * Parse a schema file body
 *
 * @throws Error when the body is not {"columns": [{"name", "type"}, ...]}
 */
function parseSchema(text: string): ColumnSpec[] {
  const doc: unknown = JSON.parse(text);
  if (!isPlainObject(doc) || !Array.isArray(doc.columns)) {
    throw new Error("schema must be an object with a columns array");
  }
  return doc.columns.map((column: unknown, index: number) => {
    if (!isPlainObject(column) || typeof column.name !== "string" || !isColumnType(column.type)) {
      throw new Error(`schema column ${index} must have a name and a type (${COLUMN_TYPES.join(", ")})`);
    }
    return { name: column.name, type: column.type };
  });
}

export class ArtifactStore {
  constructor(private readonly jobDir: string = getJobDir()) {}

  pathFor(jobId: string): string {
    return join(this.jobDir, JOB_ARTIFACTS_SUBDIR, `${jobId}.csv`);
  }

  schemaPathFor(jobId: string): string {
    return join(this.jobDir, JOB_ARTIFACTS_SUBDIR, `${jobId}${ARTIFACT_SCHEMA_SUFFIX}`);
  }

  /**
   * Write a table and its column types to temporary files beside the final paths
   */
  writeTemp(jobId: string, table: ResultTable): ArtifactTemp {
    const suffix = `.${process.pid}.tmp`;
    const temp = {
      csvPath: `${this.pathFor(jobId)}${suffix}`,
      schemaPath: `${this.schemaPathFor(jobId)}${suffix}`,
    };
    writeCsvFile(temp.csvPath, table);
    writeFileSync(temp.schemaPath, `${JSON.stringify({ columns: table.columns }, null, 2)}\n`, "utf-8");
    return temp;
  }

  /**
   * Move the temporary files to the job's artifact paths
   *
   * @returns The artifact (CSV) path
   */
  publish(temp: ArtifactTemp, jobId: string): string {
    renameSync(temp.schemaPath, this.schemaPathFor(jobId));
    const finalPath = this.pathFor(jobId);
    renameSync(temp.csvPath, finalPath);
    return finalPath;
  }

  discard(temp: ArtifactTemp): void {
    rmSync(temp.csvPath, { force: true });
    rmSync(temp.schemaPath, { force: true });
  }

  /**
   * Delete a published artifact and its schema
   */
  remove(jobId: string): void {
    rmSync(this.pathFor(jobId), { force: true });
    rmSync(this.schemaPathFor(jobId), { force: true });
  }

  /**
   * Read a published artifact with the column types it was written with
   *
   * The schema is looked up beside `path`; without one, types are inferred
   * from the CSV text.
   *
   * @throws QueryError ARTIFACT_NOT_FOUND or RESULT_READ_FAILED
   */
  read(jobId: string, path: string | null): ResultTable {
    if (!path || !existsSync(path)) {
      throw new QueryError("ARTIFACT_NOT_FOUND", `Result artifact not found for job ${jobId}`, {
        details: { job_id: jobId, path },
      });
    }
    const schemaPath = join(dirname(path), `${jobId}${ARTIFACT_SCHEMA_SUFFIX}`);
    try {
      const columns = existsSync(schemaPath) ? parseSchema(readFileSync(schemaPath, "utf-8")) : undefined;
      return readCsvFile(path, columns);
    } catch (err) {
      throw new QueryError(
        "RESULT_READ_FAILED",
        `Failed to read result artifact for job ${jobId}: ${errorMessage(err)}`,
        { details: { job_id: jobId, path }, cause: err },
      );
    }
  }
}
