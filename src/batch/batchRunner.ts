/**
 * BatchRunner: run every params file of a directory in order
 *
 * Items run sequentially in lexicographic file-name order. One item's
 * failure never stops the batch:
 * - a file that is not a JSON object is skipped
 * - a document that fails validation or execution is failed with its code
 */

import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { basename, join } from "path";
import type { BatchItemResult, BatchProgress, BatchSummary } from "@/types";
import { QueryError, asQueryError, errorMessage } from "@/errors";
import * as logger from "@/logger";
import { elapsedSeconds, isPlainObject } from "@/utils";

export type BatchExecute = (raw: Record<string, unknown>, configPath: string) => Promise<{ row_count: number }>;

export type BatchOptions = {
  execute: BatchExecute;
  onProgress?: (progress: BatchProgress) => void;
};

function isJsonFile(name: string): boolean {
  return name.toLowerCase().endsWith(".json");
}

/**
 * List the config files of a batch path
 *
 * @throws QueryError BATCH_FAILED for a missing path, a non-JSON file or a
 * directory without JSON files
 */
export function collectConfigs(path: string): string[] {
  if (!existsSync(path)) {
    throw new QueryError("BATCH_FAILED", `Batch path not found: ${path}`, { details: { path } });
  }

  if (statSync(path).isFile()) {
    if (!isJsonFile(path)) {
      throw new QueryError("BATCH_FAILED", `Batch file is not a .json file: ${path}`, {
        details: { path },
      });
    }
    return [path];
  }

  const files = readdirSync(path)
    .filter((name) => isJsonFile(name) && statSync(join(path, name)).isFile())
    .sort()
    .map((name) => join(path, name));

  if (files.length === 0) {
    throw new QueryError("BATCH_FAILED", `No .json configs found in ${path}`, { details: { path } });
  }
  return files;
}

type ParsedConfig = { ok: true; doc: Record<string, unknown> } | { ok: false; message: string };

function readConfig(file: string): ParsedConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    return { ok: false, message: `Invalid JSON: ${errorMessage(err)}` };
  }
  if (!isPlainObject(parsed)) {
    return { ok: false, message: "Config root must be a JSON object" };
  }
  return { ok: true, doc: parsed };
}

async function runItem(file: string, options: BatchOptions): Promise<BatchItemResult> {
  const started = Date.now();
  const config = basename(file);

  const parsed = readConfig(file);
  if (!parsed.ok) {
    logger.warn("Batch config skipped", { config, reason: parsed.message });
    return { config, status: "skipped", message: parsed.message, elapsed_sec: elapsedSeconds(started) };
  }

  try {
    const { row_count } = await options.execute(parsed.doc, file);
    logger.info("Batch config succeeded", { config, row_count });
    return { config, status: "ok", row_count, elapsed_sec: elapsedSeconds(started) };
  } catch (err) {
    const error = asQueryError(err, "INTERNAL_ERROR");
    logger.warn("Batch config failed", { config, code: error.code, message: error.message });
    return {
      config,
      status: "error",
      error_code: error.code,
      message: error.message,
      hint: error.hint,
      ...(error.details !== undefined && { details: error.details }),
      elapsed_sec: elapsedSeconds(started),
    };
  }
}

/**
 * Run a batch
 *
 * @throws QueryError BATCH_FAILED when the path yields no configs
 */
export async function runBatch(path: string, options: BatchOptions): Promise<BatchSummary> {
  const started = Date.now();
  const files = collectConfigs(path);
  const results: BatchItemResult[] = [];

  logger.info("Batch started", { path, total: files.length });

  for (const [index, file] of files.entries()) {
    options.onProgress?.({ index: index + 1, total: files.length, config: basename(file) });
    results.push(await runItem(file, options));
  }

  const summary: BatchSummary = {
    path,
    total: results.length,
    succeeded: results.filter((r) => r.status === "ok").length,
    failed: results.filter((r) => r.status === "error").length,
    skipped: results.filter((r) => r.status === "skipped").length,
    elapsed_sec: elapsedSeconds(started),
    results,
  };

  logger.info("Batch finished", {
    total: summary.total,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
  });
  return summary;
}
