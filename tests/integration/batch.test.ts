/**
 * Batch runner integration tests
 *
 * Params files on disk, validated and executed against in-process fakes.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "fs";
import { join } from "path";
import type { BatchProgress } from "@/types";
import { collectConfigs, runBatch, type BatchExecute } from "@/batch";
import { QueryError } from "@/errors";
import { executeQuery } from "@/execution";
import { prepareParams } from "@/params";
import { createTable } from "@/table";
import { createTempDir } from "../helpers/testDb";
import { createFakeDataSources, createFakeSaveContext } from "../helpers/fakes";

const PAGES = createTable(
  ["page", "clicks"],
  [
    { page: "/a", clicks: 5 },
    { page: "/b", clicks: 2 },
  ],
);

function gscDoc(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    schema_version: "1.0",
    source: "gsc",
    site_url: "https://example.com/",
    date_range: { start: "2026-01-01", end: "2026-01-31" },
    dimensions: ["page"],
    ...overrides,
  };
}

function batchCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof QueryError ? err.code : "not a QueryError";
  }
  return undefined;
}

describe("runBatch", () => {
  let temp: { dir: string; cleanup: () => void };
  let execute: BatchExecute;

  beforeEach(() => {
    temp = createTempDir("batch");
    const context = {
      dataSources: createFakeDataSources({ gsc: PAGES }),
      saveContext: createFakeSaveContext().context,
    };
    execute = async (raw) => {
      const outcome = await executeQuery(prepareParams(raw), context);
      return { row_count: outcome.table.rows.length };
    };
  });

  afterEach(() => {
    temp.cleanup();
  });

  function writeConfig(name: string, content: unknown): void {
    const text = typeof content === "string" ? content : JSON.stringify(content);
    writeFileSync(join(temp.dir, name), text);
  }

  it("runs every config in name order and keeps going after a failure", async () => {
    writeConfig("c_last.json", gscDoc({ pipeline: { head: 1 } }));
    writeConfig("a_first.json", gscDoc());
    writeConfig("b_invalid.json", { schema_version: "1.0", source: "gsc", site_url: "https://example.com/", date_range: { start: "2026-01-01", end: "2026-01-31" } });
    writeConfig("notes.txt", "not a config");
    const progress: BatchProgress[] = [];

    const summary = await runBatch(temp.dir, { execute, onProgress: (p) => progress.push(p) });

    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.skipped).toBe(0);
    expect(summary.results.map((r) => [r.config, r.status, r.row_count])).toEqual([
      ["a_first.json", "ok", 2],
      ["b_invalid.json", "error", undefined],
      ["c_last.json", "ok", 1],
    ]);
    expect(summary.results[1].error_code).toBe("PARAMS_VALIDATION_FAILED");
    expect(summary.results[1].message).toBe("Params validation failed (1 error(s))");
    expect(summary.results[1].details).toEqual({
      errors: [
        {
          error_code: "MISSING_REQUIRED",
          message: "Missing required field: dimensions",
          path: "$",
          hint: "Add 'dimensions' to params.json.",
        },
      ],
    });
    expect(progress).toEqual([
      { index: 1, total: 3, config: "a_first.json" },
      { index: 2, total: 3, config: "b_invalid.json" },
      { index: 3, total: 3, config: "c_last.json" },
    ]);
  });

  it("skips files that are not a JSON object", async () => {
    writeConfig("a.json", gscDoc());
    writeConfig("b.json", "{not json");
    writeConfig("c.json", "[1, 2]");

    const summary = await runBatch(temp.dir, { execute });

    expect(summary.results.map((r) => r.status)).toEqual(["ok", "skipped", "skipped"]);
    expect(summary.results[2].message).toBe("Config root must be a JSON object");
    expect(summary.results[1].message?.startsWith("Invalid JSON: ")).toBe(true);
    expect(summary.skipped).toBe(2);
    expect(summary.failed).toBe(0);
  });

  it("records execution failures with their code", async () => {
    writeConfig("a.json", gscDoc({ pipeline: { sort: "missing" } }));

    const summary = await runBatch(temp.dir, { execute });

    expect(summary.results[0].status).toBe("error");
    expect(summary.results[0].error_code).toBe("INVALID_SORT");
  });

  it("accepts a single .json file", async () => {
    writeConfig("only.json", gscDoc());
    const file = join(temp.dir, "only.json");

    expect(collectConfigs(file)).toEqual([file]);
    const summary = await runBatch(file, { execute });
    expect(summary.succeeded).toBe(1);
  });

  it("fails the whole batch when there is nothing to run", () => {
    expect(batchCode(() => collectConfigs(join(temp.dir, "missing")))).toBe("BATCH_FAILED");
    expect(batchCode(() => collectConfigs(temp.dir))).toBe("BATCH_FAILED");
    writeConfig("notes.txt", "x");
    expect(batchCode(() => collectConfigs(join(temp.dir, "notes.txt")))).toBe("BATCH_FAILED");
  });
});
