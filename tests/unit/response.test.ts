/**
 * Response formatting tests
 *
 * Envelopes (--json) and the plain text renderings used in human mode.
 */

import { describe, it, expect } from "vitest";
import type { BatchSummary, GscDescriptor, JobRecord } from "@/types";
import { QueryError } from "@/errors";
import {
  cancelData,
  errorEnvelope,
  formatBatch,
  formatError,
  formatJob,
  formatJobList,
  formatTable,
  jobListData,
  ok,
  queryData,
  serializeEnvelope,
  submitData,
} from "@/response";
import { createTable } from "@/table";

const PARAMS: GscDescriptor = {
  schema_version: "1.0",
  source: "gsc",
  site_url: "https://example.com/",
  date_range: { start: "2026-01-01", end: "2026-01-31" },
  dimensions: ["page"],
  limit: 1000,
};

function jobRecord(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    job_id: "job_20260101_000000_aaaa0001",
    status: "queued",
    source: "gsc",
    params_path: null,
    params: PARAMS,
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    started_at: null,
    finished_at: null,
    canceled_at: null,
    runner_pid: null,
    row_count: null,
    artifact_path: null,
    error: null,
    pipeline: null,
    save: null,
    ...overrides,
  };
}

describe("envelopes", () => {
  it("wraps data in a success envelope", () => {
    expect(ok("job_status", { a: 1 })).toEqual({ status: "ok", mode: "job_status", data: { a: 1 } });
  });

  it("builds an error envelope from a QueryError with its hint and details", () => {
    const envelope = errorEnvelope(
      new QueryError("JOB_NOT_FOUND", "Job not found: job_x", { details: { job_id: "job_x" } }),
    );
    expect(envelope).toEqual({
      status: "error",
      error_code: "JOB_NOT_FOUND",
      message: "Job not found: job_x",
      hint: "Check the job ID with --list-jobs.",
      details: { job_id: "job_x" },
    });
  });

  it("reports any other thrown value as INTERNAL_ERROR", () => {
    const envelope = errorEnvelope(new Error("boom"));
    expect(envelope.error_code).toBe("INTERNAL_ERROR");
    expect(envelope.message).toBe("boom");
    expect(envelope.hint).toBe("Re-run with LOG_LEVEL=debug and check the logs.");
    expect("details" in envelope).toBe(false);
  });

  it("serializes to indented JSON that parses back", () => {
    const envelope = ok("list_jobs", { count: 0, jobs: [] });
    const text = serializeEnvelope(envelope);
    expect(text).toContain('\n  "status": "ok"');
    expect(JSON.parse(text)).toEqual(envelope);
  });
});

describe("data builders", () => {
  it("queryData carries the table, counts and output path", () => {
    const table = createTable(["page", "clicks"], [{ page: "/a", clicks: 3 }]);
    const data = queryData(
      "gsc",
      { table, fetched_rows: 10, pipeline: { input_rows: 10, output_rows: 1, stages: ["where"] }, save: null },
      "/tmp/out.csv",
    );
    expect(data).toEqual({
      source: "gsc",
      fetched_rows: 10,
      row_count: 1,
      columns: ["page", "clicks"],
      rows: [{ page: "/a", clicks: 3 }],
      pipeline: { input_rows: 10, output_rows: 1, stages: ["where"] },
      save: null,
      output_path: "/tmp/out.csv",
    });
  });

  it("queryData omits output_path when nothing was written", () => {
    const table = createTable(["page"], [{ page: "/a" }]);
    const data = queryData("gsc", { table, fetched_rows: 1, pipeline: null, save: null });
    expect("output_path" in data).toBe(false);
  });

  it("submitData reports autorun and the runner pid", () => {
    expect(submitData(jobRecord(), true, 4242)).toEqual({
      job_id: "job_20260101_000000_aaaa0001",
      status: "queued",
      source: "gsc",
      created_at: "2026-01-01T00:00:00.000Z",
      runner_pid: 4242,
      autorun: true,
    });
  });

  it("cancelData reports already_canceled", () => {
    expect(cancelData(jobRecord({ status: "canceled" }), true)).toEqual({
      job_id: "job_20260101_000000_aaaa0001",
      status: "canceled",
      already_canceled: true,
    });
  });

  it("jobListData keeps list fields only", () => {
    const data = jobListData([jobRecord({ status: "succeeded", row_count: 7 })]);
    expect(data).toEqual({
      count: 1,
      jobs: [
        {
          job_id: "job_20260101_000000_aaaa0001",
          status: "succeeded",
          source: "gsc",
          created_at: "2026-01-01T00:00:00.000Z",
          finished_at: null,
          row_count: 7,
        },
      ],
    });
  });
});

describe("human output", () => {
  const table = createTable(
    ["page", "clicks"],
    [
      { page: "/a", clicks: 5 },
      { page: "/long", clicks: null },
    ],
  );

  it("renders a padded text table", () => {
    expect(formatTable(table)).toBe(["page   clicks", "-----  ------", "/a     5", "/long"].join("\n"));
  });

  it("truncates rows past the limit", () => {
    expect(formatTable(table, 1)).toBe(
      ["page   clicks", "-----  ------", "/a     5", "... 1 more row(s)"].join("\n"),
    );
  });

  it("lists validation issues under an error", () => {
    const envelope = errorEnvelope(
      new QueryError("PARAMS_VALIDATION_FAILED", "Params validation failed (1 error(s))", {
        details: { errors: [{ path: "$.limit", message: "limit must be an integer" }] },
      }),
    );
    expect(formatError(envelope)).toBe(
      [
        "Error [PARAMS_VALIDATION_FAILED]: Params validation failed (1 error(s))",
        "Hint: Fix the fields listed in details.errors and retry.",
        "  - $.limit: limit must be an integer",
      ].join("\n"),
    );
  });

  it("renders a failed job with its error code", () => {
    const text = formatJob(
      jobRecord({
        status: "failed",
        started_at: "2026-01-01T00:00:01.000Z",
        finished_at: "2026-01-01T00:00:02.000Z",
        error: { type: "QueryError", code: "NO_DATA_RETURNED", message: "gsc query returned no rows" },
      }),
    );
    expect(text.split("\n")).toEqual([
      "Job:      job_20260101_000000_aaaa0001",
      "Status:   failed",
      "Source:   gsc",
      "Created:  2026-01-01T00:00:00.000Z",
      "Started:  2026-01-01T00:00:01.000Z",
      "Finished: 2026-01-01T00:00:02.000Z",
      "Error:    NO_DATA_RETURNED: gsc query returned no rows",
    ]);
  });

  it("renders a job list, or a placeholder when empty", () => {
    expect(formatJobList([])).toBe("No jobs.");
    const { jobs } = jobListData([jobRecord()]);
    expect(formatJobList(jobs)).toBe(
      "job_20260101_000000_aaaa0001  queued     gsc       2026-01-01T00:00:00.000Z",
    );
  });

  it("renders one line per batch item and a total", () => {
    const summary: BatchSummary = {
      path: "configs",
      total: 2,
      succeeded: 1,
      failed: 1,
      skipped: 0,
      elapsed_sec: 0.5,
      results: [
        { config: "a.json", status: "ok", row_count: 3, elapsed_sec: 0.1 },
        {
          config: "b.json",
          status: "error",
          error_code: "NO_DATA_RETURNED",
          message: "gsc query returned no rows",
          elapsed_sec: 0,
        },
      ],
    };
    expect(formatBatch(summary).split("\n")).toEqual([
      "[ok] a.json: 3 row(s)",
      "[error] b.json: NO_DATA_RETURNED gsc query returned no rows",
      "Total: 2  Succeeded: 1  Failed: 1  Skipped: 0  (0.5s)",
    ]);
  });
});
