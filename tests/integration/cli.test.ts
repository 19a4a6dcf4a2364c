/**
 * CLI integration tests
 *
 * Runs full invocations through runCli with captured output, a temp job
 * store and in-process data sources.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import type { QueryDescriptor } from "@/types";
import { runCli, type CliContext } from "@/cli/program";
import { ArtifactStore, JobManager, generateJobId } from "@/jobs";
import { createTable } from "@/table";
import { createTempDir, createTestDbSync, type TestDbHarness } from "../helpers/testDb";
import { createFakeDataSources, createFakeSaveContext } from "../helpers/fakes";

const PAGES = createTable(
  ["page", "clicks"],
  [
    { page: "/a", clicks: 5 },
    { page: "/b", clicks: 2 },
  ],
);

const DOC = {
  schema_version: "1.0",
  source: "gsc",
  site_url: "https://example.com/",
  date_range: { start: "2026-01-01", end: "2026-01-31" },
  dimensions: ["page"],
};

const INLINE = JSON.stringify(DOC);

type Captured = {
  ctx: CliContext;
  stdout: string[];
  stderr: string[];
  spawned: string[];
  calls: QueryDescriptor[];
};

/**
 * Parse the single JSON envelope printed to stdout
 */
function envelopeOf(stdout: string[]): Record<string, unknown> {
  expect(stdout).toHaveLength(1);
  const parsed: unknown = JSON.parse(stdout[0]);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("stdout is not a JSON object");
  }
  return { ...parsed };
}

function dataOf(stdout: string[]): Record<string, unknown> {
  const data = envelopeOf(stdout).data;
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error("envelope has no data object");
  }
  return { ...data };
}

describe("CLI", () => {
  let harness: TestDbHarness;
  let temp: { dir: string; cleanup: () => void };
  let manager: JobManager;

  beforeEach(() => {
    harness = createTestDbSync();
    temp = createTempDir("cli");
    let tick = 0;
    manager = new JobManager({
      artifacts: new ArtifactStore(temp.dir),
      now: () => new Date(Date.UTC(2026, 1, 1, 12, 0, tick++)),
      newJobId: (now) => generateJobId(now, "0000cafe"),
    });
  });

  afterEach(() => {
    harness.cleanup();
    temp.cleanup();
  });

  function setup(options: { autorun?: boolean } = {}): Captured {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const spawned: string[] = [];
    const dataSources = createFakeDataSources({ gsc: PAGES });
    const ctx: CliContext = {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      jobManager: manager,
      execution: { dataSources, saveContext: createFakeSaveContext().context },
      spawnRunner:
        options.autorun === false
          ? null
          : (jobId) => {
              spawned.push(jobId);
              return 4242;
            },
      reference: new Date("2026-02-01T00:00:00Z"),
      sites: { corp: { gsc_site_url: "https://corp.example/" } },
    };
    return { ctx, stdout, stderr, spawned, calls: dataSources.calls };
  }

  describe("synchronous query", () => {
    it("prints one success envelope with --json", async () => {
      const { ctx, stdout } = setup();

      const code = await runCli(["--inline", INLINE, "--json"], ctx);

      expect(code).toBe(0);
      const envelope = envelopeOf(stdout);
      expect(envelope.status).toBe("ok");
      expect(envelope.mode).toBe("query");
      expect(dataOf(stdout)).toEqual({
        source: "gsc",
        fetched_rows: 2,
        row_count: 2,
        columns: ["page", "clicks"],
        rows: [
          { page: "/a", clicks: 5 },
          { page: "/b", clicks: 2 },
        ],
        pipeline: null,
        save: null,
      });
    });

    it("prints a text table in human mode", async () => {
      const { ctx, stdout, stderr } = setup();

      const code = await runCli(["--inline", INLINE], ctx);

      expect(code).toBe(0);
      expect(stdout).toEqual(["page  clicks\n----  ------\n/a    5\n/b    2\n2 row(s)"]);
      expect(stderr).toEqual([]);
    });

    it("applies the pipeline of the params document", async () => {
      const { ctx, stdout } = setup();
      const doc = JSON.stringify({ ...DOC, pipeline: { where: "clicks > 3" } });

      await runCli(["--inline", doc, "--json"], ctx);

      const data = dataOf(stdout);
      expect(data.rows).toEqual([{ page: "/a", clicks: 5 }]);
      expect(data.fetched_rows).toBe(2);
      expect(data.pipeline).toEqual({ input_rows: 2, output_rows: 1, stages: ["where"] });
    });

    it("expands a site alias", async () => {
      const { ctx, calls } = setup();
      const { site_url: _siteUrl, ...rest } = DOC;

      const code = await runCli(["--inline", JSON.stringify({ ...rest, site: "corp" }), "--json"], ctx);

      expect(code).toBe(0);
      expect(calls).toHaveLength(1);
      const [call] = calls;
      expect(call.source === "gsc" && call.site_url).toBe("https://corp.example/");
    });

    it("reads params from a file and writes --output as CSV", async () => {
      const { ctx, stdout } = setup();
      const paramsPath = join(temp.dir, "params.json");
      const outputPath = join(temp.dir, "out", "result.csv");
      writeFileSync(paramsPath, INLINE);

      const code = await runCli(["--params", paramsPath, "--output", outputPath, "--json"], ctx);

      expect(code).toBe(0);
      expect(dataOf(stdout).output_path).toBe(outputPath);
      expect(readFileSync(outputPath, "utf-8")).toBe("\uFEFFpage,clicks\n/a,5\n/b,2\n");
    });

    it("reports validation errors with their issues", async () => {
      const { ctx, stdout } = setup();
      const { dimensions: _dimensions, ...rest } = DOC;

      const code = await runCli(["--inline", JSON.stringify(rest), "--json"], ctx);

      expect(code).toBe(1);
      const envelope = envelopeOf(stdout);
      expect(envelope.status).toBe("error");
      expect(envelope.error_code).toBe("PARAMS_VALIDATION_FAILED");
      expect(envelope.details).toEqual({
        errors: [
          {
            error_code: "MISSING_REQUIRED",
            message: "Missing required field: dimensions",
            path: "$",
            hint: "Add 'dimensions' to params.json.",
          },
        ],
      });
    });

    it("reports a missing params file", async () => {
      const { ctx, stdout } = setup();
      const missing = join(temp.dir, "missing.json");

      await runCli(["--params", missing, "--json"], ctx);

      expect(envelopeOf(stdout).error_code).toBe("PARAMS_FILE_NOT_FOUND");
      expect(envelopeOf(stdout).message).toBe(`Params file not found: ${missing}`);
    });

    it("writes human-mode errors to stderr only", async () => {
      const { ctx, stdout, stderr } = setup();

      const code = await runCli(["--inline", "{bad"], ctx);

      expect(code).toBe(1);
      expect(stdout).toEqual([]);
      expect(stderr).toHaveLength(1);
      const lines = stderr[0].split("\n");
      expect(lines[0].startsWith("Error [INVALID_JSON]: Invalid JSON in --inline: ")).toBe(true);
      expect(lines[1]).toBe("Hint: Check the JSON syntax of the params document.");
    });
  });

  describe("flag combinations", () => {
    it("rejects two actions at once", async () => {
      const { ctx, stdout } = setup();

      const code = await runCli(["--status", "job_a", "--cancel", "job_b", "--json"], ctx);

      expect(code).toBe(1);
      const envelope = envelopeOf(stdout);
      expect(envelope.error_code).toBe("INVALID_ARGUMENT");
      expect(envelope.message).toBe("--status and --cancel cannot be combined");
    });

    it("rejects pipeline flags outside --result", async () => {
      const { ctx, stdout } = setup();

      await runCli(["--inline", INLINE, "--where", "clicks > 1", "--json"], ctx);

      expect(envelopeOf(stdout).message).toBe(
        "--where can only be used with --result; put the pipeline in the params document instead",
      );
    });

    it("rejects --output with --summary", async () => {
      const { ctx, stdout } = setup();

      await runCli(["--result", "job_a", "--summary", "--output", "x.csv", "--json"], ctx);

      expect(envelopeOf(stdout).message).toBe("--output cannot be combined with --summary");
    });

    it("rejects a non-integer --head", async () => {
      const { ctx, stdout } = setup();

      await runCli(["--result", "job_a", "--head", "two", "--json"], ctx);

      expect(envelopeOf(stdout).message).toBe("--head must be an integer: two");
    });

    it("maps unknown options to INVALID_ARGUMENT", async () => {
      const { ctx, stdout } = setup();

      const code = await runCli(["--bogus", "--json"], ctx);

      expect(code).toBe(1);
      const envelope = envelopeOf(stdout);
      expect(envelope.error_code).toBe("INVALID_ARGUMENT");
      expect(envelope.details).toEqual({ reason: "commander.unknownOption" });
    });

    it("prints help and exits 0", async () => {
      const { ctx, stdout } = setup();

      const code = await runCli(["--help"], ctx);

      expect(code).toBe(0);
      expect(stdout[0].startsWith("Usage: report-query [options]")).toBe(true);
      expect(stdout[0]).not.toContain("--run-job");
    });
  });

  describe("jobs", () => {
    it("submits, runs and reads a job", async () => {
      const submitted = setup();
      expect(await runCli(["--inline", INLINE, "--submit", "--json"], submitted.ctx)).toBe(0);
      const submitData = dataOf(submitted.stdout);
      const jobId = "job_20260201_120000_0000cafe";
      expect(submitData).toEqual({
        job_id: jobId,
        status: "queued",
        source: "gsc",
        created_at: "2026-02-01T12:00:00.000Z",
        runner_pid: 4242,
        autorun: true,
      });
      expect(submitted.spawned).toEqual([jobId]);
      expect(submitted.calls).toHaveLength(0);

      const ran = setup();
      expect(await runCli(["--run-job", jobId, "--json"], ran.ctx)).toBe(0);
      expect(envelopeOf(ran.stdout).mode).toBe("job_status");
      expect(dataOf(ran.stdout).status).toBe("succeeded");

      const head = setup();
      await runCli(["--result", jobId, "--head", "1", "--json"], head.ctx);
      expect(dataOf(head.stdout)).toEqual({
        job_id: jobId,
        total_rows: 2,
        row_count: 1,
        columns: ["page", "clicks"],
        rows: [{ page: "/a", clicks: 5 }],
        pipeline: null,
      });

      const piped = setup();
      await runCli(["--result", jobId, "--sort", "clicks ASC", "--columns", "page", "--json"], piped.ctx);
      expect(dataOf(piped.stdout).rows).toEqual([{ page: "/b" }, { page: "/a" }]);

      const summary = setup();
      await runCli(["--result", jobId, "--summary", "--json"], summary.ctx);
      const summaryData = dataOf(summary.stdout);
      expect(summaryData.job_id).toBe(jobId);
      expect(summaryData.summary).toMatchObject({ row_count: 2, column_count: 2, columns: ["page", "clicks"] });

      const listed = setup();
      await runCli(["--list-jobs", "--json"], listed.ctx);
      expect(dataOf(listed.stdout)).toMatchObject({ count: 1, jobs: [{ job_id: jobId, status: "succeeded", row_count: 2 }] });

      const canceled = setup();
      expect(await runCli(["--cancel", jobId, "--json"], canceled.ctx)).toBe(1);
      expect(envelopeOf(canceled.stdout).error_code).toBe("JOB_NOT_CANCELABLE");
    });

    it("queues without a runner when autorun is off", async () => {
      const { ctx, stdout, spawned } = setup({ autorun: false });

      await runCli(["--inline", INLINE, "--submit"], ctx);

      expect(stdout).toEqual([
        "Submitted job_20260201_120000_0000cafe (queued)\nAutorun is off; start a worker to run it.",
      ]);
      expect(spawned).toEqual([]);
    });

    it("cancels a queued job and reports a result as not ready", async () => {
      const submitted = setup({ autorun: false });
      await runCli(["--inline", INLINE, "--submit", "--json"], submitted.ctx);
      const jobId = "job_20260201_120000_0000cafe";

      const canceled = setup();
      expect(await runCli(["--cancel", jobId, "--json"], canceled.ctx)).toBe(0);
      expect(dataOf(canceled.stdout)).toEqual({ job_id: jobId, status: "canceled", already_canceled: false });

      const again = setup();
      await runCli(["--cancel", jobId], again.ctx);
      expect(again.stdout).toEqual([`${jobId} was already canceled`]);

      const result = setup();
      expect(await runCli(["--result", jobId, "--json"], result.ctx)).toBe(1);
      expect(envelopeOf(result.stdout).error_code).toBe("JOB_NOT_READY");
    });

    it("reports an unknown job", async () => {
      const { ctx, stdout } = setup();

      await runCli(["--status", "job_missing", "--json"], ctx);

      expect(envelopeOf(stdout)).toEqual({
        status: "error",
        error_code: "JOB_NOT_FOUND",
        message: "Job not found: job_missing",
        hint: "Check the job ID with --list-jobs.",
        details: { job_id: "job_missing" },
      });
    });

    it("prints an empty job list", async () => {
      const { ctx, stdout } = setup();

      await runCli(["--list-jobs"], ctx);

      expect(stdout).toEqual(["No jobs."]);
    });
  });

  describe("batch", () => {
    it("exits 1 when any config failed but still prints an ok envelope", async () => {
      const { ctx, stdout, stderr } = setup();
      const dir = join(temp.dir, "configs");
      const { dimensions: _dimensions, ...invalid } = DOC;
      mkdirSync(dir);
      writeFileSync(join(dir, "a.json"), INLINE);
      writeFileSync(join(dir, "b.json"), JSON.stringify(invalid));

      const code = await runCli(["--batch", dir, "--json"], ctx);

      expect(code).toBe(1);
      const envelope = envelopeOf(stdout);
      expect(envelope.status).toBe("ok");
      expect(envelope.mode).toBe("batch");
      expect(dataOf(stdout)).toMatchObject({ total: 2, succeeded: 1, failed: 1, skipped: 0 });
      expect(stderr).toEqual([]);
    });

    it("prints progress to stderr in human mode", async () => {
      const { ctx, stderr } = setup();
      const file = join(temp.dir, "one.json");
      writeFileSync(file, INLINE);

      const code = await runCli(["--batch", file], ctx);

      expect(code).toBe(0);
      expect(stderr).toEqual(["[1/1] one.json"]);
    });
  });
});
