/**
 * Worker integration tests
 *
 * Queued jobs are claimed oldest first and run one at a time.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { BigQueryDescriptor, GscDescriptor, QueryDescriptor } from "@/types";
import { ArtifactStore, JobManager, generateJobId, runWorker } from "@/jobs";
import { createTable } from "@/table";
import { createTempDir, createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { createFakeDataSources, createFakeSaveContext } from "../../helpers/fakes";

function gscParams(siteUrl: string): GscDescriptor {
  return {
    schema_version: "1.0",
    source: "gsc",
    site_url: siteUrl,
    date_range: { start: "2026-01-01", end: "2026-01-31" },
    dimensions: ["page"],
    limit: 1000,
  };
}

const BIGQUERY_PARAMS: BigQueryDescriptor = {
  schema_version: "1.0",
  source: "bigquery",
  project_id: "test-project",
  sql: "SELECT 1",
};

const PAGES = createTable(["page", "clicks"], [{ page: "/a", clicks: 5 }]);

function describeCall(descriptor: QueryDescriptor): string {
  return descriptor.source === "gsc" ? descriptor.site_url : descriptor.source;
}

describe("runWorker", () => {
  let harness: TestDbHarness;
  let temp: { dir: string; cleanup: () => void };
  let manager: JobManager;

  beforeEach(() => {
    harness = createTestDbSync();
    temp = createTempDir("worker");
    let tick = 0;
    manager = new JobManager({
      artifacts: new ArtifactStore(temp.dir),
      now: () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)),
      newJobId: (now) => generateJobId(now, "00000001"),
    });
  });

  afterEach(() => {
    harness.cleanup();
    temp.cleanup();
  });

  it("drains the queue oldest first in once mode", async () => {
    const first = manager.submit(gscParams("https://one.example/"));
    const second = manager.submit(BIGQUERY_PARAMS);
    const third = manager.submit(gscParams("https://three.example/"));
    const dataSources = createFakeDataSources({ gsc: PAGES, bigquery: new Error("access denied") });

    const result = await runWorker({
      manager,
      context: { dataSources, saveContext: createFakeSaveContext().context },
      mode: "once",
    });

    expect(result).toEqual({ processed: 3, succeeded: 2, failed: 1, canceled: 0 });
    expect(dataSources.calls.map(describeCall)).toEqual([
      "https://one.example/",
      "bigquery",
      "https://three.example/",
    ]);
    expect(manager.status(first.job_id).status).toBe("succeeded");
    expect(manager.status(second.job_id).error?.code).toBe("QUERY_EXECUTION_FAILED");
    expect(manager.status(third.job_id).status).toBe("succeeded");
  });

  it("skips canceled jobs and returns at once on an empty queue", async () => {
    const job = manager.submit(gscParams("https://one.example/"));
    manager.cancel(job.job_id);
    const dataSources = createFakeDataSources({ gsc: PAGES });

    const result = await runWorker({
      manager,
      context: { dataSources, saveContext: createFakeSaveContext().context },
      mode: "once",
    });

    expect(result).toEqual({ processed: 0, succeeded: 0, failed: 0, canceled: 0 });
    expect(dataSources.calls).toHaveLength(0);
  });

  it("counts a job canceled during execution", async () => {
    const job = manager.submit(gscParams("https://one.example/"));
    const dataSources = createFakeDataSources({
      gsc: () => {
        manager.cancel(job.job_id);
        return PAGES;
      },
    });

    const result = await runWorker({
      manager,
      context: { dataSources, saveContext: createFakeSaveContext().context },
      mode: "once",
    });

    expect(result).toEqual({ processed: 1, succeeded: 0, failed: 0, canceled: 1 });
  });

  it("stops forever mode once the signal aborts", async () => {
    manager.submit(gscParams("https://one.example/"));
    const controller = new AbortController();
    const dataSources = createFakeDataSources({
      gsc: () => {
        controller.abort();
        return PAGES;
      },
    });

    const result = await runWorker({
      manager,
      context: { dataSources, saveContext: createFakeSaveContext().context },
      mode: "forever",
      pollIntervalMs: 1,
      signal: controller.signal,
    });

    expect(result).toEqual({ processed: 1, succeeded: 1, failed: 0, canceled: 0 });
  });

  it("returns without claiming when the signal is already aborted", async () => {
    const job = manager.submit(gscParams("https://one.example/"));
    const controller = new AbortController();
    controller.abort();

    const result = await runWorker({
      manager,
      context: {
        dataSources: createFakeDataSources({ gsc: PAGES }),
        saveContext: createFakeSaveContext().context,
      },
      mode: "forever",
      signal: controller.signal,
    });

    expect(result.processed).toBe(0);
    expect(manager.status(job.job_id).status).toBe("queued");
  });
});
