/**
 * Unit tests for the pipeline engine
 */

import { describe, it, expect } from "vitest";
import { configuredStages, executePipeline } from "@/pipeline";
import { JobCanceledError, PipelineStageError, QueryError } from "@/errors";
import { createTable } from "@/table";
import type { Row } from "@/types";

const small = createTable(
  ["date", "page", "clicks"],
  [
    { date: "20260301", page: "/a?x=1", clicks: 4 },
    { date: "20260301", page: "/b", clicks: 1 },
    { date: "20260302", page: "/a?x=2", clicks: 6 },
  ],
);

describe("configuredStages", () => {
  it("uses the fixed order regardless of field order", () => {
    expect(
      configuredStages({ head: 1, columns: "page", sort: "page", where: "clicks > 0", transform: "page:strip_qs" }),
    ).toEqual(["transform", "where", "sort", "columns", "head"]);
  });

  it("treats blank strings as absent", () => {
    expect(configuredStages({ where: "  ", sort: "", head: 0 })).toEqual(["head"]);
    expect(configuredStages({})).toEqual([]);
  });
});

describe("executePipeline", () => {
  it("runs every configured stage in order", () => {
    const { table, meta } = executePipeline(small, {
      aggregate: "sum:clicks",
      group_by: "page",
      transform: "page:strip_qs",
      sort: "sum_clicks DESC",
    });

    expect(table.rows).toEqual([
      { page: "/a", sum_clicks: 10 },
      { page: "/b", sum_clicks: 1 },
    ]);
    expect(meta).toEqual({ input_rows: 3, output_rows: 2, stages: ["transform", "group_aggregate", "sort"] });
  });

  it("returns the input unchanged for an empty spec", () => {
    const { table, meta } = executePipeline(small, {});
    expect(table).toBe(small);
    expect(meta).toEqual({ input_rows: 3, output_rows: 3, stages: [] });
  });

  it("does not modify the input table", () => {
    executePipeline(small, { transform: "date:date_format", head: 1 });
    expect(small.rows[0]).toEqual({ date: "20260301", page: "/a?x=1", clicks: 4 });
  });

  it("gives the same output when the same spec runs twice", () => {
    const spec = {
      transform: "date:date_format,page:strip_qs",
      where: "clicks > 0",
      group_by: "date",
      aggregate: "sum:clicks",
      sort: "sum_clicks DESC",
      columns: "sum_clicks,date",
      head: 1,
    };
    const before = structuredClone(small);

    const first = executePipeline(small, spec);
    const second = executePipeline(small, spec);

    expect(second).toEqual(first);
    expect(first.table.rows).toEqual([{ sum_clicks: 6, date: "2026-03-02" }]);
    expect(first.meta.stages).toEqual(["transform", "where", "group_aggregate", "sort", "columns", "head"]);
    expect(small).toEqual(before);
  });

  it("requires group_by and aggregate together", () => {
    expect(() => executePipeline(small, { group_by: "page" })).toThrow(
      "group_by and aggregate must be specified together",
    );
  });

  it("reports the failed stage with what completed before it", () => {
    try {
      executePipeline(small, { where: "clicks > 1", sort: "views" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PipelineStageError);
      if (err instanceof PipelineStageError) {
        expect(err.code).toBe("INVALID_SORT");
        expect(err.stage).toBe("sort");
        expect(err.completedStages).toEqual(["where"]);
        expect(err.details).toEqual({
          columns: ["views"],
          stage: "sort",
          completed_stages: ["where"],
          rows_before_stage: 2,
          columns_before_stage: ["date", "page", "clicks"],
        });
      }
    }
  });

  it("calls the checkpoint before every stage", () => {
    const seen: string[] = [];
    executePipeline(small, { where: "clicks > 1", head: 1 }, { checkpoint: (stage) => seen.push(stage) });
    expect(seen).toEqual(["where", "head"]);
  });

  it("lets checkpoint errors propagate unchanged", () => {
    const checkpoint = (stage: string): void => {
      if (stage === "sort") throw new JobCanceledError("job-1", stage);
    };
    expect(() => executePipeline(small, { where: "clicks > 1", sort: "page" }, { checkpoint })).toThrow(
      JobCanceledError,
    );
  });

  it("wraps stage errors as QueryErrors", () => {
    expect(() => executePipeline(small, { columns: "views" })).toThrow(QueryError);
  });

  it("filters, sorts and limits a larger table", () => {
    const rows: Row[] = Array.from({ length: 100 }, (_, i) => ({ page: `/p${i}`, clicks: (i * 37) % 101 }));
    const input = createTable(["page", "clicks"], rows);

    const { table, meta } = executePipeline(input, { where: "clicks > 10", sort: "clicks DESC", head: 5 });

    expect(table.rows.map((r) => r.clicks)).toEqual([100, 99, 98, 97, 96]);
    expect(table.rows.map((r) => r.page)).toEqual(["/p30", "/p60", "/p90", "/p19", "/p49"]);
    expect(meta).toEqual({ input_rows: 100, output_rows: 5, stages: ["where", "sort", "head"] });
  });
});
