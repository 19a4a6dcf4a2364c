/**
 * Unit tests for table summaries
 */

import { describe, it, expect } from "vitest";
import { createTable, quantile, summarizeTable } from "@/table";

describe("quantile", () => {
  it("interpolates between closest ranks", () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantile([7], 0.75)).toBe(7);
  });
});

describe("summarizeTable", () => {
  const table = createTable(
    ["page", "clicks"],
    [
      { page: "/a", clicks: 1 },
      { page: "/b", clicks: 2 },
      { page: "/a", clicks: 3 },
      { page: null, clicks: 4 },
      { page: "/a", clicks: null },
    ],
  );

  it("describes shape, types and nulls", () => {
    const summary = summarizeTable(table);
    expect(summary.row_count).toBe(5);
    expect(summary.column_count).toBe(2);
    expect(summary.columns).toEqual(["page", "clicks"]);
    expect(summary.dtypes).toEqual({ page: "string", clicks: "number" });
    expect(summary.null_counts).toEqual({ page: 1, clicks: 1 });
  });

  it("summarizes numeric columns", () => {
    const clicks = summarizeTable(table).numeric_summary.clicks;
    expect(clicks).toMatchObject({ count: 4, mean: 2.5, min: 1, p25: 1.75, p50: 2.5, p75: 3.25, max: 4 });
    expect(clicks?.std).toBeCloseTo(1.290994, 5);
  });

  it("lists top values for other columns with a null label", () => {
    const summary = summarizeTable(table);
    expect(summary.top_values).toEqual({
      page: [
        { value: "/a", count: 3 },
        { value: "/b", count: 1 },
        { value: "<NA>", count: 1 },
      ],
    });
    expect(summary.numeric_summary.page).toBeUndefined();
  });

  it("handles an empty numeric column", () => {
    const summary = summarizeTable(createTable(["n"], []));
    expect(summary.top_values).toEqual({ n: [] });
    expect(summary.dtypes).toEqual({ n: "string" });
  });
});
