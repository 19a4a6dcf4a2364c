/**
 * Unit tests for the columns and head stages
 */

import { describe, it, expect } from "vitest";
import { applyColumns, applyHead } from "@/pipeline";
import { QueryError } from "@/errors";
import { createTable } from "@/table";

const table = createTable(
  ["date", "page", "clicks"],
  [
    { date: "2026-03-01", page: "/a", clicks: 1 },
    { date: "2026-03-02", page: "/b", clicks: 2 },
    { date: "2026-03-03", page: "/c", clicks: 3 },
  ],
);

describe("applyColumns", () => {
  it("projects and reorders", () => {
    const result = applyColumns(table, "clicks, page");
    expect(result.columns).toEqual([
      { name: "clicks", type: "number" },
      { name: "page", type: "string" },
    ]);
    expect(result.rows[0]).toEqual({ clicks: 1, page: "/a" });
  });

  it("reports unknown columns with the available names", () => {
    try {
      applyColumns(table, "page,views");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(QueryError);
      if (err instanceof QueryError) {
        expect(err.code).toBe("INVALID_COLUMNS");
        expect(err.message).toBe("Unknown column(s): views");
        expect(err.details).toEqual({ columns: ["views"], available: ["date", "page", "clicks"] });
      }
    }
  });

  it("rejects duplicates and empty lists", () => {
    expect(() => applyColumns(table, "page,page")).toThrow("Duplicate column(s): page");
    expect(() => applyColumns(table, "")).toThrow("Invalid columns expression: expression is empty");
  });
});

describe("applyHead", () => {
  it("keeps the first n rows", () => {
    expect(applyHead(table, 2).rows.map((r) => r.page)).toEqual(["/a", "/b"]);
    expect(applyHead(table, 10).rows).toHaveLength(3);
  });

  it("allows zero", () => {
    const result = applyHead(table, 0);
    expect(result.rows).toEqual([]);
    expect(result.columns).toHaveLength(3);
  });

  it("rejects negative values", () => {
    expect(() => applyHead(table, -1)).toThrow("head must be a non-negative integer: -1");
  });
});
