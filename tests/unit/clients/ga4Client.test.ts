/**
 * Unit tests for the GA4 client
 *
 * Uses the mock HTTP harness; no network
 */

import { describe, it, expect } from "vitest";
import { Ga4Client, buildRunReportRequest, parseGa4Filter } from "@/clients/google";
import { GA4_BASE_URL } from "@/constants/clients/google";
import type { Ga4Descriptor } from "@/types";
import { createMockHttp } from "../../helpers/mockHttp";

const auth = { getAccessToken: async () => "test-token" };

function descriptor(overrides: Partial<Ga4Descriptor> = {}): Ga4Descriptor {
  return {
    schema_version: "1.0",
    source: "ga4",
    property_id: "123456",
    date_range: { start: "2026-03-01", end: "2026-03-07" },
    dimensions: ["date", "pagePath"],
    metrics: ["sessions", "bounceRate"],
    limit: 100,
    ...overrides,
  };
}

describe("parseGa4Filter", () => {
  it("splits conditions and picks the longest operator", () => {
    expect(parseGa4Filter("pagePath=@/blog; sessions>=10;country!=JP")).toEqual([
      { field: "pagePath", operator: "=@", value: "/blog" },
      { field: "sessions", operator: ">=", value: "10" },
      { field: "country", operator: "!=", value: "JP" },
    ]);
  });

  it("rejects a condition without an operator", () => {
    expect(() => parseGa4Filter("pagePath")).toThrow("Invalid filter_d condition: pagePath");
  });
});

describe("buildRunReportRequest", () => {
  it("builds a plain request", () => {
    expect(buildRunReportRequest(descriptor())).toEqual({
      dateRanges: [{ startDate: "2026-03-01", endDate: "2026-03-07" }],
      dimensions: [{ name: "date" }, { name: "pagePath" }],
      metrics: [{ name: "sessions" }, { name: "bounceRate" }],
      limit: 100,
    });
  });

  it("routes conditions to dimension and metric filters", () => {
    const request = buildRunReportRequest(descriptor({ filter_d: "pagePath=@/blog;sessions>=10;country!=JP" }));

    expect(request.dimensionFilter).toEqual({
      andGroup: {
        expressions: [
          { filter: { fieldName: "pagePath", stringFilter: { matchType: "CONTAINS", value: "/blog" } } },
          {
            notExpression: {
              filter: { fieldName: "country", stringFilter: { matchType: "EXACT", value: "JP" } },
            },
          },
        ],
      },
    });
    expect(request.metricFilter).toEqual({
      filter: {
        fieldName: "sessions",
        numericFilter: { operation: "GREATER_THAN_OR_EQUAL", value: { int64Value: "10" } },
      },
    });
  });

  it("uses doubles for fractional metric values", () => {
    const request = buildRunReportRequest(descriptor({ filter_d: "bounceRate<0.5" }));
    expect(request.metricFilter).toEqual({
      filter: { fieldName: "bounceRate", numericFilter: { operation: "LESS_THAN", value: { doubleValue: 0.5 } } },
    });
  });

  it("rejects ordering operators on dimensions and text on metrics", () => {
    expect(() => buildRunReportRequest(descriptor({ filter_d: "pagePath>3" }))).toThrow(
      "Operator > is not supported for dimension pagePath",
    );
    expect(() => buildRunReportRequest(descriptor({ filter_d: "sessions=@1" }))).toThrow(
      "Invalid metric filter: sessions=@1",
    );
  });
});

describe("Ga4Client", () => {
  it("runs the report and converts metrics to numbers", async () => {
    const mock = createMockHttp();
    mock.on("POST", `${GA4_BASE_URL}/properties/123456:runReport`, {
      rows: [
        {
          dimensionValues: [{ value: "20260301" }, { value: "/a" }],
          metricValues: [{ value: "10" }, { value: "0.25" }],
        },
        {
          dimensionValues: [{ value: "20260302" }, { value: "/b" }],
          metricValues: [{ value: "" }, { value: "1" }],
        },
      ],
      rowCount: 2,
    });

    const client = new Ga4Client({ auth, httpRequest: mock.request });
    const table = await client.fetch(descriptor());

    expect(table.columns).toEqual([
      { name: "date", type: "string" },
      { name: "pagePath", type: "string" },
      { name: "sessions", type: "number" },
      { name: "bounceRate", type: "number" },
    ]);
    expect(table.rows).toEqual([
      { date: "20260301", pagePath: "/a", sessions: 10, bounceRate: 0.25 },
      { date: "20260302", pagePath: "/b", sessions: null, bounceRate: 1 },
    ]);

    const [request] = mock.getRecordedRequests();
    expect(request?.headers).toEqual({ Authorization: "Bearer test-token" });
    expect(request?.json).toEqual(buildRunReportRequest(descriptor()));
  });

  it("returns the requested columns when the report has no rows", async () => {
    const mock = createMockHttp();
    mock.on("POST", `${GA4_BASE_URL}/properties/123456:runReport`, {});

    const table = await new Ga4Client({ auth, httpRequest: mock.request }).fetch(descriptor());

    expect(table.rows).toEqual([]);
    expect(table.columns.map((c) => c.name)).toEqual(["date", "pagePath", "sessions", "bounceRate"]);
  });
});
