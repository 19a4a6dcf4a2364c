/**
 * GscClient: Search Console search analytics
 *
 * Implements the DataSourceClient interface for Search Console properties.
 * Pages through results GSC_PAGE_SIZE rows at a time until `limit` rows are
 * collected or the API returns a short page.
 */

import type { DataSourceClient } from "@/interfaces";
import type { GscDescriptor, HttpRequestFn, ResultTable, Row } from "@/types";
import type {
  AccessTokenProvider,
  GscDimensionFilter,
  GscQueryRequest,
  GscQueryResponse,
} from "@/types/clients/google";
import { GSC_BASE_URL, GSC_METRIC_COLUMNS, GSC_PAGE_SIZE } from "@/constants/clients/google";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { createTable } from "@/table";
import * as logger from "@/logger";

export interface GscClientConfig {
  auth: AccessTokenProvider;

  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;

  /**
   * Rows per request (defaults to the API maximum)
   */
  pageSize?: number;
}

/**
 * Parse `dimension:operator:expression;...`
 *
 * The expression is everything after the second colon, so URLs keep their
 * scheme separator.
 *
 * @throws Error on a condition with fewer than three parts
 */
export function parseGscFilter(expr: string): GscDimensionFilter[] {
  return expr
    .split(";")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const first = part.indexOf(":");
      const second = first === -1 ? -1 : part.indexOf(":", first + 1);
      if (first <= 0 || second === -1) {
        throw new Error(`Invalid filter condition: ${part} (expected dimension:operator:expression)`);
      }
      return {
        dimension: part.slice(0, first).trim(),
        operator: part.slice(first + 1, second).trim(),
        expression: part.slice(second + 1),
      };
    });
}

function toNumber(value: number | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function clicksOf(row: Row): number {
  return typeof row.clicks === "number" ? row.clicks : 0;
}

/**
 * Search Console implementation of DataSourceClient
 */
export class GscClient implements DataSourceClient<GscDescriptor> {
  readonly source = "gsc";

  private readonly auth: AccessTokenProvider;
  private readonly httpRequest: HttpRequestFn;
  private readonly pageSize: number;

  constructor(config: GscClientConfig) {
    this.auth = config.auth;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.pageSize = config.pageSize ?? GSC_PAGE_SIZE;
  }

  async fetch(descriptor: GscDescriptor): Promise<ResultTable> {
    const filters = descriptor.filter ? parseGscFilter(descriptor.filter) : [];
    const token = await this.auth.getAccessToken();
    const url = `${GSC_BASE_URL}/sites/${encodeURIComponent(descriptor.site_url)}/searchAnalytics/query`;

    const rows: Row[] = [];
    let startRow = 0;

    while (rows.length < descriptor.limit) {
      const rowLimit = Math.min(this.pageSize, descriptor.limit - rows.length);
      const body: GscQueryRequest = {
        startDate: descriptor.date_range.start,
        endDate: descriptor.date_range.end,
        dimensions: descriptor.dimensions,
        rowLimit,
        startRow,
        ...(filters.length > 0 && {
          dimensionFilterGroups: [{ groupType: "and", filters }],
        }),
      };

      const response = await this.httpRequest<GscQueryResponse>({
        method: "POST",
        url,
        headers: { Authorization: `Bearer ${token}` },
        json: body,
        idempotent: true,
      });

      const page = response.rows ?? [];
      for (const apiRow of page) {
        const row: Row = {};
        descriptor.dimensions.forEach((name, i) => {
          row[name] = apiRow.keys?.[i] ?? null;
        });
        for (const metric of GSC_METRIC_COLUMNS) {
          row[metric] = toNumber(apiRow[metric]);
        }
        rows.push(row);
      }

      logger.debug("Search Console page fetched", { startRow, rows: page.length });

      if (page.length < rowLimit) {
        break;
      }
      startRow += page.length;
    }

    const limited = rows.slice(0, descriptor.limit);
    limited.sort((a, b) => clicksOf(b) - clicksOf(a));

    return createTable([...descriptor.dimensions, ...GSC_METRIC_COLUMNS], limited);
  }
}
