/**
 * Ga4Client: GA4 Data API (runReport)
 *
 * Implements the DataSourceClient interface for GA4 properties.
 * Dimension values stay text; metric values are converted to numbers.
 */

import type { DataSourceClient } from "@/interfaces";
import type { Ga4Descriptor, HttpRequestFn, ResultTable, Row } from "@/types";
import type {
  AccessTokenProvider,
  Ga4FilterExpression,
  Ga4NumericFilter,
  Ga4RunReportRequest,
  Ga4RunReportResponse,
} from "@/types/clients/google";
import { GA4_BASE_URL } from "@/constants/clients/google";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { createTable } from "@/table";
import * as logger from "@/logger";

export interface Ga4ClientConfig {
  auth: AccessTokenProvider;

  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Operators accepted in filter_d, longest first so `>=` wins over `>`
 */
const FILTER_OPERATORS = ["==", "!=", "=@", "!@", "=~", "!~", ">=", "<=", ">", "<"] as const;
type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type Ga4FilterCondition = {
  field: string;
  operator: FilterOperator;
  value: string;
};

const NUMERIC_OPERATIONS: Record<FilterOperator, Ga4NumericFilter["operation"] | undefined> = {
  "==": "EQUAL",
  "!=": "EQUAL",
  ">": "GREATER_THAN",
  ">=": "GREATER_THAN_OR_EQUAL",
  "<": "LESS_THAN",
  "<=": "LESS_THAN_OR_EQUAL",
  "=@": undefined,
  "!@": undefined,
  "=~": undefined,
  "!~": undefined,
};

/**
 * Parse `field<op>value;field2<op>value2`
 *
 * @throws Error on a condition without an operator or field
 */
export function parseGa4Filter(expr: string): Ga4FilterCondition[] {
  return expr
    .split(";")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      let best: { index: number; operator: FilterOperator } | null = null;
      for (const operator of FILTER_OPERATORS) {
        const index = part.indexOf(operator);
        if (index > 0 && (best === null || index < best.index)) {
          best = { index, operator };
        }
      }
      if (best === null) {
        throw new Error(`Invalid filter_d condition: ${part}`);
      }
      return {
        field: part.slice(0, best.index).trim(),
        operator: best.operator,
        value: part.slice(best.index + best.operator.length).trim(),
      };
    });
}

function dimensionExpression(condition: Ga4FilterCondition): Ga4FilterExpression {
  const { field, operator, value } = condition;
  const matchType = operator.endsWith("@")
    ? "CONTAINS"
    : operator.endsWith("~")
      ? "PARTIAL_REGEXP"
      : "EXACT";
  if (operator !== "==" && operator !== "!=" && matchType === "EXACT") {
    throw new Error(`Operator ${operator} is not supported for dimension ${field}`);
  }
  const filter: Ga4FilterExpression = {
    filter: { fieldName: field, stringFilter: { matchType, value } },
  };
  return operator.startsWith("!") ? { notExpression: filter } : filter;
}

function metricExpression(condition: Ga4FilterCondition): Ga4FilterExpression {
  const { field, operator, value } = condition;
  const operation = NUMERIC_OPERATIONS[operator];
  const numeric = Number(value);
  if (operation === undefined || value === "" || !Number.isFinite(numeric)) {
    throw new Error(`Invalid metric filter: ${field}${operator}${value}`);
  }
  const filter: Ga4FilterExpression = {
    filter: {
      fieldName: field,
      numericFilter: {
        operation,
        value: Number.isInteger(numeric) ? { int64Value: String(numeric) } : { doubleValue: numeric },
      },
    },
  };
  return operator === "!=" ? { notExpression: filter } : filter;
}

function combine(expressions: Ga4FilterExpression[]): Ga4FilterExpression | undefined {
  if (expressions.length === 0) return undefined;
  if (expressions.length === 1) return expressions[0];
  return { andGroup: { expressions } };
}

/**
 * Build the runReport request body for a descriptor
 */
export function buildRunReportRequest(descriptor: Ga4Descriptor): Ga4RunReportRequest {
  const conditions = descriptor.filter_d ? parseGa4Filter(descriptor.filter_d) : [];
  const metricNames = new Set(descriptor.metrics);
  const dimensionFilter = combine(
    conditions.filter((c) => !metricNames.has(c.field)).map(dimensionExpression),
  );
  const metricFilter = combine(
    conditions.filter((c) => metricNames.has(c.field)).map(metricExpression),
  );

  return {
    dateRanges: [{ startDate: descriptor.date_range.start, endDate: descriptor.date_range.end }],
    dimensions: descriptor.dimensions.map((name) => ({ name })),
    metrics: descriptor.metrics.map((name) => ({ name })),
    ...(dimensionFilter && { dimensionFilter }),
    ...(metricFilter && { metricFilter }),
    limit: descriptor.limit,
  };
}

function toNumber(value: string | undefined): number | null {
  if (value === undefined || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * GA4 implementation of DataSourceClient
 */
export class Ga4Client implements DataSourceClient<Ga4Descriptor> {
  readonly source = "ga4";

  private readonly auth: AccessTokenProvider;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: Ga4ClientConfig) {
    this.auth = config.auth;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async fetch(descriptor: Ga4Descriptor): Promise<ResultTable> {
    const body = buildRunReportRequest(descriptor);
    const token = await this.auth.getAccessToken();

    logger.debug("Running GA4 report", {
      propertyId: descriptor.property_id,
      dimensions: descriptor.dimensions.length,
      metrics: descriptor.metrics.length,
    });

    const response = await this.httpRequest<Ga4RunReportResponse>({
      method: "POST",
      url: `${GA4_BASE_URL}/properties/${encodeURIComponent(descriptor.property_id)}:runReport`,
      headers: { Authorization: `Bearer ${token}` },
      json: body,
      idempotent: true,
    });

    const rows: Row[] = (response.rows ?? []).map((reportRow) => {
      const row: Row = {};
      descriptor.dimensions.forEach((name, i) => {
        row[name] = reportRow.dimensionValues?.[i]?.value ?? null;
      });
      descriptor.metrics.forEach((name, i) => {
        row[name] = toNumber(reportRow.metricValues?.[i]?.value);
      });
      return row;
    });

    logger.debug("GA4 report fetched", { rows: rows.length, rowCount: response.rowCount });

    return createTable([...descriptor.dimensions, ...descriptor.metrics], rows);
  }
}
