/**
 * BigQueryClient: BigQuery REST API (jobs.query / getQueryResults / insertAll)
 *
 * Implements the DataSourceClient interface for SQL queries and provides the
 * table operations the BigQuery save target needs.
 */

import type { DataSourceClient } from "@/interfaces";
import type { BigQueryDescriptor, Cell, HttpRequestFn, ResultTable, Row } from "@/types";
import type {
  AccessTokenProvider,
  BigQueryFieldSchema,
  BigQueryInsertAllResponse,
  BigQueryQueryResponse,
} from "@/types/clients/google";
import {
  BIGQUERY_BASE_URL,
  BIGQUERY_MAX_POLLS,
  BIGQUERY_NUMERIC_TYPES,
  BIGQUERY_POLL_INTERVAL_MS,
  BIGQUERY_QUERY_TIMEOUT_MS,
} from "@/constants/clients/google";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { createTable } from "@/table";
import * as logger from "@/logger";
import { sleep as defaultSleep } from "@/utils";

export interface BigQueryClientConfig {
  auth: AccessTokenProvider;

  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;

  /**
   * Optional delay function between polls (for testing)
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Table reference for insert/truncate
 */
export type BigQueryTableRef = {
  projectId: string;
  dataset: string;
  table: string;
};

/**
 * Convert a BigQuery cell to a table cell using its field type
 */
export function convertBigQueryValue(value: unknown, field: BigQueryFieldSchema): Cell {
  if (value === null || value === undefined) {
    return null;
  }
  if (BIGQUERY_NUMERIC_TYPES.some((type) => type === field.type.toUpperCase())) {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}

function queryErrorMessage(response: BigQueryQueryResponse): string | null {
  const errors = response.errors ?? [];
  if (errors.length === 0) return null;
  return errors.map((e) => e.message ?? e.reason ?? "unknown error").join("; ");
}

/**
 * BigQuery implementation of DataSourceClient
 */
export class BigQueryClient implements DataSourceClient<BigQueryDescriptor> {
  readonly source = "bigquery";

  private readonly auth: AccessTokenProvider;
  private readonly httpRequest: HttpRequestFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: BigQueryClientConfig) {
    this.auth = config.auth;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.sleep = config.sleep ?? defaultSleep;
  }

  private async authHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.auth.getAccessToken()}` };
  }

  /**
   * Run a standard SQL statement and wait for it to complete
   *
   * @returns The first page of results (complete job)
   */
  async runQuery(projectId: string, sql: string): Promise<BigQueryQueryResponse> {
    const base = `${BIGQUERY_BASE_URL}/projects/${encodeURIComponent(projectId)}/queries`;

    let response = await this.httpRequest<BigQueryQueryResponse>({
      method: "POST",
      url: base,
      headers: await this.authHeaders(),
      json: { query: sql, useLegacySql: false, timeoutMs: BIGQUERY_QUERY_TIMEOUT_MS },
    });

    let polls = 0;
    while (response.jobComplete === false) {
      const jobRef = response.jobReference;
      if (!jobRef) {
        throw new Error("BigQuery returned an incomplete job without a job reference");
      }
      if (polls >= BIGQUERY_MAX_POLLS) {
        throw new Error(`BigQuery job ${jobRef.jobId} did not complete after ${polls} polls`);
      }
      polls += 1;
      await this.sleep(BIGQUERY_POLL_INTERVAL_MS);
      logger.debug("Polling BigQuery job", { jobId: jobRef.jobId, poll: polls });

      response = await this.httpRequest<BigQueryQueryResponse>({
        method: "GET",
        url: `${base}/${encodeURIComponent(jobRef.jobId)}`,
        headers: await this.authHeaders(),
        query: {
          timeoutMs: BIGQUERY_QUERY_TIMEOUT_MS,
          ...(jobRef.location ? { location: jobRef.location } : {}),
        },
      });
    }

    const error = queryErrorMessage(response);
    if (error) {
      throw new Error(`BigQuery query failed: ${error}`);
    }
    return response;
  }

  async fetch(descriptor: BigQueryDescriptor): Promise<ResultTable> {
    const first = await this.runQuery(descriptor.project_id, descriptor.sql);
    const fields = first.schema?.fields ?? [];
    const names = fields.map((f) => f.name);
    const rows: Row[] = [];

    const collect = (page: BigQueryQueryResponse): void => {
      for (const apiRow of page.rows ?? []) {
        const row: Row = {};
        fields.forEach((field, i) => {
          row[field.name] = convertBigQueryValue(apiRow.f[i]?.v, field);
        });
        rows.push(row);
      }
    };

    collect(first);

    let pageToken = first.pageToken;
    const jobRef = first.jobReference;
    while (pageToken && jobRef) {
      const page = await this.httpRequest<BigQueryQueryResponse>({
        method: "GET",
        url: `${BIGQUERY_BASE_URL}/projects/${encodeURIComponent(descriptor.project_id)}/queries/${encodeURIComponent(jobRef.jobId)}`,
        headers: await this.authHeaders(),
        query: {
          pageToken,
          ...(jobRef.location ? { location: jobRef.location } : {}),
        },
      });
      collect(page);
      pageToken = page.pageToken;
    }

    logger.debug("BigQuery query fetched", { rows: rows.length, totalRows: first.totalRows });

    return createTable(names, rows);
  }

  /**
   * Delete every row of a table (overwrite saves)
   */
  async truncateTable(ref: BigQueryTableRef): Promise<void> {
    await this.runQuery(ref.projectId, `TRUNCATE TABLE \`${ref.projectId}.${ref.dataset}.${ref.table}\``);
  }

  /**
   * Stream rows into a table
   *
   * @throws Error when BigQuery rejects any row
   */
  async insertRows(ref: BigQueryTableRef, rows: Row[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const url =
      `${BIGQUERY_BASE_URL}/projects/${encodeURIComponent(ref.projectId)}` +
      `/datasets/${encodeURIComponent(ref.dataset)}/tables/${encodeURIComponent(ref.table)}/insertAll`;

    const response = await this.httpRequest<BigQueryInsertAllResponse>({
      method: "POST",
      url,
      headers: await this.authHeaders(),
      json: { rows: rows.map((json) => ({ json })) },
    });

    const insertErrors = response.insertErrors ?? [];
    if (insertErrors.length > 0) {
      const first = insertErrors[0];
      const message = first?.errors.map((e) => e.message ?? e.reason).join("; ") ?? "unknown error";
      throw new Error(`BigQuery rejected ${insertErrors.length} row(s): ${message}`);
    }
  }
}
