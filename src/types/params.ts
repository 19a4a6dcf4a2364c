/**
 * Query descriptor type definitions
 *
 * Shapes of a validated params document. Raw input is `unknown` until it
 * passes the params validator.
 */

import type { PipelineSpec } from "./pipeline";

export type SourceKind = "ga4" | "gsc" | "bigquery";

export type DateRange = {
  start: string;
  end: string;
};

export type SaveTarget = "csv" | "sheets" | "bigquery";
export type SaveMode = "overwrite" | "append" | "upsert";

export type CsvSaveSpec = {
  to: "csv";
  mode: "overwrite" | "append";
  path: string;
};

export type SheetsSaveSpec = {
  to: "sheets";
  mode: SaveMode;
  sheet_url: string;
  sheet_name: string;
  /** Key columns; required for upsert */
  keys?: string[];
};

export type BigQuerySaveSpec = {
  to: "bigquery";
  mode: "overwrite" | "append";
  project_id: string;
  dataset: string;
  table: string;
};

export type SaveSpec = CsvSaveSpec | SheetsSaveSpec | BigQuerySaveSpec;

type DescriptorBase = {
  schema_version: string;
  pipeline?: PipelineSpec;
  save?: SaveSpec;
};

export type Ga4Descriptor = DescriptorBase & {
  source: "ga4";
  property_id: string;
  date_range: DateRange;
  dimensions: string[];
  metrics: string[];
  /** GA4 dimension filter, e.g. "sessionDefaultChannelGroup==Organic Search" */
  filter_d?: string;
  limit: number;
};

export type GscDescriptor = DescriptorBase & {
  source: "gsc";
  site_url: string;
  date_range: DateRange;
  dimensions: string[];
  /** Search Console filter, e.g. "page:contains:/blog/" */
  filter?: string;
  limit: number;
};

export type BigQueryDescriptor = DescriptorBase & {
  source: "bigquery";
  project_id: string;
  sql: string;
};

export type QueryDescriptor = Ga4Descriptor | GscDescriptor | BigQueryDescriptor;

/**
 * One problem found by the params validator
 */
export type ParamsIssue = {
  error_code: string;
  message: string;
  /** JSONPath-like location, e.g. "$.date_range.start" */
  path: string;
  hint: string;
};

export type ValidationResult =
  | { ok: true; params: QueryDescriptor }
  | { ok: false; errors: ParamsIssue[] };

export type ValidateOptions = {
  /** Reference date for date templates (defaults to today in DATE_TEMPLATE_TZ) */
  reference?: Date;
};

/**
 * Site alias entry in the sites config file
 */
export type SiteAliasEntry = {
  ga4_property_id?: string;
  gsc_site_url?: string;
};

export type SitesConfig = Record<string, SiteAliasEntry>;
