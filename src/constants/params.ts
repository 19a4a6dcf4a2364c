/**
 * Params schema constants
 */

import type { SourceKind } from "@/types";

/**
 * The only params schema version accepted
 */
export const SCHEMA_VERSION = "1.0";

/**
 * Hard upper bound for `limit`
 */
export const MAX_LIMIT = 100_000;

/**
 * `limit` used when a ga4/gsc document omits it
 */
export const DEFAULT_LIMIT = 1000;

export const SUPPORTED_SOURCES: readonly SourceKind[] = ["ga4", "gsc", "bigquery"];

/**
 * Fields every document must carry regardless of source
 */
export const COMMON_REQUIRED_FIELDS = ["schema_version", "source"] as const;

/**
 * Field sets per source. A document may carry only the common fields plus
 * the required and optional fields of its source.
 */
export const SOURCE_FIELDS: Record<
  SourceKind,
  { required: readonly string[]; optional: readonly string[] }
> = {
  ga4: {
    required: ["property_id", "date_range", "dimensions", "metrics"],
    optional: ["filter_d", "limit", "pipeline", "save"],
  },
  gsc: {
    required: ["site_url", "date_range", "dimensions"],
    optional: ["filter", "limit", "pipeline", "save"],
  },
  bigquery: {
    required: ["project_id", "sql"],
    optional: ["pipeline", "save"],
  },
};

export const DATE_RANGE_FIELDS = ["start", "end"] as const;

export const PIPELINE_STRING_FIELDS = [
  "transform",
  "where",
  "group_by",
  "aggregate",
  "sort",
  "columns",
] as const;

export const PIPELINE_FIELDS = [...PIPELINE_STRING_FIELDS, "head"] as const;

export const SAVE_FIELDS = [
  "to",
  "mode",
  "path",
  "sheet_url",
  "sheet_name",
  "project_id",
  "dataset",
  "table",
  "keys",
] as const;

export const SAVE_TARGETS = ["csv", "sheets", "bigquery"] as const;
export const SAVE_MODES = ["overwrite", "append", "upsert"] as const;

/**
 * Worksheet tab used when a sheets save omits sheet_name
 */
export const DEFAULT_SHEET_NAME = "data";

/**
 * Sites alias file, relative to cwd (overridable via SITES_CONFIG_PATH)
 */
export const DEFAULT_SITES_CONFIG_PATH = "configs/sites.json";

/**
 * Default params file for the CLI
 */
export const DEFAULT_PARAMS_PATH = "input/params.json";
