/**
 * Google API client constants
 *
 * Endpoints, OAuth scopes and paging tunables for GA4, Search Console and BigQuery
 */

/**
 * Google OAuth2 token URL for service account authentication
 */
export const GOOGLE_OAUTH2_TOKEN_URL = "https://oauth2.googleapis.com/token";

export const GOOGLE_JWT_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:jwt-bearer";

/**
 * Scopes requested by the shared service-account token
 */
export const GOOGLE_API_SCOPES = [
  "https://www.googleapis.com/auth/analytics.readonly",
  "https://www.googleapis.com/auth/webmasters.readonly",
  "https://www.googleapis.com/auth/bigquery",
  "https://www.googleapis.com/auth/spreadsheets",
];

/**
 * JWT expiration time in seconds (1 hour)
 */
export const GOOGLE_JWT_EXPIRATION_SECONDS = 3600;

/**
 * Refresh the token this many seconds before it expires
 */
export const GOOGLE_TOKEN_EXPIRY_BUFFER_SECONDS = 60;

export const GOOGLE_MS_PER_SECOND = 1000;

/**
 * GA4 Data API
 */
export const GA4_BASE_URL = "https://analyticsdata.googleapis.com/v1beta";

/**
 * Search Console API
 */
export const GSC_BASE_URL = "https://www.googleapis.com/webmasters/v3";

/**
 * Maximum rows per Search Console request
 */
export const GSC_PAGE_SIZE = 25_000;

/**
 * Metric columns appended after the requested dimensions
 */
export const GSC_METRIC_COLUMNS = ["clicks", "impressions", "ctr", "position"] as const;

/**
 * BigQuery REST API
 */
export const BIGQUERY_BASE_URL = "https://bigquery.googleapis.com/bigquery/v2";

/**
 * Server-side wait per jobs.query / getQueryResults call
 */
export const BIGQUERY_QUERY_TIMEOUT_MS = 60_000;

/**
 * Maximum polls of getQueryResults before giving up on an unfinished job
 */
export const BIGQUERY_MAX_POLLS = 60;

export const BIGQUERY_POLL_INTERVAL_MS = 2_000;

/**
 * Rows per tabledata.insertAll request
 */
export const BIGQUERY_INSERT_BATCH_SIZE = 500;

/**
 * BigQuery field types converted to numbers
 */
export const BIGQUERY_NUMERIC_TYPES = [
  "INTEGER",
  "INT64",
  "FLOAT",
  "FLOAT64",
  "NUMERIC",
  "BIGNUMERIC",
] as const;
