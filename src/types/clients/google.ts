/**
 * Google API type definitions (auth, GA4 Data API, Search Console, BigQuery)
 *
 * These types represent wire payloads. They are intentionally NOT exported
 * from the global types barrel (@/types).
 */

/**
 * Service account credentials for Google API authentication
 */
export type GoogleServiceAccountCredentials = {
  clientEmail: string;
  privateKey: string;
  projectId?: string;
};

/**
 * Service account key file (subset of fields we read)
 */
export type GoogleServiceAccountKeyFile = {
  client_email?: unknown;
  private_key?: unknown;
  project_id?: unknown;
};

/**
 * OAuth2 token response from Google
 */
export type GoogleOAuth2TokenResponse = {
  access_token: string;
  expires_in: number;
  token_type: string;
};

/**
 * Source of bearer tokens for Google API calls
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

// GA4 Data API (v1beta runReport)

export type Ga4StringFilter = {
  matchType: "EXACT" | "CONTAINS" | "PARTIAL_REGEXP";
  value: string;
  caseSensitive?: boolean;
};

export type Ga4NumericFilter = {
  operation: "EQUAL" | "LESS_THAN" | "LESS_THAN_OR_EQUAL" | "GREATER_THAN" | "GREATER_THAN_OR_EQUAL";
  value: { int64Value: string } | { doubleValue: number };
};

export type Ga4FilterExpression =
  | { filter: { fieldName: string; stringFilter: Ga4StringFilter } }
  | { filter: { fieldName: string; numericFilter: Ga4NumericFilter } }
  | { notExpression: Ga4FilterExpression }
  | { andGroup: { expressions: Ga4FilterExpression[] } };

export type Ga4RunReportRequest = {
  dateRanges: { startDate: string; endDate: string }[];
  dimensions: { name: string }[];
  metrics: { name: string }[];
  dimensionFilter?: Ga4FilterExpression;
  metricFilter?: Ga4FilterExpression;
  limit: number;
};

export type Ga4RunReportResponse = {
  dimensionHeaders?: { name: string }[];
  metricHeaders?: { name: string; type?: string }[];
  rows?: {
    dimensionValues?: { value?: string }[];
    metricValues?: { value?: string }[];
  }[];
  rowCount?: number;
};

// Search Console searchAnalytics.query

export type GscDimensionFilter = {
  dimension: string;
  operator: string;
  expression: string;
};

export type GscQueryRequest = {
  startDate: string;
  endDate: string;
  dimensions: string[];
  rowLimit: number;
  startRow: number;
  dimensionFilterGroups?: { groupType: "and"; filters: GscDimensionFilter[] }[];
};

export type GscQueryResponse = {
  rows?: {
    keys?: string[];
    clicks?: number;
    impressions?: number;
    ctr?: number;
    position?: number;
  }[];
};

// BigQuery REST v2

export type BigQueryFieldSchema = {
  name: string;
  type: string;
  mode?: string;
};

export type BigQueryRow = {
  f: { v: unknown }[];
};

export type BigQueryQueryResponse = {
  jobComplete?: boolean;
  jobReference?: { projectId: string; jobId: string; location?: string };
  schema?: { fields?: BigQueryFieldSchema[] };
  rows?: BigQueryRow[];
  pageToken?: string;
  totalRows?: string;
  errors?: { message?: string; reason?: string }[];
};

export type BigQueryInsertAllResponse = {
  insertErrors?: { index: number; errors: { message?: string; reason?: string }[] }[];
};
