/**
 * DataSourceClient interface: source-agnostic contract for tabular data fetches
 *
 * Every source (GA4, Search Console, BigQuery) implements this interface so
 * query execution can fetch a ResultTable without knowing which API it hits.
 * Tests replace the real clients with in-process fakes.
 */

import type {
  BigQueryDescriptor,
  Ga4Descriptor,
  GscDescriptor,
  QueryDescriptor,
  ResultTable,
  SourceKind,
} from "@/types";

export interface DataSourceClient<D extends QueryDescriptor = QueryDescriptor> {
  /**
   * Source identifier
   */
  readonly source: SourceKind;

  /**
   * Fetch the complete result for a validated descriptor
   *
   * @returns Table with the columns the source produced (possibly no rows)
   */
  fetch(descriptor: D): Promise<ResultTable>;
}

/**
 * One client per source
 */
export type DataSources = {
  ga4: DataSourceClient<Ga4Descriptor>;
  gsc: DataSourceClient<GscDescriptor>;
  bigquery: DataSourceClient<BigQueryDescriptor>;
};
