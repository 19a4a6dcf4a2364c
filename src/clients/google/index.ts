/**
 * Google API clients public API
 */

export { ServiceAccountAuth, credentialsFromEnv, readKeyFile } from "./serviceAccountAuth";
export { Ga4Client, parseGa4Filter, buildRunReportRequest } from "./ga4Client";
export { GscClient, parseGscFilter } from "./gscClient";
export { BigQueryClient, convertBigQueryValue, type BigQueryTableRef } from "./bigQueryClient";
export { createGoogleDataSources, fetchTable, type GoogleClientsConfig } from "./dataSources";
