export type { DataSourceClient, DataSources } from "./clients/dataSourceClient";
