/**
 * Data source registry
 */

import type { DataSources } from "@/interfaces";
import type { HttpRequestFn, QueryDescriptor, ResultTable } from "@/types";
import type { AccessTokenProvider } from "@/types/clients/google";
import { BigQueryClient } from "./bigQueryClient";
import { Ga4Client } from "./ga4Client";
import { GscClient } from "./gscClient";
import { ServiceAccountAuth } from "./serviceAccountAuth";

export type GoogleClientsConfig = {
  auth?: AccessTokenProvider;
  httpRequest?: HttpRequestFn;
};

/**
 * Build the production clients sharing one service-account token
 */
export function createGoogleDataSources(config: GoogleClientsConfig = {}): DataSources {
  const auth = config.auth ?? new ServiceAccountAuth({ httpRequest: config.httpRequest });
  const shared = { auth, httpRequest: config.httpRequest };
  return {
    ga4: new Ga4Client(shared),
    gsc: new GscClient(shared),
    bigquery: new BigQueryClient(shared),
  };
}

/**
 * Dispatch a descriptor to the client for its source
 */
export function fetchTable(sources: DataSources, descriptor: QueryDescriptor): Promise<ResultTable> {
  switch (descriptor.source) {
    case "ga4":
      return sources.ga4.fetch(descriptor);
    case "gsc":
      return sources.gsc.fetch(descriptor);
    case "bigquery":
      return sources.bigquery.fetch(descriptor);
  }
}
