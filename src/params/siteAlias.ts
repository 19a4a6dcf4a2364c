/**
 * Site alias expansion
 *
 * A params document may name a site by alias (`"site": "corp"`). The alias is
 * looked up in the sites config and replaced by `property_id` (ga4) or
 * `site_url` (gsc) before validation. Explicit fields win over the alias.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import type { SiteAliasEntry, SitesConfig } from "@/types";
import { DEFAULT_SITES_CONFIG_PATH } from "@/constants";
import { QueryError, errorMessage } from "@/errors";
import { isPlainObject, type JsonObject } from "@/utils";
import * as logger from "@/logger";

function toEntry(value: unknown): SiteAliasEntry {
  if (!isPlainObject(value)) {
    return {};
  }
  const entry: SiteAliasEntry = {};
  if (typeof value.ga4_property_id === "string") {
    entry.ga4_property_id = value.ga4_property_id;
  }
  if (typeof value.gsc_site_url === "string") {
    entry.gsc_site_url = value.gsc_site_url;
  }
  return entry;
}

/**
 * Sites config path from SITES_CONFIG_PATH or the default
 */
export function getSitesConfigPath(): string {
  return resolve(process.cwd(), process.env.SITES_CONFIG_PATH || DEFAULT_SITES_CONFIG_PATH);
}

/**
 * Load the sites config. A missing file is an empty config.
 *
 * @throws QueryError INVALID_SITE_ALIAS when the file exists but is not a JSON object
 */
export function loadSitesConfig(path: string = getSitesConfigPath()): SitesConfig {
  if (!existsSync(path)) {
    logger.debug("Sites config not found", { path });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new QueryError("INVALID_SITE_ALIAS", `Failed to read sites config ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (!isPlainObject(parsed)) {
    throw new QueryError("INVALID_SITE_ALIAS", `Sites config ${path} must be a JSON object`);
  }

  const sites: SitesConfig = {};
  for (const [alias, value] of Object.entries(parsed)) {
    sites[alias] = toEntry(value);
  }
  return sites;
}

/**
 * Expand the `site` alias of a raw params document
 *
 * Returns the input unchanged when it has no `site` key (or is not an
 * object); otherwise returns a new document without `site`.
 *
 * @throws QueryError INVALID_SITE_ALIAS for an unknown alias
 */
export function expandSiteAlias(raw: unknown, sites?: SitesConfig): unknown {
  if (!isPlainObject(raw) || !("site" in raw)) {
    return raw;
  }

  const alias = raw.site;
  const config = sites ?? loadSitesConfig();
  const entry = typeof alias === "string" ? config[alias] : undefined;

  if (entry === undefined) {
    const available = Object.keys(config).sort().join(", ") || "(none)";
    throw new QueryError(
      "INVALID_SITE_ALIAS",
      `Unknown site alias '${String(alias)}'. Available: ${available}`,
      { details: { site: alias } },
    );
  }

  const expanded: JsonObject = { ...raw };
  delete expanded.site;

  const source = typeof raw.source === "string" ? raw.source.toLowerCase() : "";
  if (source === "ga4" && !("property_id" in raw) && entry.ga4_property_id) {
    expanded.property_id = entry.ga4_property_id;
  }
  if (source === "gsc" && !("site_url" in raw) && entry.gsc_site_url) {
    expanded.site_url = entry.gsc_site_url;
  }
  return expanded;
}
