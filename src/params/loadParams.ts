/**
 * Params loading
 *
 * Reads a params document from a file or an inline JSON string, expands the
 * site alias and validates it. Failures are QueryErrors.
 */

import { existsSync, readFileSync } from "fs";
import type { QueryDescriptor, SitesConfig, ValidateOptions } from "@/types";
import { QueryError, errorMessage } from "@/errors";
import { expandSiteAlias } from "./siteAlias";
import { validateParams } from "./paramsValidator";

export type PrepareParamsOptions = ValidateOptions & {
  sites?: SitesConfig;
};

/**
 * Parse JSON text, mapping syntax errors to INVALID_JSON
 */
export function parseParamsJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new QueryError("INVALID_JSON", `Invalid JSON in ${origin}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Read and parse a params file (not validated)
 */
export function loadParamsFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new QueryError("PARAMS_FILE_NOT_FOUND", `Params file not found: ${path}`, {
      details: { path },
    });
  }
  return parseParamsJson(readFileSync(path, "utf-8"), path);
}

/**
 * Parse an inline params string (not validated)
 */
export function loadParamsInline(json: string): unknown {
  return parseParamsJson(json, "--inline");
}

/**
 * Expand the site alias and validate a parsed params document
 *
 * @throws QueryError INVALID_SITE_ALIAS or PARAMS_VALIDATION_FAILED (with details.errors)
 */
export function prepareParams(raw: unknown, options: PrepareParamsOptions = {}): QueryDescriptor {
  const expanded = expandSiteAlias(raw, options.sites);
  const result = validateParams(expanded, { reference: options.reference });
  if (!result.ok) {
    throw new QueryError(
      "PARAMS_VALIDATION_FAILED",
      `Params validation failed (${result.errors.length} error(s))`,
      { details: { errors: result.errors } },
    );
  }
  return result.params;
}
