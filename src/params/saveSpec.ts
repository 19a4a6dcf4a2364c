/**
 * SaveSpec validation
 */

import type { SaveMode, SaveSpec, SaveTarget } from "@/types";
import { DEFAULT_SHEET_NAME, SAVE_FIELDS, SAVE_MODES, SAVE_TARGETS } from "@/constants";
import { isPlainObject, isStringArray, type JsonObject } from "@/utils";
import type { IssueCollector } from "./issues";

const STRING_FIELDS = ["path", "sheet_url", "sheet_name", "project_id", "dataset", "table"] as const;

function isSaveTarget(value: unknown): value is SaveTarget {
  return SAVE_TARGETS.some((target) => target === value);
}

function isSaveMode(value: unknown): value is SaveMode {
  return SAVE_MODES.some((mode) => mode === value);
}

function isSaveField(key: string): boolean {
  return SAVE_FIELDS.some((field) => field === key);
}

function requireField(
  save: JsonObject,
  key: string,
  path: string,
  label: string,
  hint: string,
  issues: IssueCollector,
): void {
  if (!(key in save)) {
    issues.add("MISSING_REQUIRED", `save.${key} is required for ${label}`, `${path}.${key}`, hint);
  }
}

/**
 * Validate a save object, reporting problems into `issues`
 *
 * @returns The typed spec (mode defaulted to overwrite), or undefined when any
 * problem was found
 */
export function readSaveSpec(
  value: unknown,
  path: string,
  issues: IssueCollector,
): SaveSpec | undefined {
  if (!isPlainObject(value)) {
    issues.add(
      "INVALID_TYPE",
      "save must be an object",
      path,
      'Use {"to": "csv", "path": "output/report.csv"}.',
    );
    return undefined;
  }

  const before = issues.issues.length;
  const allowed = [...SAVE_FIELDS].sort().join(", ");

  for (const key of Object.keys(value).sort()) {
    if (!isSaveField(key)) {
      issues.add("UNKNOWN_FIELD", `Unknown save field: ${key}`, `${path}.${key}`, `Allowed: ${allowed}.`);
    }
  }

  const to = value.to;
  if (!isSaveTarget(to)) {
    issues.add(
      "INVALID_SAVE_TARGET",
      `save.to must be one of: ${[...SAVE_TARGETS].sort().join(", ")}`,
      `${path}.to`,
      "Use csv, sheets or bigquery.",
    );
  }

  const mode = value.mode === undefined ? "overwrite" : value.mode;
  if (!isSaveMode(mode)) {
    issues.add(
      "INVALID_SAVE_MODE",
      `save.mode must be one of: ${[...SAVE_MODES].sort().join(", ")}`,
      `${path}.mode`,
      "Use overwrite, append or upsert.",
    );
  }

  const strings: Partial<Record<(typeof STRING_FIELDS)[number], string>> = {};
  for (const key of STRING_FIELDS) {
    const field = value[key];
    if (field === undefined) {
      continue;
    }
    if (typeof field !== "string") {
      issues.add(
        "INVALID_TYPE",
        `save.${key} must be a string`,
        `${path}.${key}`,
        `Set save.${key} to a string value.`,
      );
      continue;
    }
    strings[key] = field;
  }

  let keys: string[] | undefined;
  if (value.keys !== undefined) {
    if (!isStringArray(value.keys)) {
      issues.add(
        "INVALID_TYPE",
        "save.keys must be an array of non-empty strings",
        `${path}.keys`,
        'Example: ["date", "page"]',
      );
    } else {
      keys = value.keys;
    }
  }

  if (to === "csv") {
    requireField(value, "path", path, "CSV", "Example: output/report.csv", issues);
    if (mode === "upsert") {
      issues.add("INVALID_SAVE_MODE", "CSV does not support upsert", `${path}.mode`, "Use overwrite or append.");
    }
  } else if (to === "sheets") {
    requireField(value, "sheet_url", path, "Sheets", "Set the Google Sheets URL.", issues);
    const keysValue = value.keys;
    if (mode === "upsert" && (!keysValue || (Array.isArray(keysValue) && keysValue.length === 0))) {
      issues.add(
        "MISSING_REQUIRED",
        "save.keys is required for upsert",
        `${path}.keys`,
        'Example: ["date", "page"]',
      );
    }
  } else if (to === "bigquery") {
    for (const key of ["project_id", "dataset", "table"]) {
      requireField(value, key, path, "BigQuery", `Set save.${key}.`, issues);
    }
    if (mode === "upsert") {
      issues.add(
        "INVALID_SAVE_MODE",
        "BigQuery upsert is not supported",
        `${path}.mode`,
        "Use overwrite or append.",
      );
    }
  }

  if (issues.issues.length !== before || !isSaveTarget(to) || !isSaveMode(mode)) {
    return undefined;
  }

  switch (to) {
    case "csv":
      if (strings.path === undefined || mode === "upsert") return undefined;
      return { to, mode, path: strings.path };
    case "sheets":
      if (strings.sheet_url === undefined) return undefined;
      return {
        to,
        mode,
        sheet_url: strings.sheet_url,
        sheet_name: strings.sheet_name ?? DEFAULT_SHEET_NAME,
        ...(keys !== undefined && { keys }),
      };
    case "bigquery":
      if (
        strings.project_id === undefined ||
        strings.dataset === undefined ||
        strings.table === undefined ||
        mode === "upsert"
      ) {
        return undefined;
      }
      return {
        to,
        mode,
        project_id: strings.project_id,
        dataset: strings.dataset,
        table: strings.table,
      };
  }
}
