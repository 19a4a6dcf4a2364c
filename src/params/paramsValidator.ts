/**
 * Params validator
 *
 * Validates a raw params document against schema version 1.0 and returns
 * either a typed QueryDescriptor (date templates resolved) or every problem
 * found. Never returns a partially valid document.
 */

import type {
  BigQueryDescriptor,
  DateRange,
  Ga4Descriptor,
  GscDescriptor,
  PipelineSpec,
  QueryDescriptor,
  SaveSpec,
  SourceKind,
  ValidateOptions,
  ValidationResult,
} from "@/types";
import {
  COMMON_REQUIRED_FIELDS,
  DATE_RANGE_FIELDS,
  DEFAULT_LIMIT,
  MAX_LIMIT,
  SCHEMA_VERSION,
  SOURCE_FIELDS,
  SUPPORTED_SOURCES,
} from "@/constants";
import { DateTemplateError, resolveDate } from "@/dates";
import { isInteger, isPlainObject, isStringArray, type JsonObject } from "@/utils";
import { IssueCollector } from "./issues";
import { readPipelineSpec } from "./pipelineSpec";
import { readSaveSpec } from "./saveSpec";

function isSourceKind(value: unknown): value is SourceKind {
  return SUPPORTED_SOURCES.some((source) => source === value);
}

function readString(doc: JsonObject, key: string, issues: IssueCollector): string | undefined {
  const value = doc[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    issues.add("INVALID_TYPE", `${key} must be a string`, `$.${key}`, `Set ${key} to a string value.`);
    return undefined;
  }
  return value;
}

function readStringList(
  doc: JsonObject,
  key: string,
  example: string,
  issues: IssueCollector,
): string[] | undefined {
  const value = doc[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isStringArray(value)) {
    issues.add("INVALID_TYPE", `${key} must be a string array`, `$.${key}`, `Example: ${example}`);
    return undefined;
  }
  return [...value];
}

function readDate(
  value: unknown,
  field: "start" | "end",
  issues: IssueCollector,
  options: ValidateOptions,
): string | undefined {
  const path = `$.date_range.${field}`;
  const hint =
    field === "start"
      ? "Use YYYY-MM-DD, today, today-7d, prev-month-start, etc."
      : "Use YYYY-MM-DD, today, today-3d, prev-month-end, etc.";
  const message = `${field} must be YYYY-MM-DD or a date template`;

  if (typeof value !== "string") {
    issues.add("INVALID_DATE", message, path, hint);
    return undefined;
  }
  try {
    return resolveDate(value, { reference: options.reference });
  } catch (err) {
    if (err instanceof DateTemplateError) {
      issues.add("INVALID_DATE", `${message} (${err.message})`, path, hint);
      return undefined;
    }
    throw err;
  }
}

function readDateRange(
  doc: JsonObject,
  issues: IssueCollector,
  options: ValidateOptions,
): DateRange | undefined {
  const value = doc.date_range;
  if (value === undefined) {
    return undefined;
  }
  if (!isPlainObject(value)) {
    issues.add(
      "INVALID_TYPE",
      "date_range must be an object",
      "$.date_range",
      'Use {"start":"YYYY-MM-DD","end":"YYYY-MM-DD"}.',
    );
    return undefined;
  }

  for (const key of Object.keys(value).sort()) {
    if (!DATE_RANGE_FIELDS.some((field) => field === key)) {
      issues.add(
        "UNKNOWN_FIELD",
        `Unknown date_range field: ${key}`,
        `$.date_range.${key}`,
        "Only start/end are allowed.",
      );
    }
  }

  const start = readDate(value.start, "start", issues, options);
  const end = readDate(value.end, "end", issues, options);
  if (start === undefined || end === undefined) {
    return undefined;
  }
  return { start, end };
}

function readLimit(doc: JsonObject, issues: IssueCollector): number | undefined {
  const limit = doc.limit === undefined ? DEFAULT_LIMIT : doc.limit;
  if (!isInteger(limit)) {
    issues.add("INVALID_TYPE", "limit must be an integer", "$.limit", `Use 1-${MAX_LIMIT}.`);
    return undefined;
  }
  if (limit < 1 || limit > MAX_LIMIT) {
    issues.add(
      "OUT_OF_RANGE",
      `limit must be between 1 and ${MAX_LIMIT}`,
      "$.limit",
      `Use 1-${MAX_LIMIT}.`,
    );
    return undefined;
  }
  return limit;
}

type Extras = { pipeline?: PipelineSpec; save?: SaveSpec };

function readExtras(doc: JsonObject, issues: IssueCollector): Extras {
  const extras: Extras = {};
  if (doc.pipeline !== undefined) {
    const pipeline = readPipelineSpec(doc.pipeline, "$.pipeline", issues);
    if (pipeline) extras.pipeline = pipeline;
  }
  if (doc.save !== undefined) {
    const save = readSaveSpec(doc.save, "$.save", issues);
    if (save) extras.save = save;
  }
  return extras;
}

function buildGa4(
  doc: JsonObject,
  issues: IssueCollector,
  options: ValidateOptions,
): Ga4Descriptor | undefined {
  const property_id = readString(doc, "property_id", issues);
  const date_range = readDateRange(doc, issues, options);
  const dimensions = readStringList(doc, "dimensions", '["date"]', issues);
  const metrics = readStringList(doc, "metrics", '["sessions"]', issues);
  const filter_d = readString(doc, "filter_d", issues);
  const limit = readLimit(doc, issues);
  const extras = readExtras(doc, issues);

  if (
    property_id === undefined ||
    date_range === undefined ||
    dimensions === undefined ||
    metrics === undefined ||
    limit === undefined
  ) {
    return undefined;
  }
  return {
    schema_version: SCHEMA_VERSION,
    source: "ga4",
    property_id,
    date_range,
    dimensions,
    metrics,
    ...(filter_d !== undefined && { filter_d }),
    limit,
    ...extras,
  };
}

function buildGsc(
  doc: JsonObject,
  issues: IssueCollector,
  options: ValidateOptions,
): GscDescriptor | undefined {
  const site_url = readString(doc, "site_url", issues);
  const date_range = readDateRange(doc, issues, options);
  const dimensions = readStringList(doc, "dimensions", '["page"]', issues);
  const filter = readString(doc, "filter", issues);
  const limit = readLimit(doc, issues);
  const extras = readExtras(doc, issues);

  if (
    site_url === undefined ||
    date_range === undefined ||
    dimensions === undefined ||
    limit === undefined
  ) {
    return undefined;
  }
  return {
    schema_version: SCHEMA_VERSION,
    source: "gsc",
    site_url,
    date_range,
    dimensions,
    ...(filter !== undefined && { filter }),
    limit,
    ...extras,
  };
}

function buildBigQuery(doc: JsonObject, issues: IssueCollector): BigQueryDescriptor | undefined {
  const project_id = readString(doc, "project_id", issues);
  const sql = readString(doc, "sql", issues);
  const extras = readExtras(doc, issues);

  if (project_id === undefined || sql === undefined) {
    return undefined;
  }
  return {
    schema_version: SCHEMA_VERSION,
    source: "bigquery",
    project_id,
    sql,
    ...extras,
  };
}

/**
 * Validate a raw params document
 *
 * Reports every problem, not only the first. `source` is case-insensitive.
 * Date templates in date_range are resolved against `options.reference`
 * (default: today in DATE_TEMPLATE_TZ).
 */
export function validateParams(raw: unknown, options: ValidateOptions = {}): ValidationResult {
  const issues = new IssueCollector();

  if (!isPlainObject(raw)) {
    issues.add(
      "INVALID_TYPE",
      "Root must be a JSON object",
      "$",
      'Use an object like {"schema_version": "1.0", ...}.',
    );
    return { ok: false, errors: issues.issues };
  }

  const doc: JsonObject = { ...raw };
  const rawSource = doc.source;
  if (typeof rawSource === "string") {
    doc.source = rawSource.toLowerCase();
  }

  if (doc.schema_version !== SCHEMA_VERSION) {
    issues.add(
      "INVALID_SCHEMA_VERSION",
      `schema_version must be '${SCHEMA_VERSION}'`,
      "$.schema_version",
      `Set schema_version to '${SCHEMA_VERSION}'.`,
    );
  }

  const source = doc.source;
  if (!isSourceKind(source)) {
    issues.add(
      "INVALID_SOURCE",
      `source must be one of: ${SUPPORTED_SOURCES.join(", ")}`,
      "$.source",
      "Set source to one valid value.",
    );
    return { ok: false, errors: issues.issues };
  }

  const fields = SOURCE_FIELDS[source];
  const required = [...COMMON_REQUIRED_FIELDS, ...fields.required];
  const allowed = new Set<string>([...required, ...fields.optional]);

  for (const key of [...required].sort()) {
    if (!(key in doc)) {
      issues.add("MISSING_REQUIRED", `Missing required field: ${key}`, "$", `Add '${key}' to params.json.`);
    }
  }

  for (const key of Object.keys(doc).sort()) {
    if (!allowed.has(key)) {
      issues.add(
        "UNKNOWN_FIELD",
        `Unknown field: ${key}`,
        `$.${key}`,
        "Remove unsupported fields for the selected source.",
      );
    }
  }

  let descriptor: QueryDescriptor | undefined;
  switch (source) {
    case "ga4":
      descriptor = buildGa4(doc, issues, options);
      break;
    case "gsc":
      descriptor = buildGsc(doc, issues, options);
      break;
    case "bigquery":
      descriptor = buildBigQuery(doc, issues);
      break;
  }

  if (issues.hasIssues || descriptor === undefined) {
    return { ok: false, errors: issues.issues };
  }
  return { ok: true, params: descriptor };
}
