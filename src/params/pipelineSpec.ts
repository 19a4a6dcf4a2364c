/**
 * PipelineSpec shape validation
 *
 * Checks the document shape only (known fields, value types, group_by and
 * aggregate together). Expression syntax is checked by the pipeline stages.
 */

import type { PipelineSpec } from "@/types";
import { PIPELINE_FIELDS, PIPELINE_STRING_FIELDS } from "@/constants";
import { hasText, isInteger, isPlainObject } from "@/utils";
import type { IssueCollector } from "./issues";

const allowedHint = `Allowed: ${[...PIPELINE_FIELDS].sort().join(", ")}.`;

function isPipelineField(key: string): boolean {
  return PIPELINE_FIELDS.some((field) => field === key);
}

/**
 * Validate a pipeline object, reporting problems into `issues`
 *
 * @returns The typed spec, or undefined when any problem was found
 */
export function readPipelineSpec(
  value: unknown,
  path: string,
  issues: IssueCollector,
): PipelineSpec | undefined {
  if (!isPlainObject(value)) {
    issues.add(
      "INVALID_TYPE",
      "pipeline must be an object",
      path,
      'Use {"transform": "...", "where": "...", ...}.',
    );
    return undefined;
  }

  const before = issues.issues.length;

  for (const key of Object.keys(value).sort()) {
    if (!isPipelineField(key)) {
      issues.add("UNKNOWN_FIELD", `Unknown pipeline field: ${key}`, `${path}.${key}`, allowedHint);
    }
  }

  // Same test the engine uses to decide whether a stage is configured
  if (hasText(value.group_by) !== hasText(value.aggregate)) {
    issues.add(
      "INVALID_PIPELINE",
      "group_by and aggregate must be specified together",
      path,
      "Specify both group_by and aggregate, or neither.",
    );
  }

  const spec: PipelineSpec = {};

  for (const key of PIPELINE_STRING_FIELDS) {
    const field = value[key];
    if (field === undefined) {
      continue;
    }
    if (typeof field !== "string") {
      issues.add(
        "INVALID_TYPE",
        `pipeline.${key} must be a string`,
        `${path}.${key}`,
        `Set pipeline.${key} to a string value.`,
      );
      continue;
    }
    spec[key] = field;
  }

  const head = value.head;
  if (head !== undefined) {
    if (!isInteger(head)) {
      issues.add(
        "INVALID_TYPE",
        "pipeline.head must be an integer",
        `${path}.head`,
        "Set pipeline.head to a non-negative integer.",
      );
    } else if (head < 0) {
      issues.add(
        "OUT_OF_RANGE",
        "pipeline.head must be 0 or greater",
        `${path}.head`,
        "Set pipeline.head to a non-negative integer.",
      );
    } else {
      spec.head = head;
    }
  }

  return issues.issues.length === before ? spec : undefined;
}

/**
 * True when the spec has no stage configured
 */
export function isEmptyPipelineSpec(spec: PipelineSpec): boolean {
  return (
    spec.transform === undefined &&
    spec.where === undefined &&
    spec.group_by === undefined &&
    spec.aggregate === undefined &&
    spec.sort === undefined &&
    spec.columns === undefined &&
    spec.head === undefined
  );
}
