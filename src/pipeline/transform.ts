/**
 * Transform stage
 *
 * Instruction grammar: `column:function` or `column:function:arg1,arg2`.
 * The instruction list is split on commas; a segment without a colon is an
 * argument of the previous instruction, so `page:strip_qs:id,ref` is one
 * instruction with args ["id", "ref"].
 */

import type { Cell, ResultTable, Row, TransformFunction, TransformInstruction } from "@/types";
import { TRANSFORM_FUNCTIONS, TRANSFORM_FUNCTIONS_WITH_ARGS } from "@/constants";
import { QueryError } from "@/errors";
import { hasColumn, reinferColumns } from "@/table";

// RFC 3986 appendix B
const URI_RE = /^(?:([a-zA-Z][a-zA-Z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;
const COMPACT_DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;
const PERCENT_RUN_RE = /(?:%[0-9A-Fa-f]{2})+/g;

type UriParts = {
  scheme?: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
};

function isTransformFunction(value: string): value is TransformFunction {
  return TRANSFORM_FUNCTIONS.some((fn) => fn === value);
}

function invalid(message: string, instruction?: string): QueryError {
  return new QueryError("INVALID_TRANSFORM", message, {
    details: instruction === undefined ? undefined : { instruction },
  });
}

type Draft = { column: string; func: string; args: string[] | null; raw: string };

/**
 * Parse a transform expression into instructions
 *
 * @throws QueryError INVALID_TRANSFORM
 */
export function parseTransforms(expr: string): TransformInstruction[] {
  const segments = expr
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (segments.length === 0) {
    throw invalid("Invalid transform expression: expression is empty");
  }

  const drafts: Draft[] = [];
  for (const segment of segments) {
    if (!segment.includes(":")) {
      const previous = drafts[drafts.length - 1];
      if (!previous || previous.args === null) {
        throw invalid(`Invalid transform expression: ${segment}`, segment);
      }
      previous.args.push(segment);
      previous.raw = `${previous.raw},${segment}`;
      continue;
    }

    const first = segment.indexOf(":");
    const second = segment.indexOf(":", first + 1);
    const column = segment.slice(0, first).trim();
    const func = (second === -1 ? segment.slice(first + 1) : segment.slice(first + 1, second)).trim();
    const args =
      second === -1
        ? null
        : segment
            .slice(second + 1)
            .split(",")
            .map((a) => a.trim())
            .filter((a) => a.length > 0);

    if (!column || !func) {
      throw invalid(`Invalid transform expression: ${segment}`, segment);
    }
    drafts.push({ column, func, args, raw: segment });
  }

  return drafts.map((draft) => {
    if (!isTransformFunction(draft.func)) {
      throw invalid(`Invalid transform function: ${draft.func}`, draft.raw);
    }
    const args = draft.args ?? [];
    if (args.length > 0 && !TRANSFORM_FUNCTIONS_WITH_ARGS.includes(draft.func)) {
      throw invalid(`Transform function ${draft.func} takes no arguments`, draft.raw);
    }
    return { column: draft.column, func: draft.func, args, raw: draft.raw };
  });
}

export function parseUri(value: string): UriParts {
  const match = URI_RE.exec(value);
  if (!match) {
    return { path: value };
  }
  return {
    scheme: match[1],
    authority: match[2],
    path: match[3] ?? "",
    query: match[4],
    fragment: match[5],
  };
}

function formatUri(parts: UriParts): string {
  let out = "";
  if (parts.scheme !== undefined) out += `${parts.scheme}:`;
  if (parts.authority !== undefined) out += `//${parts.authority}`;
  out += parts.path;
  if (parts.query) out += `?${parts.query}`;
  if (parts.fragment) out += `#${parts.fragment}`;
  return out;
}

/**
 * YYYYMMDD -> YYYY-MM-DD; other values unchanged
 */
export function formatCompactDate(value: string): string {
  return value.replace(COMPACT_DATE_RE, "$1-$2-$3");
}

/**
 * Percent-decode; sequences that are not valid UTF-8 are left as written
 */
export function urlDecode(value: string): string {
  return value.replace(PERCENT_RUN_RE, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

/**
 * URL path component, or the value itself when it has none
 */
export function pathOnly(value: string): string {
  return parseUri(value).path || value;
}

/**
 * Remove the query string (and fragment). With `keep`, only the listed
 * parameters stay, in their original order, and the fragment is kept.
 *
 * Keys are compared decoded (`a%5B%5D` matches `a[]`); kept parameters are
 * re-encoded as application/x-www-form-urlencoded.
 */
export function stripQueryString(value: string, keep: string[] = []): string {
  const parts = parseUri(value);
  if (keep.length === 0) {
    return formatUri({ ...parts, query: undefined, fragment: undefined });
  }
  const params = new URLSearchParams(parts.query ?? "");
  const kept = new URLSearchParams([...params].filter(([key]) => keep.includes(key)));
  return formatUri({ ...parts, query: kept.toString() });
}

function applyFunction(value: string, instruction: TransformInstruction): string {
  switch (instruction.func) {
    case "date_format":
      return formatCompactDate(value);
    case "url_decode":
      return urlDecode(value);
    case "path_only":
      return pathOnly(value);
    case "strip_qs":
      return stripQueryString(value, instruction.args);
  }
}

/**
 * Apply instructions in order. Nulls stay null; other values are handled as text.
 *
 * @throws QueryError INVALID_TRANSFORM for a column not in the table
 */
export function applyTransforms(
  table: ResultTable,
  instructions: TransformInstruction[],
): ResultTable {
  for (const instruction of instructions) {
    if (!hasColumn(table, instruction.column)) {
      throw invalid(`Invalid transform column: ${instruction.column}`, instruction.raw);
    }
  }

  const rows: Row[] = table.rows.map((row) => {
    const out: Row = { ...row };
    for (const instruction of instructions) {
      const current: Cell = out[instruction.column] ?? null;
      out[instruction.column] = current === null ? null : applyFunction(String(current), instruction);
    }
    return out;
  });

  const touched = [...new Set(instructions.map((i) => i.column))];
  return reinferColumns({ columns: table.columns, rows }, touched);
}
