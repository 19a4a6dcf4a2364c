/**
 * Cell ordering shared by sort, grouping and min/max
 */

import type { Cell } from "@/types";

/**
 * Compare two non-null cells: numbers numerically, strings by code unit,
 * numbers before strings
 */
export function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "number") {
    return -1;
  }
  if (typeof b === "number") {
    return 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ascending comparison with nulls last
 */
export function compareCellsNullsLast(a: Cell, b: Cell): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return compareValues(a, b);
}

/**
 * Split a comma-separated list, trimming and dropping empty items
 */
export function splitList(expr: string): string[] {
  return expr
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
