/**
 * Group + aggregate stage
 *
 * Output columns are the group columns followed by `func_column` for every
 * aggregate, in the order written. Groups are ordered by their keys
 * ascending with nulls last.
 */

import type {
  AggregateFunction,
  AggregateInstruction,
  Cell,
  ColumnSpec,
  ResultTable,
  Row,
} from "@/types";
import { AGGREGATE_FUNCTIONS, NUMERIC_AGGREGATE_FUNCTIONS } from "@/constants";
import { QueryError } from "@/errors";
import { getColumn, hasColumn } from "@/table";
import { compareCellsNullsLast, compareValues, splitList } from "./compare";

function isAggregateFunction(value: string): value is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some((fn) => fn === value);
}

function invalid(message: string, details?: Record<string, unknown>): QueryError {
  return new QueryError("INVALID_AGGREGATE", message, { details });
}

/**
 * Parse `func:col,func2:col2` (function names case-insensitive)
 *
 * @throws QueryError INVALID_AGGREGATE
 */
export function parseAggregates(expr: string): AggregateInstruction[] {
  const items = splitList(expr);
  if (items.length === 0) {
    throw invalid("Invalid aggregate expression: expression is empty");
  }
  return items.map((item) => {
    const sep = item.indexOf(":");
    const func = (sep === -1 ? "" : item.slice(0, sep)).trim().toLowerCase();
    const column = (sep === -1 ? "" : item.slice(sep + 1)).trim();
    if (!func || !column) {
      throw invalid(`Invalid aggregate expression: ${item} (expected func:column)`, {
        instruction: item,
      });
    }
    if (!isAggregateFunction(func)) {
      throw invalid(`Invalid aggregate function: ${func}`, { instruction: item });
    }
    return { func, column, output: `${func}_${column}` };
  });
}

function numbers(values: Cell[]): number[] {
  return values.filter((v): v is number => typeof v === "number");
}

function median(sorted: number[]): number | null {
  if (sorted.length === 0) return null;
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

function extreme(values: Cell[], pick: "min" | "max"): Cell {
  let best: Cell = null;
  for (const value of values) {
    if (value === null) continue;
    if (best === null) {
      best = value;
      continue;
    }
    const order = compareValues(value, best);
    if ((pick === "min" && order < 0) || (pick === "max" && order > 0)) {
      best = value;
    }
  }
  return best;
}

export function aggregateValues(func: AggregateFunction, values: Cell[]): Cell {
  switch (func) {
    case "count":
      return values.filter((v) => v !== null).length;
    case "sum":
      return numbers(values).reduce((acc, v) => acc + v, 0);
    case "mean": {
      const nums = numbers(values);
      return nums.length === 0 ? null : nums.reduce((acc, v) => acc + v, 0) / nums.length;
    }
    case "median":
      return median(numbers(values).sort((a, b) => a - b));
    case "min":
    case "max":
      return extreme(values, func);
  }
}

/**
 * Group rows by `groupBy` columns and compute `aggregate`
 *
 * @throws QueryError INVALID_AGGREGATE on unknown columns, a numeric
 * aggregate over a non-number column or duplicate output columns
 */
export function applyGroupAggregate(
  table: ResultTable,
  groupBy: string,
  aggregate: string,
): ResultTable {
  const keys = splitList(groupBy);
  if (keys.length === 0) {
    throw invalid("Invalid group_by expression: expression is empty");
  }
  const instructions = parseAggregates(aggregate);

  const unknown = [...keys, ...instructions.map((i) => i.column)].filter(
    (name, index, all) => !hasColumn(table, name) && all.indexOf(name) === index,
  );
  if (unknown.length > 0) {
    throw invalid(`Unknown column(s) in group_by/aggregate: ${unknown.join(", ")}`, {
      columns: unknown,
    });
  }

  for (const instruction of instructions) {
    const column = getColumn(table, instruction.column);
    if (NUMERIC_AGGREGATE_FUNCTIONS.includes(instruction.func) && column?.type !== "number") {
      throw invalid(
        `${instruction.func} requires a number column: ${instruction.column} is ${column?.type ?? "missing"}`,
        { instruction: `${instruction.func}:${instruction.column}` },
      );
    }
  }

  const outputs = [...keys, ...instructions.map((i) => i.output)];
  const duplicates = outputs.filter((name, index) => outputs.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw invalid(`Duplicate output column(s): ${[...new Set(duplicates)].join(", ")}`, {
      columns: [...new Set(duplicates)],
    });
  }

  const groups = new Map<string, { key: Cell[]; rows: Row[] }>();
  for (const row of table.rows) {
    const key = keys.map((k) => row[k] ?? null);
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  const ordered = [...groups.values()].sort((a, b) => {
    for (let i = 0; i < keys.length; i += 1) {
      const order = compareCellsNullsLast(a.key[i] ?? null, b.key[i] ?? null);
      if (order !== 0) return order;
    }
    return 0;
  });

  const rows: Row[] = ordered.map((group) => {
    const out: Row = {};
    keys.forEach((k, i) => {
      out[k] = group.key[i] ?? null;
    });
    for (const instruction of instructions) {
      out[instruction.output] = aggregateValues(
        instruction.func,
        group.rows.map((row) => row[instruction.column] ?? null),
      );
    }
    return out;
  });

  const columns: ColumnSpec[] = [
    ...keys.map((k) => ({ name: k, type: getColumn(table, k)?.type ?? "string" })),
    ...instructions.map((i): ColumnSpec => ({
      name: i.output,
      type:
        i.func === "min" || i.func === "max"
          ? (getColumn(table, i.column)?.type ?? "string")
          : "number",
    })),
  ];

  return { columns, rows };
}
