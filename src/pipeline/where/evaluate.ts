/**
 * Where expression evaluation
 *
 * Null is equal only to null. Ordering comparisons involving null, or values
 * of different types, are false.
 */

import type { CompareOperator, Row, StringOperator, WhereNode, WhereValue } from "@/types";

function isTruthy(value: WhereValue): boolean {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  return value.length > 0;
}

function compare(op: CompareOperator, left: WhereValue, right: WhereValue): boolean {
  if (op === "==") return left === right;
  if (op === "!=") return left !== right;

  if (left === null || right === null) return false;
  const bothNumbers = typeof left === "number" && typeof right === "number";
  const bothStrings = typeof left === "string" && typeof right === "string";
  if (!bothNumbers && !bothStrings) return false;

  switch (op) {
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
  }
}

function matchString(op: StringOperator, left: WhereValue, right: WhereValue): boolean {
  if (left === null || right === null) return false;
  const haystack = String(left);
  const needle = String(right);
  switch (op) {
    case "contains":
      return haystack.includes(needle);
    case "startswith":
      return haystack.startsWith(needle);
    case "endswith":
      return haystack.endsWith(needle);
  }
}

export function evaluate(node: WhereNode, row: Row): WhereValue {
  switch (node.kind) {
    case "column":
      return row[node.name] ?? null;
    case "literal":
      return node.value;
    case "compare":
      return compare(node.op, evaluate(node.left, row), evaluate(node.right, row));
    case "string_op":
      return matchString(node.op, evaluate(node.left, row), evaluate(node.right, row));
    case "in": {
      const value = evaluate(node.operand, row);
      const found = node.items.some((item) => evaluate(item, row) === value);
      return node.negated ? !found : found;
    }
    case "and":
      return isTruthy(evaluate(node.left, row)) && isTruthy(evaluate(node.right, row));
    case "or":
      return isTruthy(evaluate(node.left, row)) || isTruthy(evaluate(node.right, row));
    case "not":
      return !isTruthy(evaluate(node.operand, row));
  }
}

/**
 * Evaluate an expression as a row filter
 */
export function matches(node: WhereNode, row: Row): boolean {
  return isTruthy(evaluate(node, row));
}
