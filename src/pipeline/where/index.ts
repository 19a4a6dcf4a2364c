/**
 * Where stage
 */

import type { ResultTable } from "@/types";
import { hasColumn, withRows } from "@/table";
import { matches } from "./evaluate";
import { whereError } from "./lexer";
import { parseWhere, referencedColumns } from "./parser";

export { parseWhere, referencedColumns } from "./parser";
export { evaluate, matches } from "./evaluate";
export { tokenize, type Token, type TokenKind } from "./lexer";

/**
 * Keep the rows for which `expr` is true
 *
 * @throws QueryError INVALID_WHERE on a syntax error or an unknown column
 */
export function applyWhere(table: ResultTable, expr: string): ResultTable {
  const ast = parseWhere(expr);
  const unknown = referencedColumns(ast).filter((name) => !hasColumn(table, name));
  if (unknown.length > 0) {
    throw whereError(`unknown column(s): ${unknown.join(", ")}`, expr);
  }
  return withRows(
    table,
    table.rows.filter((row) => matches(ast, row)),
  );
}
