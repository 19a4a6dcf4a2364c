/**
 * Where expression lexer
 */

import { QueryError } from "@/errors";

export type TokenKind =
  | "identifier"
  | "quoted_identifier"
  | "number"
  | "string"
  | "operator"
  | "punct"
  | "eof";

export type Token = {
  kind: TokenKind;
  value: string;
  /** 0-based offset in the expression */
  pos: number;
};

const OPERATORS = ["==", "!=", ">=", "<=", "&&", "||", ">", "<", "!", "-"];
const PUNCTUATION = ["(", ")", "[", "]", ","];
const NUMBER_RE = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_RE = /^[\p{L}_][\p{L}\p{N}_]*/u;
const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

export function whereError(message: string, expression: string, pos?: number): QueryError {
  return new QueryError("INVALID_WHERE", `Invalid where expression: ${message}`, {
    details: pos === undefined ? { expression } : { expression, position: pos },
  });
}

function readQuoted(expr: string, start: number, quote: string): { value: string; end: number } {
  let value = "";
  let i = start + 1;
  while (i < expr.length) {
    const ch = expr.charAt(i);
    if (ch === "\\" && quote !== "`" && i + 1 < expr.length) {
      const next = expr.charAt(i + 1);
      value += ESCAPES[next] ?? next;
      i += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: i + 1 };
    }
    value += ch;
    i += 1;
  }
  throw whereError(`unterminated ${quote === "`" ? "column name" : "string"} at ${start}`, expr, start);
}

/**
 * Split an expression into tokens (always ends with an eof token)
 *
 * @throws QueryError INVALID_WHERE on an unexpected character
 */
export function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expr.length) {
    const ch = expr.charAt(i);

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (ch === "'" || ch === '"' || ch === "`") {
      const { value, end } = readQuoted(expr, i, ch);
      tokens.push({ kind: ch === "`" ? "quoted_identifier" : "string", value, pos: i });
      i = end;
      continue;
    }

    const rest = expr.slice(i);

    const number = NUMBER_RE.exec(rest);
    if (number) {
      tokens.push({ kind: "number", value: number[0], pos: i });
      i += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_RE.exec(rest);
    if (identifier) {
      tokens.push({ kind: "identifier", value: identifier[0], pos: i });
      i += identifier[0].length;
      continue;
    }

    const operator = OPERATORS.find((op) => rest.startsWith(op));
    if (operator) {
      tokens.push({ kind: "operator", value: operator, pos: i });
      i += operator.length;
      continue;
    }

    if (PUNCTUATION.includes(ch)) {
      tokens.push({ kind: "punct", value: ch, pos: i });
      i += 1;
      continue;
    }

    if (ch === "=") {
      throw whereError(`unexpected '=' at ${i} (use '==')`, expr, i);
    }
    throw whereError(`unexpected character '${ch}' at ${i}`, expr, i);
  }

  tokens.push({ kind: "eof", value: "", pos: expr.length });
  return tokens;
}
