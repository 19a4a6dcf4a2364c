/**
 * Where expression parser
 *
 * Grammar (keywords case-insensitive):
 *
 *   expr      := and_expr ( ("or" | "||") and_expr )*
 *   and_expr  := unary ( ("and" | "&&") unary )*
 *   unary     := ("not" | "!") unary | predicate
 *   predicate := operand [ cmp_op operand
 *                        | ("contains" | "startswith" | "endswith") operand
 *                        | ["not"] "in" "[" [operand ("," operand)*] "]" ]
 *   operand   := "(" expr ")" | literal | column
 *   literal   := ["-"] number | string | "true" | "false" | "null"
 *   column    := identifier | `quoted name`
 *   cmp_op    := "==" | "!=" | ">" | ">=" | "<" | "<="
 */

import type { CompareOperator, StringOperator, WhereNode } from "@/types";
import { tokenize, whereError, type Token } from "./lexer";

const COMPARE_OPERATORS: readonly CompareOperator[] = ["==", "!=", ">", ">=", "<", "<="];
const STRING_OPERATORS: readonly StringOperator[] = ["contains", "startswith", "endswith"];
const RESERVED = new Set([
  "and",
  "or",
  "not",
  "in",
  "true",
  "false",
  "null",
  ...STRING_OPERATORS,
]);

function asCompareOperator(value: string): CompareOperator | undefined {
  return COMPARE_OPERATORS.find((op) => op === value);
}

function asStringOperator(value: string): StringOperator | undefined {
  return STRING_OPERATORS.find((op) => op === value);
}

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly expr: string,
  ) {}

  parse(): WhereNode {
    if (this.peek().kind === "eof") {
      throw whereError("expression is empty", this.expr);
    }
    const node = this.parseOr();
    const next = this.peek();
    if (next.kind !== "eof") {
      throw this.unexpected(next);
    }
    return node;
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)] ?? {
      kind: "eof",
      value: "",
      pos: this.expr.length,
    };
  }

  private advance(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === "identifier" && token.value.toLowerCase() === keyword;
  }

  private isSymbol(token: Token, symbol: string): boolean {
    return (token.kind === "operator" || token.kind === "punct") && token.value === symbol;
  }

  private expectSymbol(symbol: string): void {
    const token = this.advance();
    if (!this.isSymbol(token, symbol)) {
      throw whereError(
        `expected '${symbol}' at ${token.pos}, found ${this.describe(token)}`,
        this.expr,
        token.pos,
      );
    }
  }

  private describe(token: Token): string {
    return token.kind === "eof" ? "end of expression" : `'${token.value}'`;
  }

  private unexpected(token: Token): Error {
    return whereError(`unexpected ${this.describe(token)} at ${token.pos}`, this.expr, token.pos);
  }

  private parseOr(): WhereNode {
    let left = this.parseAnd();
    while (this.isKeyword(this.peek(), "or") || this.isSymbol(this.peek(), "||")) {
      this.advance();
      left = { kind: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): WhereNode {
    let left = this.parseUnary();
    while (this.isKeyword(this.peek(), "and") || this.isSymbol(this.peek(), "&&")) {
      this.advance();
      left = { kind: "and", left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): WhereNode {
    const token = this.peek();
    if (this.isSymbol(token, "!") || (this.isKeyword(token, "not") && !this.isKeyword(this.peek(1), "in"))) {
      this.advance();
      return { kind: "not", operand: this.parseUnary() };
    }
    return this.parsePredicate();
  }

  private parsePredicate(): WhereNode {
    const left = this.parseOperand();
    const token = this.peek();

    if (token.kind === "operator") {
      const op = asCompareOperator(token.value);
      if (op) {
        this.advance();
        return { kind: "compare", op, left, right: this.parseOperand() };
      }
    }

    if (token.kind === "identifier") {
      const keyword = token.value.toLowerCase();
      const stringOp = asStringOperator(keyword);
      if (stringOp) {
        this.advance();
        return { kind: "string_op", op: stringOp, left, right: this.parseOperand() };
      }
      if (keyword === "in") {
        this.advance();
        return { kind: "in", negated: false, operand: left, items: this.parseList() };
      }
      if (keyword === "not" && this.isKeyword(this.peek(1), "in")) {
        this.advance();
        this.advance();
        return { kind: "in", negated: true, operand: left, items: this.parseList() };
      }
    }

    return left;
  }

  private parseList(): WhereNode[] {
    this.expectSymbol("[");
    const items: WhereNode[] = [];
    if (this.isSymbol(this.peek(), "]")) {
      this.advance();
      return items;
    }
    for (;;) {
      items.push(this.parseOperand());
      const token = this.advance();
      if (this.isSymbol(token, "]")) {
        return items;
      }
      if (!this.isSymbol(token, ",")) {
        throw whereError(
          `expected ',' or ']' at ${token.pos}, found ${this.describe(token)}`,
          this.expr,
          token.pos,
        );
      }
    }
  }

  private parseOperand(): WhereNode {
    const token = this.advance();

    if (this.isSymbol(token, "(")) {
      const inner = this.parseOr();
      this.expectSymbol(")");
      return inner;
    }

    if (this.isSymbol(token, "-")) {
      const number = this.advance();
      if (number.kind !== "number") {
        throw whereError(`expected a number after '-' at ${token.pos}`, this.expr, token.pos);
      }
      return { kind: "literal", value: -Number(number.value) };
    }

    switch (token.kind) {
      case "number":
        return { kind: "literal", value: Number(token.value) };
      case "string":
        return { kind: "literal", value: token.value };
      case "quoted_identifier":
        return { kind: "column", name: token.value };
      case "identifier": {
        const lower = token.value.toLowerCase();
        if (lower === "true") return { kind: "literal", value: true };
        if (lower === "false") return { kind: "literal", value: false };
        if (lower === "null") return { kind: "literal", value: null };
        if (RESERVED.has(lower)) {
          throw this.unexpected(token);
        }
        return { kind: "column", name: token.value };
      }
      default:
        throw this.unexpected(token);
    }
  }
}

/**
 * Parse a where expression into an AST
 *
 * @throws QueryError INVALID_WHERE on a syntax error
 */
export function parseWhere(expr: string): WhereNode {
  return new Parser(tokenize(expr), expr).parse();
}

/**
 * Column names referenced by an expression, in first-seen order
 */
export function referencedColumns(node: WhereNode): string[] {
  const names: string[] = [];
  const visit = (n: WhereNode): void => {
    switch (n.kind) {
      case "column":
        if (!names.includes(n.name)) names.push(n.name);
        return;
      case "literal":
        return;
      case "compare":
      case "string_op":
      case "and":
      case "or":
        visit(n.left);
        visit(n.right);
        return;
      case "in":
        visit(n.operand);
        n.items.forEach(visit);
        return;
      case "not":
        visit(n.operand);
        return;
    }
  };
  visit(node);
  return names;
}
