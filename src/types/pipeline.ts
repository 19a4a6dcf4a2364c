/**
 * Pipeline type definitions
 */

import type { Cell } from "./table";

/**
 * Pipeline specification as written in a params document or built from CLI flags.
 * Field order in the document never affects stage order.
 */
export type PipelineSpec = {
  transform?: string;
  where?: string;
  group_by?: string;
  aggregate?: string;
  sort?: string;
  columns?: string;
  head?: number;
};

export type PipelineStage =
  | "transform"
  | "where"
  | "group_aggregate"
  | "sort"
  | "columns"
  | "head";

export type TransformFunction = "date_format" | "url_decode" | "path_only" | "strip_qs";

export type TransformInstruction = {
  column: string;
  func: TransformFunction;
  args: string[];
  /** Instruction text as written, for error messages */
  raw: string;
};

export type AggregateFunction = "sum" | "mean" | "median" | "min" | "max" | "count";

export type AggregateInstruction = {
  func: AggregateFunction;
  column: string;
  output: string;
};

export type SortDirection = "asc" | "desc";

export type SortKey = {
  column: string;
  direction: SortDirection;
};

export type PipelineMeta = {
  input_rows: number;
  output_rows: number;
  stages: PipelineStage[];
};

/**
 * Called before each stage (and before save/publish by the job runner).
 * Throwing stops the pipeline; used for cooperative cancellation.
 */
export type Checkpoint = (stage: string) => void;

export type PipelineOptions = {
  checkpoint?: Checkpoint;
};

// Where expression AST

export type CompareOperator = "==" | "!=" | ">" | ">=" | "<" | "<=";
export type StringOperator = "contains" | "startswith" | "endswith";

export type WhereValue = Cell | boolean;

export type WhereNode =
  | { kind: "column"; name: string }
  | { kind: "literal"; value: WhereValue }
  | { kind: "compare"; op: CompareOperator; left: WhereNode; right: WhereNode }
  | { kind: "string_op"; op: StringOperator; left: WhereNode; right: WhereNode }
  | { kind: "in"; negated: boolean; operand: WhereNode; items: WhereNode[] }
  | { kind: "and"; left: WhereNode; right: WhereNode }
  | { kind: "or"; left: WhereNode; right: WhereNode }
  | { kind: "not"; operand: WhereNode };
