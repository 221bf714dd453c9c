/* =======================================================================================
 * TEMPLATE AST
 * ---------------------------------------------------------------------------------------
 * Closed tagged union over every node the template parser produces. `$kind` is the
 * discriminant; consumers switch on it exhaustively instead of probing for fields.
 * Every node carries a span into the original template text.
 * ======================================================================================= */

import type { TextSpan } from "@macro-deps/shared";

export type { TextSpan } from "@macro-deps/shared";

/** How a name is used: read, assigned, or bound as a macro parameter. */
export type NameContext = "load" | "store" | "param";

/* ===========================
 * Expressions
 * =========================== */

export type LiteralKind = "string" | "int" | "float" | "bool" | "none";

export type LiteralValue = string | number | boolean | null;

export interface ConstNode {
  $kind: "Const";
  span: TextSpan;
  value: LiteralValue;
  /** Lexical category of the literal; `1` and `1.0` share a JS value but not a kind. */
  literal: LiteralKind;
  /** Exact decimal digits of an `int` literal, which `value` rounds past 2^53. */
  digits?: string;
}

export interface NameNode {
  $kind: "Name";
  span: TextSpan;
  name: string;
  ctx: NameContext;
}

export interface TupleNode {
  $kind: "Tuple";
  span: TextSpan;
  items: Expr[];
  ctx: NameContext;
}

export interface ListNode {
  $kind: "List";
  span: TextSpan;
  items: Expr[];
}

export interface PairNode {
  $kind: "Pair";
  span: TextSpan;
  key: Expr;
  value: Expr;
}

export interface DictNode {
  $kind: "Dict";
  span: TextSpan;
  items: PairNode[];
}

export interface KeywordNode {
  $kind: "Keyword";
  span: TextSpan;
  key: string;
  value: Expr;
}

export interface CondExprNode {
  $kind: "CondExpr";
  span: TextSpan;
  test: Expr;
  expr1: Expr;
  expr2: Expr | null;
}

export type BinaryOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";

export interface BinExprNode {
  $kind: "BinExpr";
  span: TextSpan;
  operator: BinaryOperator;
  left: Expr;
  right: Expr;
}

export type UnaryOperator = "-" | "+";

export interface UnaryExprNode {
  $kind: "UnaryExpr";
  span: TextSpan;
  operator: UnaryOperator;
  node: Expr;
}

export interface NotNode {
  $kind: "Not";
  span: TextSpan;
  node: Expr;
}

export interface AndNode {
  $kind: "And";
  span: TextSpan;
  left: Expr;
  right: Expr;
}

export interface OrNode {
  $kind: "Or";
  span: TextSpan;
  left: Expr;
  right: Expr;
}

export type CompareOperator = "eq" | "ne" | "lt" | "lteq" | "gt" | "gteq" | "in" | "notin";

export interface OperandNode {
  $kind: "Operand";
  span: TextSpan;
  op: CompareOperator;
  expr: Expr;
}

export interface CompareNode {
  $kind: "Compare";
  span: TextSpan;
  expr: Expr;
  ops: OperandNode[];
}

/** `a ~ b ~ c` string concatenation. */
export interface ConcatNode {
  $kind: "Concat";
  span: TextSpan;
  nodes: Expr[];
}

/** Shared argument list of calls, filters and tests. */
export interface CallArguments {
  args: Expr[];
  kwargs: KeywordNode[];
  dynArgs: Expr | null;
  dynKwargs: Expr | null;
}

export interface CallNode extends CallArguments {
  $kind: "Call";
  span: TextSpan;
  node: Expr;
}

export interface FilterNode extends CallArguments {
  $kind: "Filter";
  span: TextSpan;
  /** `null` for the filter of a `{% filter %}` block, which applies to the block body. */
  node: Expr | null;
  name: string;
}

export interface TestNode extends CallArguments {
  $kind: "Test";
  span: TextSpan;
  node: Expr;
  name: string;
}

export interface GetattrNode {
  $kind: "Getattr";
  span: TextSpan;
  node: Expr;
  attr: string;
  ctx: NameContext;
}

export interface GetitemNode {
  $kind: "Getitem";
  span: TextSpan;
  node: Expr;
  arg: Expr;
  ctx: NameContext;
}

export interface SliceNode {
  $kind: "Slice";
  span: TextSpan;
  start: Expr | null;
  stop: Expr | null;
  step: Expr | null;
}

export type Expr =
  | ConstNode
  | NameNode
  | TupleNode
  | ListNode
  | DictNode
  | CondExprNode
  | BinExprNode
  | UnaryExprNode
  | NotNode
  | AndNode
  | OrNode
  | CompareNode
  | ConcatNode
  | CallNode
  | FilterNode
  | TestNode
  | GetattrNode
  | GetitemNode
  | SliceNode;

/* ===========================
 * Statements
 * =========================== */

export interface TemplateDataNode {
  $kind: "TemplateData";
  span: TextSpan;
  data: string;
}

export interface OutputNode {
  $kind: "Output";
  span: TextSpan;
  nodes: (TemplateDataNode | Expr)[];
}

export interface IfNode {
  $kind: "If";
  span: TextSpan;
  test: Expr;
  body: Stmt[];
  elifs: IfNode[];
  else_: Stmt[];
}

export interface ForNode {
  $kind: "For";
  span: TextSpan;
  target: NameNode | TupleNode;
  iter: Expr;
  body: Stmt[];
  else_: Stmt[];
  test: Expr | null;
  recursive: boolean;
}

/**
 * `{% macro %}` and the `{% test %}` generic-test definition share one shape.
 * `defaults` align with the trailing entries of `args`.
 */
export interface MacroNode {
  $kind: "Macro";
  span: TextSpan;
  tag: "macro" | "test";
  name: string;
  args: NameNode[];
  defaults: Expr[];
  /** Declared type of each parameter (`a: str`), `null` when unannotated. */
  annotations: (string | null)[];
  body: Stmt[];
}

export interface CallBlockNode {
  $kind: "CallBlock";
  span: TextSpan;
  call: CallNode;
  args: NameNode[];
  defaults: Expr[];
  body: Stmt[];
}

export interface FilterBlockNode {
  $kind: "FilterBlock";
  span: TextSpan;
  body: Stmt[];
  filter: FilterNode;
}

export interface AssignNode {
  $kind: "Assign";
  span: TextSpan;
  target: NameNode | TupleNode | GetattrNode;
  node: Expr;
}

export interface AssignBlockNode {
  $kind: "AssignBlock";
  span: TextSpan;
  target: NameNode | GetattrNode;
  filter: FilterNode | null;
  body: Stmt[];
}

/** `{% do expr %}` */
export interface ExprStmtNode {
  $kind: "ExprStmt";
  span: TextSpan;
  node: Expr;
}

export interface BlockNode {
  $kind: "Block";
  span: TextSpan;
  name: string;
  body: Stmt[];
  scoped: boolean;
  required: boolean;
}

export interface ExtendsNode {
  $kind: "Extends";
  span: TextSpan;
  template: Expr;
}

export interface IncludeNode {
  $kind: "Include";
  span: TextSpan;
  template: Expr;
  withContext: boolean;
  ignoreMissing: boolean;
}

export interface ImportNode {
  $kind: "Import";
  span: TextSpan;
  template: Expr;
  target: string;
  withContext: boolean;
}

export interface FromImportNode {
  $kind: "FromImport";
  span: TextSpan;
  template: Expr;
  names: (string | [name: string, alias: string])[];
  withContext: boolean;
}

export interface WithNode {
  $kind: "With";
  span: TextSpan;
  targets: Expr[];
  values: Expr[];
  body: Stmt[];
}

/** Project-level definition blocks: `{% docs %}`, `{% snapshot %}`, `{% materialization %}`. */
export interface NamedBlockNode {
  $kind: "NamedBlock";
  span: TextSpan;
  tag: "docs" | "snapshot" | "materialization";
  name: string;
  /** Bare names after the block name, e.g. `default` in `materialization view, default`. */
  flags: string[];
  kwargs: KeywordNode[];
  body: Stmt[];
}

export type Stmt =
  | OutputNode
  | IfNode
  | ForNode
  | MacroNode
  | CallBlockNode
  | FilterBlockNode
  | AssignNode
  | AssignBlockNode
  | ExprStmtNode
  | BlockNode
  | ExtendsNode
  | IncludeNode
  | ImportNode
  | FromImportNode
  | WithNode
  | NamedBlockNode;

export interface TemplateNode {
  $kind: "Template";
  span: TextSpan;
  body: Stmt[];
}

/** Helper nodes that only appear inside other nodes. */
export type Helper = PairNode | KeywordNode | OperandNode | TemplateDataNode;

export type Node = TemplateNode | Stmt | Expr | Helper;

export type NodeKind = Node["$kind"];

export type NodeOfKind<K extends NodeKind> = Extract<Node, { $kind: K }>;
