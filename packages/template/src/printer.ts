import type { CallArguments, CompareOperator, ConstNode, Expr } from "./model/ast.js";

/*
 * Canonical source text for unevaluated expressions.
 *
 * The output re-parses to the same tree and is independent of the original
 * spelling: quotes, spacing and redundant parentheses are normalized, so two
 * expressions print the same exactly when they parse the same.
 */

const enum Prec {
  CondExpr = 1,
  Or = 2,
  And = 3,
  Not = 4,
  Compare = 5,
  Additive = 6,
  Concat = 7,
  Multiplicative = 8,
  Power = 9,
  Unary = 10,
  Postfix = 11,
  Primary = 12,
}

const COMPARE_TEXT: Record<CompareOperator, string> = {
  eq: "==",
  ne: "!=",
  lt: "<",
  lteq: "<=",
  gt: ">",
  gteq: ">=",
  in: "in",
  notin: "not in",
};

function precedence(node: Expr): Prec {
  switch (node.$kind) {
    case "CondExpr":
      return Prec.CondExpr;
    case "Or":
      return Prec.Or;
    case "And":
      return Prec.And;
    case "Not":
      return Prec.Not;
    case "Compare":
      return Prec.Compare;
    case "BinExpr":
      switch (node.operator) {
        case "+":
        case "-":
          return Prec.Additive;
        case "**":
          return Prec.Power;
        default:
          return Prec.Multiplicative;
      }
    case "Concat":
      return Prec.Concat;
    case "UnaryExpr":
    case "Filter":
    case "Test":
      return Prec.Unary;
    case "Call":
    case "Getattr":
    case "Getitem":
      return Prec.Postfix;
    case "Const":
    case "Name":
    case "Tuple":
    case "List":
    case "Dict":
    case "Slice":
      return Prec.Primary;
  }
}

function printAt(node: Expr, min: number): string {
  const text = printExpression(node);
  return precedence(node) < min ? `(${text})` : text;
}

export function printConst(node: ConstNode): string {
  switch (node.literal) {
    case "string":
      return quote(String(node.value));
    case "bool":
      return node.value === true ? "True" : "False";
    case "none":
      return "None";
    case "int":
      return node.digits ?? String(node.value);
    case "float": {
      const text = String(node.value);
      return /^-?\d+$/.test(text) ? `${text}.0` : text;
    }
  }
}

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "\\'")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
  return `'${escaped}'`;
}

function printArguments(args: CallArguments): string {
  const parts = [
    ...args.args.map((a) => printExpression(a)),
    ...args.kwargs.map((kw) => `${kw.key}=${printExpression(kw.value)}`),
  ];
  if (args.dynArgs) parts.push(`*${printExpression(args.dynArgs)}`);
  if (args.dynKwargs) parts.push(`**${printExpression(args.dynKwargs)}`);
  return `(${parts.join(", ")})`;
}

/** `a[1:2, 3]`: a tuple of two or more subscripts is written bare, since slices only parse there. */
function printSubscript(arg: Expr): string {
  if (arg.$kind === "Tuple" && arg.items.length > 1) {
    return arg.items.map((i) => printExpression(i)).join(", ");
  }
  return printExpression(arg);
}

function hasArguments(args: CallArguments): boolean {
  return args.args.length > 0 || args.kwargs.length > 0 || args.dynArgs !== null || args.dynKwargs !== null;
}

/** Render an expression as canonical template source. */
export function printExpression(node: Expr): string {
  switch (node.$kind) {
    case "Const":
      return printConst(node);
    case "Name":
      return node.name;
    case "Tuple":
      if (node.items.length === 1 && node.items[0] !== undefined) {
        return `(${printExpression(node.items[0])},)`;
      }
      return `(${node.items.map((i) => printExpression(i)).join(", ")})`;
    case "List":
      return `[${node.items.map((i) => printExpression(i)).join(", ")}]`;
    case "Dict":
      return `{${node.items.map((p) => `${printExpression(p.key)}: ${printExpression(p.value)}`).join(", ")}}`;
    case "CondExpr": {
      const head = `${printAt(node.expr1, Prec.Or)} if ${printAt(node.test, Prec.Or)}`;
      return node.expr2 ? `${head} else ${printAt(node.expr2, Prec.CondExpr)}` : head;
    }
    case "Or":
      return `${printAt(node.left, Prec.Or)} or ${printAt(node.right, Prec.And)}`;
    case "And":
      return `${printAt(node.left, Prec.And)} and ${printAt(node.right, Prec.Not)}`;
    case "Not":
      return `not ${printAt(node.node, Prec.Not)}`;
    case "Compare":
      return [
        printAt(node.expr, Prec.Additive),
        ...node.ops.map((op) => `${COMPARE_TEXT[op.op]} ${printAt(op.expr, Prec.Additive)}`),
      ].join(" ");
    case "BinExpr": {
      const prec = precedence(node);
      return `${printAt(node.left, prec)} ${node.operator} ${printAt(node.right, prec + 1)}`;
    }
    case "Concat":
      return node.nodes.map((n) => printAt(n, Prec.Multiplicative)).join(" ~ ");
    case "UnaryExpr":
      // The operand of a sign binds tighter than filters: `-(x|abs)`.
      return node.node.$kind === "UnaryExpr"
        ? `${node.operator}${printExpression(node.node)}`
        : `${node.operator}${printAt(node.node, Prec.Postfix)}`;
    case "Call":
      return `${printAt(node.node, Prec.Postfix)}${printArguments(node)}`;
    case "Filter": {
      const tail = hasArguments(node) ? `${node.name}${printArguments(node)}` : node.name;
      return node.node ? `${printAt(node.node, Prec.Unary)}|${tail}` : tail;
    }
    case "Test": {
      const tail = hasArguments(node) ? `${node.name}${printArguments(node)}` : node.name;
      return `${printAt(node.node, Prec.Unary)} is ${tail}`;
    }
    case "Getattr":
      return `${printAt(node.node, Prec.Postfix)}.${node.attr}`;
    case "Getitem":
      return `${printAt(node.node, Prec.Postfix)}[${printSubscript(node.arg)}]`;
    case "Slice": {
      const part = (n: Expr | null): string => (n ? printExpression(n) : "");
      const base = `${part(node.start)}:${part(node.stop)}`;
      return node.step ? `${base}:${part(node.step)}` : base;
    }
  }
}
