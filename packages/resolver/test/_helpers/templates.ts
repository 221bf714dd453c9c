import { collectCalls, parseTemplate, type CallNode, type Expr, type TemplateParser } from "@macro-deps/template";

/** The first call expression in `text`. */
export function firstCall(text: string): CallNode {
  const [call] = collectCalls(parseTemplate(text));
  if (!call) throw new Error(`no call in ${JSON.stringify(text)}`);
  return call;
}

/** The expression printed by `{{ text }}`. */
export function parseExpr(text: string): Expr {
  const [stmt] = parseTemplate(`{{ ${text} }}`).body;
  if (stmt?.$kind !== "Output") throw new Error(`expected an Output, got ${stmt?.$kind}`);
  const [node] = stmt.nodes;
  if (node === undefined || node.$kind === "TemplateData") throw new Error("expected an expression");
  return node;
}

/** Template parser that counts how often it is invoked. */
export function countingParser(): TemplateParser & { calls: number } {
  const parser = {
    calls: 0,
    parse(source: string) {
      parser.calls++;
      return parseTemplate(source);
    },
  };
  return parser;
}
