import { test, describe, expect } from "vitest";

import {
  collectCalls,
  findAll,
  parseTemplate,
  printExpression,
  TemplateSyntaxError,
  type Expr,
  type Stmt,
} from "../../src/index.js";

function parseExpr(text: string): Expr {
  const [stmt] = parseTemplate(`{{ ${text} }}`).body;
  if (stmt?.$kind !== "Output") throw new Error(`expected an Output, got ${stmt?.$kind}`);
  const [node] = stmt.nodes;
  if (node === undefined || node.$kind === "TemplateData") throw new Error("expected an expression");
  return node;
}

function only(text: string): Stmt {
  const body = parseTemplate(text).body;
  expect(body).toHaveLength(1);
  const [stmt] = body;
  if (stmt === undefined) throw new Error("empty template");
  return stmt;
}

function syntaxError(text: string): TemplateSyntaxError {
  try {
    parseTemplate(text);
  } catch (err) {
    if (err instanceof TemplateSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

describe("expressions", () => {
  test.each([
    ["a + b * c", "a + b * c"],
    ["(a + b) * c", "(a + b) * c"],
    ['"x" ~ y ~ 1', "'x' ~ y ~ 1"],
    ["a if b else c", "a if b else c"],
    ["not a and b or c", "not a and b or c"],
    ["a not in b", "a not in b"],
    ["1 < x <= 10", "1 < x <= 10"],
    ["x|default('y')|upper", "x|default('y')|upper"],
    ["x is defined", "x is defined"],
    ["x is not none", "not x is none"],
    ["foo(1,'a',k=True,*args,**kw)", "foo(1, 'a', k=True, *args, **kw)"],
    ["pkg.macro(x)[0].y", "pkg.macro(x)[0].y"],
    ['{"a": [1, 2.0], "b": none}', "{'a': [1, 2.0], 'b': None}"],
    ["(1,)", "(1,)"],
    ["x[::2]", "x[::2]"],
    ["-x|abs", "-x|abs"],
    ["-(x|abs)", "-(x|abs)"],
    ["'it''s'", "'its'"],
  ])("%s prints as %s", (source, printed) => {
    expect(printExpression(parseExpr(source))).toBe(printed);
  });

  test("precedence shapes the tree", () => {
    const expr = parseExpr("a + b * c");
    expect(expr).toMatchObject({
      $kind: "BinExpr",
      operator: "+",
      left: { $kind: "Name", name: "a" },
      right: { $kind: "BinExpr", operator: "*" },
    });
  });

  test("literal kinds distinguish 1 from 1.0", () => {
    expect(parseExpr("1")).toMatchObject({ $kind: "Const", value: 1, literal: "int" });
    expect(parseExpr("1.0")).toMatchObject({ $kind: "Const", value: 1, literal: "float" });
    expect(parseExpr("True")).toMatchObject({ $kind: "Const", value: true, literal: "bool" });
  });

  test("spans are absolute offsets into the template", () => {
    const template = "select {{ my_macro('a') }}";
    const [call] = collectCalls(parseTemplate(template));
    expect(call?.span).toEqual({ start: 10, end: 23 });
    expect(template.slice(10, 23)).toBe("my_macro('a')");
  });

  test("undefined identifiers parse as plain names", () => {
    const expr = parseExpr("adapter.dispatch('x', 'pkg')()");
    expect(expr).toMatchObject({
      $kind: "Call",
      node: {
        $kind: "Call",
        node: { $kind: "Getattr", attr: "dispatch", node: { $kind: "Name", name: "adapter" } },
      },
    });
  });
});

describe("statements", () => {
  test("for with tuple target, filter and else", () => {
    const stmt = only("{% for a, b in items if a %}{{ a }}{% else %}none{% endfor %}");
    expect(stmt).toMatchObject({
      $kind: "For",
      target: {
        $kind: "Tuple",
        ctx: "store",
        items: [
          { $kind: "Name", name: "a", ctx: "store" },
          { $kind: "Name", name: "b", ctx: "store" },
        ],
      },
      iter: { $kind: "Name", name: "items" },
      test: { $kind: "Name", name: "a" },
      recursive: false,
      else_: [{ $kind: "Output", nodes: [{ $kind: "TemplateData", data: "none" }] }],
    });
  });

  test("if / elif / else", () => {
    const stmt = only("{% if a %}1{% elif b %}2{% else %}3{% endif %}");
    expect(stmt).toMatchObject({
      $kind: "If",
      test: { name: "a" },
      body: [{ $kind: "Output", nodes: [{ data: "1" }] }],
      elifs: [{ $kind: "If", test: { name: "b" }, body: [{ $kind: "Output", nodes: [{ data: "2" }] }] }],
      else_: [{ $kind: "Output", nodes: [{ data: "3" }] }],
    });
  });

  test("set: expression, namespace attribute and filtered block", () => {
    expect(only("{% set x = 1 %}")).toMatchObject({ $kind: "Assign", target: { $kind: "Name", name: "x" } });
    expect(only("{% set ns.count = ns.count + 1 %}")).toMatchObject({
      $kind: "Assign",
      target: { $kind: "Getattr", attr: "count", ctx: "store" },
    });
    expect(only("{% set x | upper %}hi{% endset %}")).toMatchObject({
      $kind: "AssignBlock",
      target: { $kind: "Name", name: "x", ctx: "store" },
      filter: { $kind: "Filter", name: "upper", node: null },
      body: [{ $kind: "Output" }],
    });
  });

  test("macro signature with annotations and defaults", () => {
    const stmt = only("{% macro m(a: str, b: Optional[int] = 1) %}x{% endmacro %}");
    expect(stmt).toMatchObject({
      $kind: "Macro",
      tag: "macro",
      name: "m",
      args: [{ name: "a", ctx: "param" }, { name: "b", ctx: "param" }],
      annotations: ["str", "Optional[int]"],
      defaults: [{ $kind: "Const", value: 1 }],
    });
  });

  test("generic test definitions share the macro shape", () => {
    expect(only("{% test not_null(model, column_name) %}select 1{% endtest %}")).toMatchObject({
      $kind: "Macro",
      tag: "test",
      name: "not_null",
      annotations: [null, null],
    });
  });

  test("call block", () => {
    expect(only("{% call(row) grid(rows) %}{{ row }}{% endcall %}")).toMatchObject({
      $kind: "CallBlock",
      args: [{ name: "row" }],
      call: { $kind: "Call", node: { $kind: "Name", name: "grid" } },
    });
  });

  test("materialization flags and keywords", () => {
    expect(only("{% materialization view, adapter='postgres', default %}x{% endmaterialization %}")).toMatchObject({
      $kind: "NamedBlock",
      tag: "materialization",
      name: "view",
      flags: ["default"],
      kwargs: [{ key: "adapter", value: { value: "postgres" } }],
    });
  });

  test("imports", () => {
    expect(only("{% from 'utils.sql' import a, b as c with context %}")).toMatchObject({
      $kind: "FromImport",
      names: ["a", ["b", "c"]],
      withContext: true,
    });
    expect(only("{% import 'utils.sql' as utils %}")).toMatchObject({ $kind: "Import", target: "utils", withContext: false });
    expect(only("{% include 'x.sql' ignore missing without context %}")).toMatchObject({
      $kind: "Include",
      ignoreMissing: true,
      withContext: false,
    });
  });

  test("block names must match", () => {
    expect(only("{% block body %}x{% endblock body %}")).toMatchObject({ $kind: "Block", name: "body" });
    expect(syntaxError("{% block body %}x{% endblock other %}").reason).toBe(
      "Mismatched block name: expected 'body', got 'other'",
    );
  });
});

describe("walking", () => {
  test("collectCalls is depth-first pre-order", () => {
    const template = parseTemplate("{% if is_incremental() %}{{ this }}{% endif %}{{ my_macro(ref('a')) }}");
    const names = collectCalls(template).map((c) => (c.node.$kind === "Name" ? c.node.name : "?"));
    expect(names).toEqual(["is_incremental", "my_macro", "ref"]);
  });

  test("findAll narrows to the requested kind", () => {
    const template = parseTemplate("{{ a.b }}{% set c = d.e %}");
    expect(findAll(template, "Getattr").map((g) => g.attr)).toEqual(["b", "e"]);
  });

  test("a template without calls yields none", () => {
    expect(collectCalls(parseTemplate("select 1"))).toEqual([]);
  });
});

describe("syntax errors", () => {
  test("unclosed call reports line 1", () => {
    const err = syntaxError("{{ foo(");
    expect(err.line).toBe(1);
    expect(err.column).toBe(1);
  });

  test("location points into later lines", () => {
    const err = syntaxError("line one\n{{ 1 + }}");
    expect(err.reason).toBe("Unexpected end of tag");
    expect(err.line).toBe(2);
    expect(err.column).toBe(8);
    expect(err.message).toBe("Unexpected end of tag (line 2, column 8)");
  });

  test("unknown tag", () => {
    expect(syntaxError("{% frobnicate %}").reason).toBe("Encountered unknown tag 'frobnicate'.");
  });

  test("unexpected end of template lists the expected tags", () => {
    expect(syntaxError("{% if x %}").reason).toBe("Unexpected end of template. Expected one of: 'elif', 'else', 'endif'.");
  });

  test("mismatched end tag", () => {
    expect(syntaxError("{% for x in y %}{% endif %}").reason).toBe(
      "Encountered unknown tag 'endif'. Expected one of: 'endfor', 'else'.",
    );
  });

  test("non-default argument after default", () => {
    expect(syntaxError("{% macro m(a=1, b) %}{% endmacro %}").reason).toBe(
      "Non-default argument follows default argument",
    );
  });

  test("template name is part of the location", () => {
    try {
      parseTemplate("{{ }}", { name: "models/a.sql" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TemplateSyntaxError);
      expect(err instanceof TemplateSyntaxError && err.message).toBe(
        "Expected an expression, got end of print statement (models/a.sql:1:3)",
      );
    }
  });
});
