import { describe, expect, test } from "vitest";

import { parseTemplate, printExpression, type Expr } from "../src/index.js";

function expr(text: string): Expr {
  const [stmt] = parseTemplate(`{{ ${text} }}`).body;
  if (stmt?.$kind !== "Output") throw new Error("expected an Output");
  const [node] = stmt.nodes;
  if (node === undefined || node.$kind === "TemplateData") throw new Error("expected an expression");
  return node;
}

describe("printExpression", () => {
  test.each([
    [`"it's"`, `'it\\'s'`],
    [`{ "a" :1, 'b': [1, 2.0, none, true] }`, `{'a': 1, 'b': [1, 2.0, None, True]}`],
    ["(1 + 2) * 3", "(1 + 2) * 3"],
    ["((1 + 2)) + 3", "1 + 2 + 3"],
    ["1 + (2 + 3)", "1 + (2 + 3)"],
    ["x | default( 'a' )", "x|default('a')"],
    [`a ~ "b"`, "a ~ 'b'"],
    [`f(1, k = "v")`, "f(1, k='v')"],
    ["x.y[0]", "x.y[0]"],
    ["a if b else c", "a if b else c"],
    ["target.name  !=  'ci'", "target.name != 'ci'"],
    ["-x", "-x"],
    ["a[1:2, 3]", "a[1:2, 3]"],
    ["a[(1, 2)]", "a[1, 2]"],
    ["a[::2]", "a[::2]"],
    ["0x1F", "31"],
    ["1_000_000_000_000_000_000_000", "1000000000000000000000"],
    ["9007199254740993", "9007199254740993"],
  ])("%s prints as %s", (source, printed) => {
    expect(printExpression(expr(source))).toBe(printed);
  });

  test("printed text parses to the same text", () => {
    const printed = printExpression(expr(`env_var("A", 'b') ~ (x or y) | upper`));
    expect(printExpression(expr(printed))).toBe(printed);
  });
});
