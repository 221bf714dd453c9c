import { test, describe, expect } from "vitest";

import { classifyArgument, type ArgTypeTag } from "../src/index.js";
import { parseExpr } from "./_helpers/templates.js";

describe("classifyArgument", () => {
  test.each<[string, ArgTypeTag]>([
    ['"hello"', "string"],
    ["True", "bool"],
    ["false", "bool"],
    ["42", "int"],
    ["3.14", "float"],
    ["1.0", "float"],
    ["none", "none"],
    ["None", "none"],
    ['{"a": 1}', "dict"],
    ["x", "unknown"],
  ])("%s is %s", (source, tag) => {
    expect(classifyArgument(parseExpr(source))).toBe(tag);
  });

  test("calls and attribute access are unknown", () => {
    expect(classifyArgument(parseExpr("var('x')"))).toBe("unknown");
    expect(classifyArgument(parseExpr("this.schema"))).toBe("unknown");
  });

  test("string concatenation is reported as dict", () => {
    expect(classifyArgument(parseExpr("'a' ~ b"))).toBe("dict");
  });

  test("other shapes are unknown", () => {
    for (const source of ["[1, 2]", "(1, 2)", "1 + 2", "-1", "a if b else c", "x|upper", "x[0]", "not x"]) {
      expect(classifyArgument(parseExpr(source)), source).toBe("unknown");
    }
  });
});
