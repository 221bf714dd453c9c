import type { ConstNode, Expr } from "@macro-deps/template";

import type { ArgTypeTag } from "./types.js";

function classifyConst(node: ConstNode): ArgTypeTag {
  switch (node.literal) {
    case "string":
      return "string";
    case "bool":
      return "bool";
    case "int":
      return "int";
    case "float":
      return "float";
    case "none":
      return "none";
  }
}

/**
 * Coarse type of a call argument, read from syntax alone. Never throws.
 */
export function classifyArgument(node: Expr): ArgTypeTag {
  switch (node.$kind) {
    case "Const":
      return classifyConst(node);

    // TODO: infer from the assignment a name refers to, or a macro's return.
    case "Name":
    case "Call":
    case "Getattr":
      return "unknown";

    // `~` concatenations have always been reported as dict; callers rely on it.
    case "Concat":
    case "Dict":
      return "dict";

    case "Tuple":
    case "List":
    case "CondExpr":
    case "BinExpr":
    case "UnaryExpr":
    case "Not":
    case "And":
    case "Or":
    case "Compare":
    case "Filter":
    case "Test":
    case "Getitem":
    case "Slice":
      return "unknown";
  }
}
