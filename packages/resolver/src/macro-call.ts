import type { CallNode } from "@macro-deps/template";

import { classifyArgument } from "./classify.js";
import type { ArgTypeTag, MacroCall } from "./types.js";

/** A `MacroCall` named `name`, typed from the arguments of `node`. */
export function macroCallFrom(node: CallNode, name: string, sourceText: string): MacroCall {
  return {
    name,
    sourceText,
    positionalArgTypes: node.args.map(classifyArgument),
    keywordArgTypes: Object.fromEntries(
      node.kwargs.map((kw): [string, ArgTypeTag] => [kw.key, classifyArgument(kw.value)]),
    ),
  };
}
