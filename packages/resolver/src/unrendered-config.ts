import { debug } from "@macro-deps/shared";
import { printExpression } from "@macro-deps/template";

import { parseTemplateCalls, resolveOptions, type ResolveOptions } from "./options.js";
import type { UnrenderedConfig } from "./types.js";

/**
 * Keyword arguments of the template's first `config(...)` call, each as the
 * canonical text of its unevaluated expression. Used to notice config
 * changes between parses, never to interpret them.
 *
 * Returns `null` when there is no `config(` call. Text without the substring
 * `config(` is rejected before parsing.
 */
export function extractUnrenderedConfig(
  text: string,
  options: Pick<ResolveOptions, "parser" | "cache"> = {},
): UnrenderedConfig | null {
  if (!text.includes("config(")) {
    return null;
  }

  const { calls } = parseTemplateCalls(text, resolveOptions(options));
  // Only the first config() call is read.
  const config = calls.find((c) => c.node.$kind === "Name" && c.node.name === "config");
  if (!config) {
    debug.resolve("config.absent", { length: text.length });
    return null;
  }

  return Object.fromEntries(config.kwargs.map((kw): [string, string] => [kw.key, printExpression(kw.value)]));
}
