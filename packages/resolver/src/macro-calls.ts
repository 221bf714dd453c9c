import { debug } from "@macro-deps/shared";
import type { CallNode } from "@macro-deps/template";

import { tryResolveDispatch } from "./dispatch.js";
import { macroCallFrom } from "./macro-call.js";
import { parseTemplateCalls, resolveOptions, type ResolveOptions } from "./options.js";
import type { ArgTypeTag, CallResolution, EvaluationContext, MacroCall, NamespaceLookup } from "./types.js";

/** Calls handled by the ref/source/config fast paths; never reported as macros. */
export const BUILTIN_CALLS: ReadonlySet<string> = new Set(["source", "ref", "config"]);

function resolveCall(node: CallNode, namespaceLookup: NamespaceLookup | null, sourceText: string): CallResolution {
  const callee = node.node;

  if (callee.$kind === "Name") {
    return { kind: "resolved", calls: [macroCallFrom(node, callee.name, sourceText)] };
  }

  if (callee.$kind === "Getattr" && callee.node.$kind === "Name") {
    const packageName = callee.node.name;
    const macroName = callee.attr;

    if (packageName === "adapter") {
      // adapter.get_relation(...) and friends are adapter methods, not macros.
      if (macroName !== "dispatch") return { kind: "skipped", reason: "adapter-method" };
      return tryResolveDispatch(node, namespaceLookup, sourceText);
    }

    // Namespaced calls keep their arity but not their argument types.
    const call = macroCallFrom(node, `${packageName}.${macroName}`, sourceText);
    call.positionalArgTypes = call.positionalArgTypes.map((): ArgTypeTag => "unknown");
    return { kind: "resolved", calls: [call] };
  }

  return { kind: "skipped", reason: "unsupported-shape" };
}

/**
 * Macros a template calls, found without rendering it.
 *
 * Skips builtins (`ref`, `source`, `config`), names already bound in
 * `context`, adapter methods and calls on anything but a plain or dotted
 * name. When a name is called more than once, the first call wins.
 *
 * Throws the parser's error for malformed templates, and
 * `MacroNameNotStringError` / `MacroNamespaceNotStringError` for invalid
 * `adapter.dispatch` arguments. No partial result is returned.
 */
export function resolveMacroCalls(
  text: string,
  context: EvaluationContext,
  options: ResolveOptions = {},
): MacroCall[] {
  const resolved = resolveOptions(options);
  const { calls: nodes } = parseTemplateCalls(text, resolved);

  const result: MacroCall[] = [];
  const seen = new Set<string>();

  for (const node of nodes) {
    const resolution = resolveCall(node, resolved.namespaceLookup, text);

    switch (resolution.kind) {
      case "error":
        throw resolution.error;
      case "skipped":
        debug.resolve("call.skipped", { reason: resolution.reason, span: node.span });
        break;
      case "resolved":
        for (const call of resolution.calls) {
          if (BUILTIN_CALLS.has(call.name) || context.has(call.name) || seen.has(call.name)) continue;
          seen.add(call.name);
          result.push(call);
        }
        break;
    }
  }

  debug.resolve("resolved", { calls: result.map((c) => c.name) });
  return result;
}
