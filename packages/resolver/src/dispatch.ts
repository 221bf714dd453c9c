import { debug } from "@macro-deps/shared";
import { printExpression, type CallNode } from "@macro-deps/template";

import { MacroNameNotStringError, MacroNamespaceNotStringError } from "./errors.js";
import { macroCallFrom } from "./macro-call.js";
import type { CallResolution, DispatchInvocation, MacroCall, NamespaceLookup } from "./types.js";

type InvocationResult =
  | { ok: true; invocation: DispatchInvocation; named: string[] }
  | { ok: false; error: Error };

/**
 * Read the arguments of `adapter.dispatch(...)`.
 *
 * `named` lists the macro names given literally (positional first, then
 * `macro_name=`), each of which is itself a candidate call. Empty strings
 * name nothing and are skipped.
 */
function readInvocation(call: CallNode): InvocationResult {
  const named: string[] = [];
  let macroName: string | null = null;
  let macroNamespace: string | null = null;
  let packages: string[] = [];

  const [first, second] = call.args;
  if (first?.$kind === "Const" && typeof first.value === "string" && first.value !== "") {
    macroName = first.value;
    named.push(macroName);
  }

  for (const kw of call.kwargs) {
    if (kw.key === "macro_name") {
      if (kw.value.$kind !== "Const" || typeof kw.value.value !== "string") {
        return { ok: false, error: new MacroNameNotStringError(printExpression(kw.value)) };
      }
      if (kw.value.value !== "") {
        macroName = kw.value.value;
        named.push(macroName);
      }
    } else if (kw.key === "macro_namespace") {
      if (kw.value.$kind !== "Const" || typeof kw.value.value !== "string") {
        return { ok: false, error: new MacroNamespaceNotStringError(kw.value.$kind) };
      }
      if (kw.value.value !== "") macroNamespace = kw.value.value;
    }
  }

  // The positional package argument is read after the keywords, so a string
  // here replaces `macro_namespace=`.
  if (second?.$kind === "List") {
    packages = second.items.flatMap((item) =>
      item.$kind === "Const" && typeof item.value === "string" && item.value !== "" ? [item.value] : [],
    );
  } else if (second?.$kind === "Const" && typeof second.value === "string" && second.value !== "") {
    macroNamespace = second.value;
  }

  return { ok: true, invocation: { macroName, macroNamespace, packages }, named };
}

/** Parsed arguments of an `adapter.dispatch(...)` call. */
export function parseDispatchInvocation(call: CallNode): DispatchInvocation {
  const result = readInvocation(call);
  if (!result.ok) throw result.error;
  return result.invocation;
}

function candidates(
  call: CallNode,
  { macroName, macroNamespace, packages }: DispatchInvocation,
  namespaceLookup: NamespaceLookup | null,
  sourceText: string,
): MacroCall[] {
  if (macroName === null) return [];

  if (namespaceLookup) {
    const macro = namespaceLookup.dispatch(macroName, macroNamespace);
    debug.dispatch("lookup", { macroName, macroNamespace, packageName: macro.packageName, name: macro.name });
    return [macroCallFrom(call, `${macro.packageName}.${macro.name}`, sourceText)];
  }

  const searched = macroNamespace !== null ? [macroNamespace] : packages;
  debug.dispatch("offline", { macroName, packages: searched });
  return searched.map((pkg) => macroCallFrom(call, `${pkg}.${macroName}`, sourceText));
}

/**
 * Tagged form of `resolveDispatch`, for callers that resolve many calls and
 * want invalid arguments as data.
 */
export function tryResolveDispatch(
  call: CallNode,
  namespaceLookup: NamespaceLookup | null = null,
  sourceText = "",
): CallResolution {
  const result = readInvocation(call);
  if (!result.ok) {
    return { kind: "error", error: result.error };
  }
  const calls = [
    ...result.named.map((name) => macroCallFrom(call, name, sourceText)),
    ...candidates(call, result.invocation, namespaceLookup, sourceText),
  ];
  return { kind: "resolved", calls };
}

/**
 * Candidate macro calls for `adapter.dispatch(name, packages)` /
 * `adapter.dispatch(macro_name=..., macro_namespace=...)`.
 *
 * Returns the literal name(s) followed by the namespace-qualified candidates:
 * the single implementation `namespaceLookup` selects when one is given,
 * otherwise `namespace.name` for the explicit namespace, or for each listed
 * package. Duplicates are kept. The lookup runs at most once.
 */
export function resolveDispatch(
  call: CallNode,
  namespaceLookup: NamespaceLookup | null = null,
  sourceText = "",
): MacroCall[] {
  const resolution = tryResolveDispatch(call, namespaceLookup, sourceText);
  switch (resolution.kind) {
    case "resolved":
      return resolution.calls;
    case "error":
      throw resolution.error;
    case "skipped":
      return [];
  }
}
