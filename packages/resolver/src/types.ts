/* =======================================================================================
 * RESOLVER DATA MODEL
 * ======================================================================================= */

/** Coarse syntactic category of a call argument. `unknown` is the safe default. */
export type ArgTypeTag = "string" | "bool" | "int" | "float" | "none" | "dict" | "unknown";

/** One statically detected macro invocation. */
export interface MacroCall {
  /** Macro name, possibly dotted (`package.macro`). */
  name: string;
  /** The template text the call was found in. */
  sourceText: string;
  /** One tag per positional argument, in call order. */
  positionalArgTypes: ArgTypeTag[];
  keywordArgTypes: Record<string, ArgTypeTag>;
}

/**
 * Names already bound at render time. Only membership matters; a `Set` or a
 * `Map` of the context works as-is.
 */
export interface EvaluationContext {
  has(name: string): boolean;
}

/** Parsed shape of an `adapter.dispatch(...)` call. */
export interface DispatchInvocation {
  macroName: string | null;
  macroNamespace: string | null;
  packages: string[];
}

export interface ResolvedMacro {
  packageName: string;
  name: string;
}

/**
 * The project's live view of its macros, used to pick the implementation an
 * `adapter.dispatch` call selects.
 */
export interface NamespaceLookup {
  dispatch(macroName: string, macroNamespace?: string | null): ResolvedMacro;
}

export interface RefArgs {
  package: string | null;
  name: string;
  version: string | number | null;
}

export type SourceArgs = [sourceName: string, tableName: string];

/** Keyword name → canonical text of the unevaluated argument. */
export type UnrenderedConfig = Record<string, string>;

/** Outcome of examining one call node. */
export type CallResolution =
  | { kind: "resolved"; calls: MacroCall[] }
  | { kind: "skipped"; reason: SkipReason }
  | { kind: "error"; error: Error };

export type SkipReason = "unsupported-shape" | "adapter-method";
