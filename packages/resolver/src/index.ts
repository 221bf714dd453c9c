// Resolver
//
// Static macro-call resolution: which macros a template calls, with which
// argument shapes, and which implementation adapter.dispatch selects.

export type {
  ArgTypeTag,
  CallResolution,
  DispatchInvocation,
  EvaluationContext,
  MacroCall,
  NamespaceLookup,
  RefArgs,
  ResolvedMacro,
  SkipReason,
  SourceArgs,
  UnrenderedConfig,
} from "./types.js";

export {
  CompilationError,
  DuplicateMacroInPackageError,
  MacroNameNotStringError,
  MacroNamespaceNotStringError,
  PackageNotFoundForMacroError,
  ParsingError,
} from "./errors.js";

export { classifyArgument } from "./classify.js";
export { MemoryParseCache, type ParseCache, type ParsedTemplate } from "./cache.js";
export { resolveOptions, parseTemplateCalls, type ResolveOptions, type ResolvedOptions } from "./options.js";
export { macroCallFrom } from "./macro-call.js";
export { resolveMacroCalls, BUILTIN_CALLS } from "./macro-calls.js";
export { resolveDispatch, tryResolveDispatch, parseDispatchInvocation } from "./dispatch.js";
export { parseRefOrSource } from "./ref-source.js";
export { extractUnrenderedConfig } from "./unrendered-config.js";

export {
  GLOBAL_PROJECT_NAME,
  MacroNamespace,
  MacroNamespaceBuilder,
  isMacroTable,
  type MacroDefinition,
  type MacroTable,
  type NamespaceEntry,
} from "./namespace/macro-namespace.js";
export { MacroDispatcher, type DispatchConfig, type DispatchSearchOrder } from "./namespace/dispatcher.js";

export {
  checkMacroCall,
  parseMacroSignature,
  type MacroCallDiagnostic,
  type MacroParameter,
  type MacroSignature,
} from "./check.js";
