import { debug } from "@macro-deps/shared";
import { collectCalls, defaultTemplateParser, type TemplateParser } from "@macro-deps/template";

import type { ParseCache, ParsedTemplate } from "./cache.js";
import type { NamespaceLookup } from "./types.js";

export interface ResolveOptions {
  /** Template parser; defaults to `parseTemplate`. */
  parser?: TemplateParser;
  /** Opt-in parse memo. Results are identical without it. */
  cache?: ParseCache | null;
  /** Live macro namespace used to resolve `adapter.dispatch`. */
  namespaceLookup?: NamespaceLookup | null;
}

export interface ResolvedOptions {
  parser: TemplateParser;
  cache: ParseCache | null;
  namespaceLookup: NamespaceLookup | null;
}

export function resolveOptions(options: ResolveOptions = {}): ResolvedOptions {
  return {
    parser: options.parser ?? defaultTemplateParser,
    cache: options.cache ?? null,
    namespaceLookup: options.namespaceLookup ?? null,
  };
}

/** Parse `text` and collect its call nodes, going through the cache when there is one. */
export function parseTemplateCalls(text: string, options: ResolvedOptions): ParsedTemplate {
  const cached = options.cache?.load(text) ?? null;
  if (cached) return cached;

  const ast = options.parser.parse(text);
  const parsed: ParsedTemplate = { ast, calls: collectCalls(ast) };
  options.cache?.store(text, parsed);
  debug.resolve("template.parsed", { length: text.length, calls: parsed.calls.length });
  return parsed;
}
