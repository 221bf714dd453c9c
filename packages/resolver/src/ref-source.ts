import { ExtractionError, extractLiterals, type ExtractionResult } from "@macro-deps/extractor";

import { ParsingError } from "./errors.js";
import type { RefArgs, SourceArgs } from "./types.js";

/**
 * Structured arguments of a single `ref(...)` or `source(...)` expression.
 *
 * ```ts
 * parseRefOrSource("ref('pkg', 'orders', version=3)"); // { package: "pkg", name: "orders", version: 3 }
 * parseRefOrSource("source('raw', 'events')");         // ["raw", "events"]
 * ```
 *
 * Anything else throws `ParsingError`, including an expression holding both
 * or several of them.
 */
export function parseRefOrSource(expression: string): RefArgs | SourceArgs {
  let extracted: ExtractionResult;
  try {
    extracted = extractLiterals(`{{ ${expression} }}`);
  } catch (err) {
    if (err instanceof ExtractionError) {
      throw new ParsingError(`Invalid jinja expression: ${expression}`, { cause: err });
    }
    throw err;
  }

  const { refs, sources } = extracted;
  const [ref] = refs;
  const [source] = sources;

  if (ref && !source && refs.length === 1) {
    return { package: ref.package ?? null, name: ref.name, version: ref.version ?? null };
  }
  if (source && !ref && sources.length === 1) {
    return [source[0], source[1]];
  }
  throw new ParsingError(`Invalid ref or source expression: ${expression}`);
}
