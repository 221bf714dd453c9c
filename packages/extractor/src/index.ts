// Literal extractor
//
// Fast path for `ref`, `source` and `config` calls whose arguments are all
// literals. Callers fall back to full rendering on `ExtractionError`.

export { extractLiterals } from "./extract.js";
export { ExtractionError } from "./errors.js";
export type {
  ExtractedConfig,
  ExtractedRef,
  ExtractedSource,
  ExtractionResult,
  LiteralJson,
} from "./types.js";
