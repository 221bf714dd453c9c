import { ErrorCode, MacroDepsError } from "@macro-deps/shared";

/** The text is outside the literal-only subset the extractor understands. */
export class ExtractionError extends MacroDepsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCode.EXTRACTION, options);
    this.name = "ExtractionError";
  }
}
