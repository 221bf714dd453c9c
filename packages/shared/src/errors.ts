/* =============================================================================
 * ERRORS
 * ============================================================================= */

/** Error codes */
export const ErrorCode = {
  TEMPLATE_SYNTAX: "TEMPLATE_SYNTAX",
  EXTRACTION: "EXTRACTION",
  PARSING: "PARSING",
  MACRO_NAME_NOT_STRING: "MACRO_NAME_NOT_STRING",
  MACRO_NAMESPACE_NOT_STRING: "MACRO_NAMESPACE_NOT_STRING",
  COMPILATION: "COMPILATION",
  DUPLICATE_MACRO_IN_PACKAGE: "DUPLICATE_MACRO_IN_PACKAGE",
  PACKAGE_NOT_FOUND_FOR_MACRO: "PACKAGE_NOT_FOUND_FOR_MACRO",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class of every error thrown by the macro-deps packages.
 */
export class MacroDepsError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "MacroDepsError";
  }
}
