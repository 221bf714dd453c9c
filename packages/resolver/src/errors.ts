import { ErrorCode, MacroDepsError } from "@macro-deps/shared";

/** A ref/source expression that is neither a single `ref(...)` nor a single `source(...)`. */
export class ParsingError extends MacroDepsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCode.PARSING, options);
    this.name = "ParsingError";
  }
}

/** `adapter.dispatch(macro_name=...)` was given something other than a string literal. */
export class MacroNameNotStringError extends MacroDepsError {
  constructor(public readonly kwargValue: string) {
    super(
      `The macro_name parameter (${kwargValue}) to adapter.dispatch was not a string`,
      ErrorCode.MACRO_NAME_NOT_STRING,
    );
    this.name = "MacroNameNotStringError";
  }
}

/** `adapter.dispatch(macro_namespace=...)` was given something other than a string literal. */
export class MacroNamespaceNotStringError extends MacroDepsError {
  constructor(public readonly kwargType: string) {
    super(
      `The macro_namespace parameter to adapter.dispatch is a ${kwargType}, not a string`,
      ErrorCode.MACRO_NAMESPACE_NOT_STRING,
    );
    this.name = "MacroNamespaceNotStringError";
  }
}

export class CompilationError extends MacroDepsError {
  constructor(message: string) {
    super(message, ErrorCode.COMPILATION);
    this.name = "CompilationError";
  }
}

export class DuplicateMacroInPackageError extends MacroDepsError {
  constructor(
    public readonly macroName: string,
    public readonly packageName: string,
    public readonly paths: readonly [first: string, second: string],
  ) {
    super(
      `Found two macros named "${macroName}" in the project "${packageName}". ` +
        `To fix this error, rename or remove one of the following macros:\n` +
        `    - ${paths[0]}\n    - ${paths[1]}`,
      ErrorCode.DUPLICATE_MACRO_IN_PACKAGE,
    );
    this.name = "DuplicateMacroInPackageError";
  }
}

export class PackageNotFoundForMacroError extends MacroDepsError {
  constructor(public readonly packageName: string) {
    super(`Could not find package '${packageName}'`, ErrorCode.PACKAGE_NOT_FOUND_FOR_MACRO);
    this.name = "PackageNotFoundForMacroError";
  }
}
