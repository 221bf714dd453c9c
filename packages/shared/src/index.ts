// Shared infrastructure
//
// Cross-cutting utilities used by every macro-deps package.

export {
  debug,
  configureDebug,
  refreshDebugChannels,
  DEBUG_ENV_VAR,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export type { TextSpan } from "./span.js";

export { locationAt, type SourceLocation } from "./location.js";

export {
  buildDiagnostic,
  type Diagnostic,
  type DiagnosticSeverity,
  type BuildDiagnosticInput,
} from "./diagnostics.js";

export { MacroDepsError, ErrorCode, type ErrorCodeType } from "./errors.js";
