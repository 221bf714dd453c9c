import type { TextSpan } from "./span.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Non-fatal finding. Fatal problems are thrown as errors instead. */
export interface Diagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  severity: DiagnosticSeverity;
  span?: TextSpan | null;
  data?: Readonly<TData>;
}

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  severity?: DiagnosticSeverity;
  span?: TextSpan | null;
  data?: Readonly<TData>;
}

export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): Diagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    severity: input.severity ?? "error",
    span: input.span ?? null,
    ...(input.data ? { data: input.data } : {}),
  };
}
