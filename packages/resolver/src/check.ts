import { buildDiagnostic, type Diagnostic } from "@macro-deps/shared";
import { defaultTemplateParser, findAll, type TemplateParser } from "@macro-deps/template";

import type { ArgTypeTag, MacroCall } from "./types.js";

export interface MacroParameter {
  name: string;
  /** Annotation as written (`str`, `Optional[int]`), or `null`. */
  annotation: string | null;
  /** Tag the annotation corresponds to, or `null` when it has none. */
  type: ArgTypeTag | null;
  hasDefault: boolean;
}

export interface MacroSignature {
  name: string;
  parameters: MacroParameter[];
}

const ANNOTATION_TAGS: Record<string, ArgTypeTag> = {
  str: "string",
  int: "int",
  float: "float",
  bool: "bool",
  dict: "dict",
  Dict: "dict",
  None: "none",
  none: "none",
};

/** Signature of the first `{% macro %}` in `macroSql`, or `null` if it has none. */
export function parseMacroSignature(
  macroSql: string,
  parser: TemplateParser = defaultTemplateParser,
): MacroSignature | null {
  const [macro] = findAll(parser.parse(macroSql), "Macro");
  if (!macro) return null;

  const firstDefault = macro.args.length - macro.defaults.length;
  return {
    name: macro.name,
    parameters: macro.args.map((arg, i) => {
      const annotation = macro.annotations[i] ?? null;
      return {
        name: arg.name,
        annotation,
        type: annotation === null ? null : (ANNOTATION_TAGS[annotation] ?? null),
        hasDefault: i >= firstDefault,
      };
    }),
  };
}

export type MacroCallDiagnostic = Diagnostic<
  "macro/arg-type-mismatch",
  { macro: string; parameter: string; expected: string; got: ArgTypeTag }
>;

/**
 * Compare a call's positional argument tags with the macro's annotations.
 * Only arguments whose type is known on both sides are compared.
 */
export function checkMacroCall(call: MacroCall, signature: MacroSignature): MacroCallDiagnostic[] {
  const diagnostics: MacroCallDiagnostic[] = [];

  call.positionalArgTypes.forEach((got, i) => {
    const param = signature.parameters[i];
    if (!param || param.type === null || param.annotation === null || got === "unknown") return;
    if (param.type === got) return;

    diagnostics.push(
      buildDiagnostic({
        code: "macro/arg-type-mismatch",
        message: `Error in call to macro ${signature.name}. Expected type ${param.annotation} got ${got}`,
        severity: "warning",
        data: { macro: signature.name, parameter: param.name, expected: param.annotation, got },
      }),
    );
  });

  return diagnostics;
}
