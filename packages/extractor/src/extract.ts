import { debug } from "@macro-deps/shared";
import {
  ExpressionParser,
  TemplateSyntaxError,
  lexTemplate,
  printExpression,
  type CallNode,
  type Expr,
  type Region,
} from "@macro-deps/template";

import { ExtractionError } from "./errors.js";
import type { ExtractedConfig, ExtractedRef, ExtractedSource, ExtractionResult, LiteralJson } from "./types.js";

/**
 * Fast, literal-only extraction of `ref`, `source` and `config` calls.
 *
 * Understands templates whose only tags are `{{ ref(...) }}`,
 * `{{ source(...) }}` and `{{ config(...) }}` with literal arguments. Anything
 * else (statements, other calls, variables) throws `ExtractionError`, which
 * tells the caller to fall back to full rendering.
 */
export function extractLiterals(text: string): ExtractionResult {
  const collector = new LiteralCollector();

  for (const region of lex(text)) {
    if (region.kind === "data") continue;
    if (region.kind === "block") {
      throw new ExtractionError(`Statement blocks are not supported: ${text.slice(region.start, region.end)}`);
    }
    collector.add(parseRegion(text, region.innerStart, region.innerEnd));
  }

  const result = collector.result();
  debug.extract("extracted", {
    refs: result.refs.length,
    sources: result.sources.length,
    configs: result.configs.length,
  });
  return result;
}

function lex(text: string): Region[] {
  try {
    return lexTemplate(text);
  } catch (err) {
    throw asExtractionError(err);
  }
}

function parseRegion(text: string, start: number, end: number): Expr {
  try {
    const parser = new ExpressionParser(text, start, end);
    const expr = parser.parseTuple({ withCondexpr: true });
    parser.expectEnd("end of print statement");
    return expr;
  } catch (err) {
    throw asExtractionError(err);
  }
}

function asExtractionError(err: unknown): unknown {
  if (err instanceof TemplateSyntaxError) {
    return new ExtractionError(err.message, { cause: err });
  }
  return err;
}

class LiteralCollector {
  private readonly refs = new Map<string, ExtractedRef>();
  private readonly sources = new Map<string, ExtractedSource>();
  private readonly configs = new Map<string, ExtractedConfig>();

  add(expr: Expr): void {
    if (expr.$kind !== "Call" || expr.node.$kind !== "Name") {
      throw new ExtractionError(`Expected a ref, source or config call, got ${printExpression(expr)}`);
    }
    if (expr.dynArgs !== null || expr.dynKwargs !== null) {
      throw new ExtractionError(`Unpacked arguments are not supported: ${printExpression(expr)}`);
    }

    switch (expr.node.name) {
      case "ref":
        return this.addRef(expr);
      case "source":
        return this.addSource(expr);
      case "config":
        return this.addConfig(expr);
      default:
        throw new ExtractionError(`Unsupported call to ${expr.node.name}`);
    }
  }

  result(): ExtractionResult {
    return {
      refs: [...this.refs.values()],
      sources: [...this.sources.values()],
      configs: [...this.configs.values()],
    };
  }

  private addRef(call: CallNode): void {
    const strings = call.args.map((arg) => stringArg(arg, "ref"));
    const [first, second] = strings;
    if (first === undefined || strings.length > 2) {
      throw new ExtractionError(`ref() takes one or two positional arguments, got ${strings.length}`);
    }

    const ref: ExtractedRef = second === undefined ? { name: first } : { package: first, name: second };
    for (const kw of call.kwargs) {
      if (kw.key !== "version" && kw.key !== "v") {
        throw new ExtractionError(`Unexpected keyword argument to ref(): ${kw.key}`);
      }
      if (ref.version !== undefined) {
        throw new ExtractionError("ref() takes a single version");
      }
      ref.version = versionArg(kw.value);
    }

    this.refs.set(JSON.stringify([ref.package ?? null, ref.name, ref.version ?? null]), ref);
  }

  private addSource(call: CallNode): void {
    const [sourceName, tableName] = call.args.map((arg) => stringArg(arg, "source"));
    if (sourceName === undefined || tableName === undefined || call.args.length !== 2 || call.kwargs.length > 0) {
      throw new ExtractionError("source() takes exactly two positional arguments");
    }
    this.sources.set(JSON.stringify([sourceName, tableName]), [sourceName, tableName]);
  }

  private addConfig(call: CallNode): void {
    if (call.args.length > 0) {
      throw new ExtractionError("config() takes keyword arguments only");
    }
    for (const kw of call.kwargs) {
      const value = literal(kw.value);
      this.configs.set(JSON.stringify([kw.key, value]), [kw.key, value]);
    }
  }
}

function stringArg(arg: Expr, fn: string): string {
  if (arg.$kind === "Const" && typeof arg.value === "string") {
    return arg.value;
  }
  throw new ExtractionError(`${fn}() arguments must be string literals, got ${printExpression(arg)}`);
}

function versionArg(arg: Expr): string | number {
  const value = literal(arg);
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  throw new ExtractionError(`ref() version must be a string or number, got ${printExpression(arg)}`);
}

/** JSON value of a literal expression; `-1` and `-1.5` count as literals. */
function literal(expr: Expr): LiteralJson {
  switch (expr.$kind) {
    case "Const":
      return expr.value;
    case "UnaryExpr":
      if (expr.node.$kind === "Const" && typeof expr.node.value === "number") {
        return expr.operator === "-" ? -expr.node.value : expr.node.value;
      }
      break;
    case "List":
      return expr.items.map(literal);
    case "Dict": {
      const out: { [key: string]: LiteralJson } = {};
      for (const pair of expr.items) {
        if (pair.key.$kind !== "Const" || typeof pair.key.value !== "string") {
          throw new ExtractionError(`Dictionary keys must be string literals, got ${printExpression(pair.key)}`);
        }
        out[pair.key.value] = literal(pair.value);
      }
      return out;
    }
    default:
      break;
  }
  throw new ExtractionError(`Expected a literal, got ${printExpression(expr)}`);
}
