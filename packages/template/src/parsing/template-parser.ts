import { debug } from "@macro-deps/shared";

import { lexTemplate, type Region } from "./lexer.js";
import { ExpressionParser } from "./expression-parser.js";
import { TemplateSyntaxError } from "./errors.js";
import { TokenType } from "./scanner.js";

import type {
  AssignBlockNode,
  AssignNode,
  BlockNode,
  CallBlockNode,
  Expr,
  ExprStmtNode,
  ExtendsNode,
  FilterBlockNode,
  ForNode,
  FromImportNode,
  IfNode,
  ImportNode,
  IncludeNode,
  KeywordNode,
  MacroNode,
  NameNode,
  NamedBlockNode,
  OutputNode,
  Stmt,
  TemplateDataNode,
  TemplateNode,
  WithNode,
} from "../model/ast.js";

export interface ParseTemplateOptions {
  /** Name used in error locations (usually the file path). */
  name?: string;
}

/** Anything that can turn template text into an AST. */
export interface TemplateParser {
  parse(source: string, options?: ParseTemplateOptions): TemplateNode;
}

/**
 * Parse a Jinja-like template into its AST without evaluating anything.
 *
 * Identifiers that are not defined anywhere parse as plain `Name` nodes, so
 * calls to user and adapter macros need no definitions in scope.
 */
export function parseTemplate(source: string, options: ParseTemplateOptions = {}): TemplateNode {
  const parser = new StatementParser(source, options.name);
  const template = parser.parseTemplate();
  debug.parse("template.parsed", { name: options.name ?? null, length: source.length, statements: template.body.length });
  return template;
}

export const defaultTemplateParser: TemplateParser = {
  parse: parseTemplate,
};

interface EndTag {
  name: string;
  parser: ExpressionParser;
  region: Region;
}

interface Subparse {
  body: Stmt[];
  end: EndTag | null;
}

type StatementHandler = (ep: ExpressionParser, region: Region) => Stmt;

/**
 * Statement-level parser: walks lexer regions, groups data and `{{ }}` into
 * Output nodes, and dispatches `{% tag %}` blocks to per-tag handlers.
 */
class StatementParser {
  private readonly regions: Region[];
  private pos = 0;
  private readonly handlers: Record<string, StatementHandler>;

  constructor(
    private readonly source: string,
    private readonly templateName: string | undefined,
  ) {
    this.regions = lexTemplate(source, templateName);
    this.handlers = {
      for: (ep, r) => this.parseFor(ep, r),
      if: (ep, r) => this.parseIf(ep, r),
      block: (ep, r) => this.parseBlock(ep, r),
      extends: (ep, r) => this.parseExtends(ep, r),
      include: (ep, r) => this.parseInclude(ep, r),
      import: (ep, r) => this.parseImport(ep, r),
      from: (ep, r) => this.parseFrom(ep, r),
      set: (ep, r) => this.parseSet(ep, r),
      with: (ep, r) => this.parseWith(ep, r),
      macro: (ep, r) => this.parseMacro(ep, r, "macro"),
      test: (ep, r) => this.parseMacro(ep, r, "test"),
      call: (ep, r) => this.parseCallBlock(ep, r),
      filter: (ep, r) => this.parseFilterBlock(ep, r),
      do: (ep, r) => this.parseDo(ep, r),
      docs: (ep, r) => this.parseNamedBlock(ep, r, "docs"),
      snapshot: (ep, r) => this.parseNamedBlock(ep, r, "snapshot"),
      materialization: (ep, r) => this.parseNamedBlock(ep, r, "materialization"),
    };
  }

  parseTemplate(): TemplateNode {
    const { body } = this.subparse(null);
    return { $kind: "Template", span: { start: 0, end: this.source.length }, body };
  }

  private fail(message: string, offset: number): never {
    throw new TemplateSyntaxError(message, offset, this.source, this.templateName);
  }

  private tagParser(region: Region): ExpressionParser {
    if (region.kind === "data") {
      return this.fail("Expected a tag", region.start);
    }
    return new ExpressionParser(this.source, region.innerStart, region.innerEnd, this.templateName);
  }

  /**
   * Parse statements until one of `endNames` (or the end of the template when
   * `endNames` is null). The end tag itself is returned unconsumed beyond its name.
   */
  private subparse(endNames: readonly string[] | null): Subparse {
    const body: Stmt[] = [];
    let output: (TemplateDataNode | Expr)[] = [];
    let outputStart = -1;

    const flush = (): void => {
      const last = output.at(-1);
      if (last !== undefined) {
        const node: OutputNode = { $kind: "Output", span: { start: outputStart, end: last.span.end }, nodes: output };
        body.push(node);
      }
      output = [];
      outputStart = -1;
    };

    while (this.pos < this.regions.length) {
      const region = this.regions[this.pos];
      if (region === undefined) break;

      if (region.kind === "data") {
        this.pos++;
        if (outputStart < 0) outputStart = region.start;
        output.push({ $kind: "TemplateData", span: { start: region.start, end: region.end }, data: region.text });
        continue;
      }

      const ep = this.tagParser(region);

      if (region.kind === "variable") {
        this.pos++;
        if (ep.atEnd()) {
          this.fail("Expected an expression, got end of print statement", region.innerStart);
        }
        const expr = ep.parseTuple({ withCondexpr: true });
        ep.expectEnd("end of print statement");
        if (outputStart < 0) outputStart = region.start;
        output.push(expr);
        continue;
      }

      const tag = ep.peek();
      if (tag.type !== TokenType.Identifier) {
        this.fail("Tag name expected", tag.start);
      }
      const name = String(tag.value);

      if (endNames !== null && endNames.includes(name)) {
        flush();
        this.pos++;
        ep.next();
        return { body, end: { name, parser: ep, region } };
      }

      const handler = this.handlers[name];
      if (handler === undefined) {
        const expected = endNames === null ? "" : ` Expected one of: ${endNames.map((n) => `'${n}'`).join(", ")}.`;
        this.fail(`Encountered unknown tag '${name}'.${expected}`, tag.start);
      }

      flush();
      this.pos++;
      ep.next();
      body.push(handler(ep, region));
    }

    flush();
    if (endNames !== null) {
      this.fail(
        `Unexpected end of template. Expected one of: ${endNames.map((n) => `'${n}'`).join(", ")}.`,
        this.source.length,
      );
    }
    return { body, end: null };
  }

  private parseBody(endNames: readonly string[]): { body: Stmt[]; end: EndTag } {
    const result = this.subparse(endNames);
    if (result.end === null) {
      return this.fail("Unexpected end of template", this.source.length);
    }
    return { body: result.body, end: result.end };
  }

  // ------------------------------------------------------------------------------------------
  // Statement handlers
  // ------------------------------------------------------------------------------------------

  private parseFor(ep: ExpressionParser, region: Region): ForNode {
    const target = ep.parseAssignTarget({ extraEndRules: ["in"] });
    if (target.$kind === "Getattr") {
      return ep.fail("Can't assign to getattr");
    }
    ep.expectName("in");
    const iter = ep.parseTuple({ withCondexpr: false, extraEndRules: ["recursive"] });
    const test = ep.skipName("if") ? ep.parseExpression() : null;
    const recursive = ep.skipName("recursive");
    ep.expectEnd();

    const loop = this.parseBody(["endfor", "else"]);
    let else_: Stmt[] = [];
    let end = loop.end;
    if (end.name === "else") {
      end.parser.expectEnd();
      const tail = this.parseBody(["endfor"]);
      else_ = tail.body;
      end = tail.end;
    }
    end.parser.expectEnd();

    return { $kind: "For", span: { start: region.start, end: end.region.end }, target, iter, body: loop.body, else_, test, recursive };
  }

  private parseIf(ep: ExpressionParser, region: Region): IfNode {
    const test = ep.parseTuple({ withCondexpr: false });
    ep.expectEnd();

    const root: IfNode = { $kind: "If", span: { start: region.start, end: region.end }, test, body: [], elifs: [], else_: [] };
    let current = root;

    for (;;) {
      const { body, end } = this.parseBody(["elif", "else", "endif"]);
      current.body = body;

      if (end.name === "elif") {
        const elifTest = end.parser.parseTuple({ withCondexpr: false });
        end.parser.expectEnd();
        current = { $kind: "If", span: { start: end.region.start, end: end.region.end }, test: elifTest, body: [], elifs: [], else_: [] };
        root.elifs.push(current);
        continue;
      }

      if (end.name === "else") {
        end.parser.expectEnd();
        const tail = this.parseBody(["endif"]);
        root.else_ = tail.body;
        tail.end.parser.expectEnd();
        root.span = { start: region.start, end: tail.end.region.end };
        return root;
      }

      end.parser.expectEnd();
      root.span = { start: region.start, end: end.region.end };
      return root;
    }
  }

  private parseBlock(ep: ExpressionParser, region: Region): BlockNode {
    const name = ep.expectIdentifier("block name");
    const scoped = ep.skipName("scoped");
    const required = ep.skipName("required");
    ep.expectEnd();

    const { body, end } = this.parseBody(["endblock"]);
    if (end.parser.peek().type === TokenType.Identifier) {
      const closing = end.parser.expectIdentifier();
      if (closing !== name) {
        end.parser.fail(`Mismatched block name: expected '${name}', got '${closing}'`);
      }
    }
    end.parser.expectEnd();

    return { $kind: "Block", span: { start: region.start, end: end.region.end }, name, body, scoped, required };
  }

  private parseExtends(ep: ExpressionParser, region: Region): ExtendsNode {
    const template = ep.parseExpression();
    ep.expectEnd();
    return { $kind: "Extends", span: { start: region.start, end: region.end }, template };
  }

  private parseImportContext(ep: ExpressionParser, fallback: boolean): boolean {
    if ((ep.isName("with") || ep.isName("without")) && ep.isName("context", 1)) {
      const withContext = ep.isName("with");
      ep.next();
      ep.next();
      return withContext;
    }
    return fallback;
  }

  private parseInclude(ep: ExpressionParser, region: Region): IncludeNode {
    const template = ep.parseExpression();
    let ignoreMissing = false;
    if (ep.isName("ignore") && ep.isName("missing", 1)) {
      ep.next();
      ep.next();
      ignoreMissing = true;
    }
    const withContext = this.parseImportContext(ep, true);
    ep.expectEnd();
    return { $kind: "Include", span: { start: region.start, end: region.end }, template, withContext, ignoreMissing };
  }

  private parseImport(ep: ExpressionParser, region: Region): ImportNode {
    const template = ep.parseExpression();
    ep.expectName("as");
    const target = ep.expectIdentifier();
    const withContext = this.parseImportContext(ep, false);
    ep.expectEnd();
    return { $kind: "Import", span: { start: region.start, end: region.end }, template, target, withContext };
  }

  private parseFrom(ep: ExpressionParser, region: Region): FromImportNode {
    const template = ep.parseExpression();
    ep.expectName("import");
    const names: FromImportNode["names"] = [];
    let withContext = false;

    for (;;) {
      if (names.length > 0) {
        ep.expect(TokenType.Comma, "','");
      }
      if ((ep.isName("with") || ep.isName("without")) && ep.isName("context", 1)) {
        withContext = this.parseImportContext(ep, false);
        break;
      }
      const nameTok = ep.peek();
      const name = ep.expectIdentifier();
      if (name.startsWith("_")) {
        ep.fail("Names starting with an underline can not be imported", nameTok);
      }
      if (ep.skipName("as")) {
        names.push([name, ep.expectIdentifier()]);
      } else {
        names.push(name);
      }
      if ((ep.isName("with") || ep.isName("without")) && ep.isName("context", 1)) {
        withContext = this.parseImportContext(ep, false);
        break;
      }
      if (ep.peek().type !== TokenType.Comma) break;
    }
    ep.expectEnd();

    return { $kind: "FromImport", span: { start: region.start, end: region.end }, template, names, withContext };
  }

  private parseSet(ep: ExpressionParser, region: Region): AssignNode | AssignBlockNode {
    const target = ep.parseAssignTarget({ withNamespace: true });

    if (ep.skipIf(TokenType.Equals)) {
      const node = ep.parseTuple();
      ep.expectEnd();
      return { $kind: "Assign", span: { start: region.start, end: region.end }, target, node };
    }

    if (target.$kind === "Tuple") {
      return ep.fail("Block assignment needs a single target");
    }
    const filter = ep.parseFilterChain(false);
    ep.expectEnd();

    const { body, end } = this.parseBody(["endset"]);
    end.parser.expectEnd();
    return { $kind: "AssignBlock", span: { start: region.start, end: end.region.end }, target, filter, body };
  }

  private parseWith(ep: ExpressionParser, region: Region): WithNode {
    const targets: Expr[] = [];
    const values: Expr[] = [];
    while (!ep.atEnd()) {
      if (targets.length > 0) {
        ep.expect(TokenType.Comma, "','");
      }
      const target = ep.parseAssignTarget();
      targets.push(target.$kind === "Name" ? { ...target, ctx: "param" } : target);
      ep.expect(TokenType.Equals, "'='");
      values.push(ep.parseExpression());
    }

    const { body, end } = this.parseBody(["endwith"]);
    end.parser.expectEnd();
    return { $kind: "With", span: { start: region.start, end: end.region.end }, targets, values, body };
  }

  /** `(a, b: str, c=1, d: int = 2)` */
  private parseSignature(ep: ExpressionParser): Pick<MacroNode, "args" | "defaults" | "annotations"> {
    const args: NameNode[] = [];
    const defaults: Expr[] = [];
    const annotations: (string | null)[] = [];

    ep.expect(TokenType.OpenParen, "'('");
    while (ep.peek().type !== TokenType.CloseParen) {
      if (args.length > 0) {
        ep.expect(TokenType.Comma, "','");
        if (ep.peek().type === TokenType.CloseParen) break;
      }
      const argTok = ep.peek();
      const name = ep.expectIdentifier("parameter name");
      const arg: NameNode = { $kind: "Name", span: { start: argTok.start, end: argTok.end }, name, ctx: "param" };

      annotations.push(ep.skipIf(TokenType.Colon) ? this.parseAnnotation(ep) : null);

      if (ep.skipIf(TokenType.Equals)) {
        defaults.push(ep.parseExpression());
      } else if (defaults.length > 0) {
        ep.fail("Non-default argument follows default argument", argTok);
      }
      args.push(arg);
    }
    ep.expect(TokenType.CloseParen, "')'");

    return { args, defaults, annotations };
  }

  /** Type annotation text, e.g. `str` or `Optional[List[str]]`, up to `,` `=` or `)` at depth zero. */
  private parseAnnotation(ep: ExpressionParser): string {
    const first = ep.peek();
    let depth = 0;
    let end = first.start;

    for (;;) {
      const t = ep.peek();
      if (t.type === TokenType.EOF) break;
      if (depth === 0 && (t.type === TokenType.Comma || t.type === TokenType.Equals || t.type === TokenType.CloseParen)) {
        break;
      }
      if (t.type === TokenType.OpenBracket) depth++;
      if (t.type === TokenType.CloseBracket) depth--;
      end = ep.next().end;
    }

    if (end === first.start) {
      return ep.fail("Expected a type annotation", first);
    }
    return this.source.slice(first.start, end);
  }

  private parseMacro(ep: ExpressionParser, region: Region, tag: MacroNode["tag"]): MacroNode {
    const name = ep.expectIdentifier(`${tag} name`);
    const signature = this.parseSignature(ep);
    ep.expectEnd();

    const { body, end } = this.parseBody([`end${tag}`]);
    end.parser.expectEnd();
    return { $kind: "Macro", span: { start: region.start, end: end.region.end }, tag, name, ...signature, body };
  }

  private parseCallBlock(ep: ExpressionParser, region: Region): CallBlockNode {
    const signature: Pick<MacroNode, "args" | "defaults"> =
      ep.peek().type === TokenType.OpenParen ? this.parseSignature(ep) : { args: [], defaults: [] };
    const callTok = ep.peek();
    const call = ep.parseExpression();
    if (call.$kind !== "Call") {
      return ep.fail("Expected call", callTok);
    }
    ep.expectEnd();

    const { body, end } = this.parseBody(["endcall"]);
    end.parser.expectEnd();
    return {
      $kind: "CallBlock",
      span: { start: region.start, end: end.region.end },
      call,
      args: signature.args,
      defaults: signature.defaults,
      body,
    };
  }

  private parseFilterBlock(ep: ExpressionParser, region: Region): FilterBlockNode {
    const filter = ep.parseFilterChain(true);
    if (filter === null) {
      return ep.fail("Expected a filter");
    }
    ep.expectEnd();

    const { body, end } = this.parseBody(["endfilter"]);
    end.parser.expectEnd();
    return { $kind: "FilterBlock", span: { start: region.start, end: end.region.end }, body, filter };
  }

  private parseDo(ep: ExpressionParser, region: Region): ExprStmtNode {
    const node = ep.parseTuple();
    ep.expectEnd();
    return { $kind: "ExprStmt", span: { start: region.start, end: region.end }, node };
  }

  /** `{% materialization view, default %}`, `{% materialization table, adapter='x' %}`, `{% docs name %}` */
  private parseNamedBlock(ep: ExpressionParser, region: Region, tag: NamedBlockNode["tag"]): NamedBlockNode {
    const name = ep.expectIdentifier(`${tag} name`);
    const flags: string[] = [];
    const kwargs: KeywordNode[] = [];

    while (ep.skipIf(TokenType.Comma)) {
      const keyTok = ep.peek();
      const key = ep.expectIdentifier();
      if (ep.skipIf(TokenType.Equals)) {
        const value = ep.parseExpression();
        kwargs.push({ $kind: "Keyword", span: { start: keyTok.start, end: value.span.end }, key, value });
      } else {
        flags.push(key);
      }
    }
    ep.expectEnd();

    const { body, end } = this.parseBody([`end${tag}`]);
    end.parser.expectEnd();
    return { $kind: "NamedBlock", span: { start: region.start, end: end.region.end }, tag, name, flags, kwargs, body };
  }
}
