import { Scanner, TokenType, type Token } from "./scanner.js";
import { TemplateSyntaxError } from "./errors.js";

import type {
  BinaryOperator,
  CallArguments,
  CallNode,
  CompareOperator,
  ConstNode,
  DictNode,
  Expr,
  FilterNode,
  GetattrNode,
  KeywordNode,
  ListNode,
  NameNode,
  OperandNode,
  PairNode,
  TextSpan,
  TupleNode,
} from "../model/ast.js";

export interface TupleOptions {
  /** Only primaries as items (assignment targets). */
  simplified?: boolean;
  withCondexpr?: boolean;
  /** Names that end the tuple, e.g. `in` after a `for` target. */
  extraEndRules?: readonly string[];
  /** Parenthesized: `()` and `(a)` are allowed. */
  explicitParentheses?: boolean;
}

export interface AssignTargetOptions {
  nameOnly?: boolean;
  withTuple?: boolean;
  extraEndRules?: readonly string[];
  /** Allow `ns.attr` targets, as `{% set %}` does. */
  withNamespace?: boolean;
}

const COMPARE_OPERATORS: Partial<Record<TokenType, CompareOperator>> = {
  [TokenType.EqualsEquals]: "eq",
  [TokenType.ExclamationEquals]: "ne",
  [TokenType.LessThan]: "lt",
  [TokenType.LessThanOrEqual]: "lteq",
  [TokenType.GreaterThan]: "gt",
  [TokenType.GreaterThanOrEqual]: "gteq",
};

const MULTIPLICATIVE_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
  [TokenType.Asterisk]: "*",
  [TokenType.Slash]: "/",
  [TokenType.SlashSlash]: "//",
  [TokenType.Percent]: "%",
};

/** Token types that may begin the bare argument of a test (`x is divisibleby 3`). */
const TEST_ARGUMENT_STARTS = new Set<TokenType>([
  TokenType.Identifier,
  TokenType.StringLiteral,
  TokenType.IntegerLiteral,
  TokenType.FloatLiteral,
  TokenType.BooleanLiteral,
  TokenType.NoneLiteral,
  TokenType.OpenBracket,
  TokenType.OpenBrace,
]);

/**
 * Parser for the expression grammar inside one `{{ }}` or `{% %}` tag.
 *
 * Operates on the tag's token range; every node span is absolute within the
 * template. Invalid input throws `TemplateSyntaxError`.
 *
 * Precedence, loosest first:
 *   condexpr > or > and > not > compare > + - > ~ > * / // % > ** > unary > postfix/filters
 */
export class ExpressionParser {
  private readonly tokens: Token[] = [];
  private index = 0;

  constructor(
    private readonly source: string,
    rangeStart: number,
    private readonly rangeEnd: number,
    private readonly templateName?: string,
  ) {
    const scanner = new Scanner(source, rangeStart, rangeEnd);
    for (;;) {
      const t = scanner.next();
      this.tokens.push(t);
      if (t.type === TokenType.EOF) break;
    }
  }

  // ------------------------------------------------------------------------------------------
  // Token stream helpers
  // ------------------------------------------------------------------------------------------

  peek(offset = 0): Token {
    const i = Math.min(this.index + offset, this.tokens.length - 1);
    const t = this.tokens[i];
    if (t === undefined) {
      return { type: TokenType.EOF, value: undefined, start: this.rangeEnd, end: this.rangeEnd };
    }
    return t;
  }

  next(): Token {
    const t = this.peek();
    if (t.type !== TokenType.EOF) this.index++;
    return t;
  }

  /** End offset of the most recently consumed token. */
  get lastEnd(): number {
    const prev = this.tokens[this.index - 1];
    return prev ? prev.end : this.peek().start;
  }

  fail(message: string, token: Token = this.peek()): never {
    throw new TemplateSyntaxError(message, token.start, this.source, this.templateName);
  }

  expect(type: TokenType, what: string): Token {
    const t = this.peek();
    if (t.type !== type) {
      this.fail(`Expected ${what}, got ${describeToken(t, this.source)}`, t);
    }
    return this.next();
  }

  skipIf(type: TokenType): Token | null {
    return this.peek().type === type ? this.next() : null;
  }

  isName(word: string, offset = 0): boolean {
    const t = this.peek(offset);
    return t.type === TokenType.Identifier && t.value === word;
  }

  skipName(word: string): boolean {
    if (!this.isName(word)) return false;
    this.next();
    return true;
  }

  expectName(word: string): Token {
    if (!this.isName(word)) {
      this.fail(`Expected '${word}', got ${describeToken(this.peek(), this.source)}`);
    }
    return this.next();
  }

  expectIdentifier(what = "name"): string {
    const t = this.expect(TokenType.Identifier, what);
    return String(t.value);
  }

  atEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  expectEnd(what = "end of statement block"): void {
    if (!this.atEnd()) {
      this.fail(`Expected ${what}, got ${describeToken(this.peek(), this.source)}`);
    }
  }

  private span(start: number): TextSpan {
    return { start, end: this.lastEnd };
  }

  // ------------------------------------------------------------------------------------------
  // Precedence pipeline
  // ------------------------------------------------------------------------------------------

  parseExpression(withCondexpr = true): Expr {
    return withCondexpr ? this.parseCondexpr() : this.parseOr();
  }

  // CondExpr ::= Or ("if" Or ["else" CondExpr])*
  private parseCondexpr(): Expr {
    const start = this.peek().start;
    let expr1 = this.parseOr();
    while (this.skipName("if")) {
      const test = this.parseOr();
      const expr2 = this.skipName("else") ? this.parseCondexpr() : null;
      expr1 = { $kind: "CondExpr", span: this.span(start), test, expr1, expr2 };
    }
    return expr1;
  }

  private parseOr(): Expr {
    const start = this.peek().start;
    let left = this.parseAnd();
    while (this.skipName("or")) {
      const right = this.parseAnd();
      left = { $kind: "Or", span: this.span(start), left, right };
    }
    return left;
  }

  private parseAnd(): Expr {
    const start = this.peek().start;
    let left = this.parseNot();
    while (this.skipName("and")) {
      const right = this.parseNot();
      left = { $kind: "And", span: this.span(start), left, right };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.isName("not")) {
      const start = this.next().start;
      const node = this.parseNot();
      return { $kind: "Not", span: this.span(start), node };
    }
    return this.parseCompare();
  }

  private parseCompare(): Expr {
    const start = this.peek().start;
    const expr = this.parseMath1();
    const ops: OperandNode[] = [];

    for (;;) {
      const t = this.peek();
      const op = COMPARE_OPERATORS[t.type];
      if (op !== undefined) {
        this.next();
        ops.push(this.operand(op, t.start));
      } else if (this.isName("in")) {
        this.next();
        ops.push(this.operand("in", t.start));
      } else if (this.isName("not") && this.isName("in", 1)) {
        this.next();
        this.next();
        ops.push(this.operand("notin", t.start));
      } else {
        break;
      }
    }

    if (ops.length === 0) return expr;
    return { $kind: "Compare", span: this.span(start), expr, ops };
  }

  private operand(op: CompareOperator, start: number): OperandNode {
    const expr = this.parseMath1();
    return { $kind: "Operand", span: this.span(start), op, expr };
  }

  private parseMath1(): Expr {
    const start = this.peek().start;
    let left = this.parseConcat();
    for (;;) {
      const t = this.peek().type;
      if (t !== TokenType.Plus && t !== TokenType.Minus) break;
      this.next();
      const right = this.parseConcat();
      left = {
        $kind: "BinExpr",
        span: this.span(start),
        operator: t === TokenType.Plus ? "+" : "-",
        left,
        right,
      };
    }
    return left;
  }

  private parseConcat(): Expr {
    const start = this.peek().start;
    const nodes = [this.parseMath2()];
    while (this.skipIf(TokenType.Tilde)) {
      nodes.push(this.parseMath2());
    }
    const [only] = nodes;
    if (nodes.length === 1 && only !== undefined) return only;
    return { $kind: "Concat", span: this.span(start), nodes };
  }

  private parseMath2(): Expr {
    const start = this.peek().start;
    let left = this.parsePow();
    for (;;) {
      const operator = MULTIPLICATIVE_OPERATORS[this.peek().type];
      if (operator === undefined) break;
      this.next();
      const right = this.parsePow();
      left = { $kind: "BinExpr", span: this.span(start), operator, left, right };
    }
    return left;
  }

  private parsePow(): Expr {
    const start = this.peek().start;
    let left = this.parseUnary();
    while (this.skipIf(TokenType.StarStar)) {
      const right = this.parseUnary();
      left = { $kind: "BinExpr", span: this.span(start), operator: "**", left, right };
    }
    return left;
  }

  private parseUnary(withFilter = true): Expr {
    const t = this.peek();
    let node: Expr;
    if (t.type === TokenType.Minus || t.type === TokenType.Plus) {
      this.next();
      const operand = this.parseUnary(false);
      node = {
        $kind: "UnaryExpr",
        span: this.span(t.start),
        operator: t.type === TokenType.Minus ? "-" : "+",
        node: operand,
      };
    } else {
      node = this.parsePrimary();
    }
    node = this.parsePostfix(node);
    if (withFilter) {
      node = this.parseFilterExpr(node);
    }
    return node;
  }

  // ------------------------------------------------------------------------------------------
  // Primaries
  // ------------------------------------------------------------------------------------------

  parsePrimary(): Expr {
    const t = this.peek();
    switch (t.type) {
      case TokenType.Identifier: {
        this.next();
        return { $kind: "Name", span: this.span(t.start), name: String(t.value), ctx: "load" };
      }
      case TokenType.BooleanLiteral:
        this.next();
        return this.constant(t, t.value === true, "bool");
      case TokenType.NoneLiteral:
        this.next();
        return this.constant(t, null, "none");
      case TokenType.IntegerLiteral:
        this.next();
        return this.integer(t);
      case TokenType.FloatLiteral:
        this.next();
        return this.constant(t, Number(t.value), "float");
      case TokenType.StringLiteral: {
        // Adjacent string literals concatenate: 'a' "b" == 'ab'.
        let value = "";
        while (this.peek().type === TokenType.StringLiteral) {
          const s = this.next();
          if (s.unterminated) {
            this.fail("Unterminated string literal", s);
          }
          value += String(s.value);
        }
        return { $kind: "Const", span: this.span(t.start), value, literal: "string" };
      }
      case TokenType.OpenParen: {
        this.next();
        const node = this.parseTuple({ explicitParentheses: true });
        this.expect(TokenType.CloseParen, "')'");
        return node;
      }
      case TokenType.OpenBracket:
        return this.parseList();
      case TokenType.OpenBrace:
        return this.parseDict();
      default:
        return this.fail(`Unexpected ${describeToken(t, this.source)}`, t);
    }
  }

  private constant(t: Token, value: ConstNode["value"], literal: ConstNode["literal"]): ConstNode {
    return { $kind: "Const", span: { start: t.start, end: t.end }, value, literal };
  }

  private integer(t: Token): ConstNode {
    const node = this.constant(t, Number(t.value), "int");
    if (t.digits !== undefined) node.digits = t.digits;
    return node;
  }

  /**
   * Comma-separated expressions; a single item without a trailing comma is
   * returned as-is rather than wrapped in a Tuple.
   */
  parseTuple(options: TupleOptions = {}): Expr {
    const start = this.peek().start;
    const items: Expr[] = [];
    let isTuple = false;

    for (;;) {
      if (items.length > 0) {
        this.expect(TokenType.Comma, "','");
      }
      if (this.isTupleEnd(options.extraEndRules)) {
        break;
      }
      items.push(
        options.simplified ? this.parsePrimary() : this.parseExpression(options.withCondexpr ?? true),
      );
      if (this.peek().type === TokenType.Comma) {
        isTuple = true;
      } else {
        break;
      }
    }

    if (!isTuple) {
      const [only] = items;
      if (items.length === 1 && only !== undefined) return only;
      if (!options.explicitParentheses) {
        this.fail(`Expected an expression, got ${describeToken(this.peek(), this.source)}`);
      }
    }
    return { $kind: "Tuple", span: this.span(start), items, ctx: "load" };
  }

  private isTupleEnd(extraEndRules: readonly string[] | undefined): boolean {
    const t = this.peek();
    if (
      t.type === TokenType.EOF ||
      t.type === TokenType.CloseParen ||
      t.type === TokenType.CloseBracket ||
      t.type === TokenType.CloseBrace
    ) {
      return true;
    }
    return extraEndRules !== undefined && t.type === TokenType.Identifier && extraEndRules.includes(String(t.value));
  }

  private parseList(): ListNode {
    const start = this.expect(TokenType.OpenBracket, "'['").start;
    const items: Expr[] = [];
    while (this.peek().type !== TokenType.CloseBracket) {
      if (items.length > 0) this.expect(TokenType.Comma, "','");
      if (this.peek().type === TokenType.CloseBracket) break;
      items.push(this.parseExpression());
    }
    this.expect(TokenType.CloseBracket, "']'");
    return { $kind: "List", span: this.span(start), items };
  }

  private parseDict(): DictNode {
    const start = this.expect(TokenType.OpenBrace, "'{'").start;
    const items: PairNode[] = [];
    while (this.peek().type !== TokenType.CloseBrace) {
      if (items.length > 0) this.expect(TokenType.Comma, "','");
      if (this.peek().type === TokenType.CloseBrace) break;
      const pairStart = this.peek().start;
      const key = this.parseExpression();
      this.expect(TokenType.Colon, "':'");
      const value = this.parseExpression();
      items.push({ $kind: "Pair", span: this.span(pairStart), key, value });
    }
    this.expect(TokenType.CloseBrace, "'}'");
    return { $kind: "Dict", span: this.span(start), items };
  }

  // ------------------------------------------------------------------------------------------
  // Postfix: attribute access, subscripts, calls, filters, tests
  // ------------------------------------------------------------------------------------------

  private parsePostfix(node: Expr): Expr {
    for (;;) {
      const t = this.peek().type;
      if (t === TokenType.Dot || t === TokenType.OpenBracket) {
        node = this.parseSubscript(node);
      } else if (t === TokenType.OpenParen) {
        node = this.parseCall(node);
      } else {
        return node;
      }
    }
  }

  private parseFilterExpr(node: Expr): Expr {
    for (;;) {
      const t = this.peek().type;
      if (t === TokenType.Bar) {
        node = this.parseFilter(node);
      } else if (this.isName("is")) {
        node = this.parseTest(node);
      } else if (t === TokenType.OpenParen) {
        node = this.parseCall(node);
      } else {
        return node;
      }
    }
  }

  private parseSubscript(node: Expr): Expr {
    const start = node.span.start;
    const t = this.next();

    if (t.type === TokenType.Dot) {
      const attr = this.peek();
      if (attr.type === TokenType.Identifier) {
        this.next();
        return { $kind: "Getattr", span: this.span(start), node, attr: String(attr.value), ctx: "load" };
      }
      if (attr.type === TokenType.IntegerLiteral) {
        this.next();
        const arg = this.integer(attr);
        return { $kind: "Getitem", span: this.span(start), node, arg, ctx: "load" };
      }
      return this.fail(`Expected name or number after '.', got ${describeToken(attr, this.source)}`, attr);
    }

    const argsStart = this.peek().start;
    const args: Expr[] = [];
    while (this.peek().type !== TokenType.CloseBracket) {
      if (args.length > 0) {
        this.expect(TokenType.Comma, "','");
        if (this.peek().type === TokenType.CloseBracket) break;
      }
      args.push(this.parseSubscribed());
    }
    this.expect(TokenType.CloseBracket, "']'");

    const [only] = args;
    const arg: Expr =
      args.length === 1 && only !== undefined
        ? only
        : { $kind: "Tuple", span: { start: argsStart, end: this.lastEnd - 1 }, items: args, ctx: "load" };
    return { $kind: "Getitem", span: this.span(start), node, arg, ctx: "load" };
  }

  private parseSubscribed(): Expr {
    const start = this.peek().start;
    let lower: Expr | null = null;

    if (this.peek().type === TokenType.Colon) {
      this.next();
    } else {
      const node = this.parseExpression();
      if (this.peek().type !== TokenType.Colon) {
        return node;
      }
      this.next();
      lower = node;
    }

    const upper = this.isSliceEnd() ? null : this.parseExpression();
    let step: Expr | null = null;
    if (this.skipIf(TokenType.Colon) && !this.isSliceEnd()) {
      step = this.parseExpression();
    }
    return { $kind: "Slice", span: this.span(start), start: lower, stop: upper, step };
  }

  private isSliceEnd(): boolean {
    const t = this.peek().type;
    return t === TokenType.CloseBracket || t === TokenType.Comma || t === TokenType.Colon;
  }

  private parseCall(node: Expr): CallNode {
    const start = node.span.start;
    const args = this.parseCallArgs();
    return { $kind: "Call", span: this.span(start), node, ...args };
  }

  parseCallArgs(): CallArguments {
    const open = this.expect(TokenType.OpenParen, "'('");
    const result: CallArguments = { args: [], kwargs: [], dynArgs: null, dynKwargs: null };
    let requireComma = false;

    const ensure = (ok: boolean): void => {
      if (!ok) this.fail("Invalid syntax for function call expression", open);
    };

    while (this.peek().type !== TokenType.CloseParen) {
      if (requireComma) {
        this.expect(TokenType.Comma, "','");
        if (this.peek().type === TokenType.CloseParen) break;
      }

      if (this.skipIf(TokenType.Asterisk)) {
        ensure(result.dynArgs === null && result.dynKwargs === null);
        result.dynArgs = this.parseExpression();
      } else if (this.skipIf(TokenType.StarStar)) {
        ensure(result.dynKwargs === null);
        result.dynKwargs = this.parseExpression();
      } else if (this.peek().type === TokenType.Identifier && this.peek(1).type === TokenType.Equals) {
        ensure(result.dynKwargs === null);
        const key = this.next();
        this.next(); // '='
        const value = this.parseExpression();
        const kw: KeywordNode = { $kind: "Keyword", span: this.span(key.start), key: String(key.value), value };
        result.kwargs.push(kw);
      } else {
        ensure(result.dynArgs === null && result.dynKwargs === null && result.kwargs.length === 0);
        result.args.push(this.parseExpression());
      }
      requireComma = true;
    }

    this.expect(TokenType.CloseParen, "')'");
    return result;
  }

  private parseDottedName(): string {
    const t = this.peek();
    // `x is none`, `x is true`: literal words double as test names.
    if (t.type === TokenType.NoneLiteral || t.type === TokenType.BooleanLiteral) {
      this.next();
      return this.source.slice(t.start, t.end).toLowerCase();
    }
    let name = this.expectIdentifier("filter or test name");
    while (this.peek().type === TokenType.Dot && this.peek(1).type === TokenType.Identifier) {
      this.next();
      name += "." + String(this.next().value);
    }
    return name;
  }

  private parseFilter(node: Expr | null): FilterNode {
    const start = node ? node.span.start : this.peek().start;
    this.expect(TokenType.Bar, "'|'");
    return this.filterTail(node, start);
  }

  private filterTail(node: Expr | null, start: number): FilterNode {
    const name = this.parseDottedName();
    const args: CallArguments =
      this.peek().type === TokenType.OpenParen
        ? this.parseCallArgs()
        : { args: [], kwargs: [], dynArgs: null, dynKwargs: null };
    return { $kind: "Filter", span: this.span(start), node, name, ...args };
  }

  /**
   * Filters with no subject, as used by `{% filter upper|trim %}` (startInline)
   * and `{% set x | upper %}`. Each filter wraps the previous one.
   */
  parseFilterChain(startInline: boolean): FilterNode | null {
    let node: FilterNode | null = null;
    let first = startInline;
    while (first || this.peek().type === TokenType.Bar) {
      const start: number = node ? node.span.start : this.peek().start;
      node = first ? this.filterTail(node, start) : this.parseFilter(node);
      first = false;
    }
    return node;
  }

  private parseTest(node: Expr): Expr {
    const start = node.span.start;
    this.expectName("is");
    const negated = this.skipName("not");
    const name = this.parseDottedName();

    let args: CallArguments = { args: [], kwargs: [], dynArgs: null, dynKwargs: null };
    const t = this.peek();
    if (t.type === TokenType.OpenParen) {
      args = this.parseCallArgs();
    } else if (
      TEST_ARGUMENT_STARTS.has(t.type) &&
      !this.isName("else") &&
      !this.isName("or") &&
      !this.isName("and")
    ) {
      if (this.isName("is")) {
        this.fail("You cannot chain multiple tests with is");
      }
      const arg = this.parsePostfix(this.parsePrimary());
      args = { ...args, args: [arg] };
    }

    const test: Expr = { $kind: "Test", span: this.span(start), node, name, ...args };
    if (negated) {
      return { $kind: "Not", span: this.span(start), node: test };
    }
    return test;
  }

  // ------------------------------------------------------------------------------------------
  // Assignment targets
  // ------------------------------------------------------------------------------------------

  parseAssignTarget(options: AssignTargetOptions = {}): NameNode | TupleNode | GetattrNode {
    const t = this.peek();

    if (options.withNamespace && t.type === TokenType.Identifier && this.peek(1).type === TokenType.Dot) {
      this.next();
      this.next();
      const attr = this.expectIdentifier("attribute name");
      const ns: NameNode = { $kind: "Name", span: { start: t.start, end: t.end }, name: String(t.value), ctx: "load" };
      return { $kind: "Getattr", span: this.span(t.start), node: ns, attr, ctx: "store" };
    }

    if (options.nameOnly) {
      const name = this.expectIdentifier();
      return { $kind: "Name", span: this.span(t.start), name, ctx: "store" };
    }

    const target =
      options.withTuple === false
        ? this.parsePrimary()
        : this.parseTuple({ simplified: true, ...(options.extraEndRules ? { extraEndRules: options.extraEndRules } : {}) });

    if (target.$kind === "Name") {
      return { ...target, ctx: "store" };
    }
    if (target.$kind === "Tuple") {
      const items: Expr[] = [];
      for (const item of target.items) {
        if (item.$kind === "Name") {
          items.push({ ...item, ctx: "store" });
          continue;
        }
        this.fail(`Can't assign to ${item.$kind.toLowerCase()}`, t);
      }
      return { ...target, items, ctx: "store" };
    }
    return this.fail(`Can't assign to ${target.$kind.toLowerCase()}`, t);
  }
}

function describeToken(t: Token, source?: string): string {
  switch (t.type) {
    case TokenType.EOF:
      return "end of tag";
    case TokenType.Identifier:
      return `name '${String(t.value)}'`;
    case TokenType.StringLiteral:
      return "string";
    case TokenType.IntegerLiteral:
    case TokenType.FloatLiteral:
      return "number";
    case TokenType.Unknown:
      return `'${String(t.value)}'`;
    default:
      return source === undefined ? `'${t.type}'` : `'${source.slice(t.start, t.end)}'`;
  }
}
