/**
 * Token kinds produced by the expression Scanner.
 *
 * Word operators (`and`, `or`, `not`, `in`, `is`, `if`, `else`) are scanned as
 * identifiers; the parser decides from context whether they act as keywords.
 */
export enum TokenType {
  EOF = "EOF",

  Identifier = "Identifier",
  BooleanLiteral = "BooleanLiteral",
  NoneLiteral = "NoneLiteral",
  IntegerLiteral = "IntegerLiteral",
  FloatLiteral = "FloatLiteral",
  StringLiteral = "StringLiteral",

  // Punctuation / grouping
  OpenParen = "OpenParen",       // (
  CloseParen = "CloseParen",     // )
  OpenBracket = "OpenBracket",   // [
  CloseBracket = "CloseBracket", // ]
  OpenBrace = "OpenBrace",       // {
  CloseBrace = "CloseBrace",     // }
  Comma = "Comma",               // ,
  Colon = "Colon",               // :
  Dot = "Dot",                   // .
  Bar = "Bar",                   // |
  Tilde = "Tilde",               // ~

  // Operators
  Plus = "Plus",                 // +
  Minus = "Minus",               // -
  Asterisk = "Asterisk",         // *
  StarStar = "StarStar",         // **
  Slash = "Slash",               // /
  SlashSlash = "SlashSlash",     // //
  Percent = "Percent",           // %

  Equals = "Equals",                         // =
  EqualsEquals = "EqualsEquals",             // ==
  ExclamationEquals = "ExclamationEquals",   // !=
  LessThan = "LessThan",                     // <
  LessThanOrEqual = "LessThanOrEqual",       // <=
  GreaterThan = "GreaterThan",               // >
  GreaterThanOrEqual = "GreaterThanOrEqual", // >=

  // Fallback for unexpected characters
  Unknown = "Unknown",
}

/** Value payload for tokens; primitives only. */
export type TokenValue = string | number | boolean | null | undefined;

/**
 * Single lexical token.
 *
 * - `value`  : decoded literal value, identifier text, or undefined for punctuation
 * - `start`  : inclusive UTF-16 offset in the template
 * - `end`    : exclusive UTF-16 offset in the template
 */
export interface Token {
  type: TokenType;
  value: TokenValue;
  start: number;
  end: number;
  /** Marked true for string literals that reach the end of the range unclosed. */
  unterminated?: boolean;
  /** Exact decimal digits of an integer literal; `value` rounds past 2^53. */
  digits?: string;
}

/**
 * Scanner for template expressions.
 *
 * Scans `source` between `rangeStart` and `rangeEnd` so that token offsets stay
 * absolute within the whole template. Whitespace is skipped; expressions have
 * no comment syntax of their own.
 */
export class Scanner {
  private readonly source: string;
  private readonly end: number;
  private index: number;
  private lookahead: Token | null = null;

  constructor(source: string, rangeStart = 0, rangeEnd = source.length) {
    this.source = source;
    this.index = rangeStart;
    this.end = rangeEnd;
  }

  /** Current scanning position. */
  get position(): number {
    return this.index;
  }

  /**
   * Peek the next token without consuming it.
   * Always returns the same Token instance until `next()` is called.
   */
  peek(): Token {
    if (this.lookahead == null) {
      this.lookahead = this.scanToken();
    }
    return this.lookahead;
  }

  next(): Token {
    const t = this.peek();
    this.lookahead = null;
    return t;
  }

  // --------------------------------------------------------------------------------------
  // Core scanning
  // --------------------------------------------------------------------------------------

  private scanToken(): Token {
    this.skipWhitespace();

    const start = this.index;
    if (start >= this.end) {
      return this.makeToken(TokenType.EOF, start, start, undefined);
    }

    const ch = this.charCodeAt(this.index);

    if (this.isIdentifierStart(this.index)) {
      return this.scanIdentifier();
    }

    if (this.isDigit(ch) || (ch === CharCode.Dot && this.isDigit(this.charCodeAt(this.index + 1)))) {
      return this.scanNumber();
    }

    if (ch === CharCode.SingleQuote || ch === CharCode.DoubleQuote) {
      return this.scanString();
    }

    const next = this.charCodeAt(this.index + 1);
    switch (ch) {
      case CharCode.OpenParen:
        return this.punct(TokenType.OpenParen, 1);
      case CharCode.CloseParen:
        return this.punct(TokenType.CloseParen, 1);
      case CharCode.OpenBracket:
        return this.punct(TokenType.OpenBracket, 1);
      case CharCode.CloseBracket:
        return this.punct(TokenType.CloseBracket, 1);
      case CharCode.OpenBrace:
        return this.punct(TokenType.OpenBrace, 1);
      case CharCode.CloseBrace:
        return this.punct(TokenType.CloseBrace, 1);
      case CharCode.Comma:
        return this.punct(TokenType.Comma, 1);
      case CharCode.Colon:
        return this.punct(TokenType.Colon, 1);
      case CharCode.Dot:
        return this.punct(TokenType.Dot, 1);
      case CharCode.Bar:
        return this.punct(TokenType.Bar, 1);
      case CharCode.Tilde:
        return this.punct(TokenType.Tilde, 1);
      case CharCode.Plus:
        return this.punct(TokenType.Plus, 1);
      case CharCode.Minus:
        return this.punct(TokenType.Minus, 1);
      case CharCode.Percent:
        return this.punct(TokenType.Percent, 1);
      case CharCode.Asterisk:
        return next === CharCode.Asterisk
          ? this.punct(TokenType.StarStar, 2)
          : this.punct(TokenType.Asterisk, 1);
      case CharCode.Slash:
        return next === CharCode.Slash
          ? this.punct(TokenType.SlashSlash, 2)
          : this.punct(TokenType.Slash, 1);
      case CharCode.Equals:
        return next === CharCode.Equals
          ? this.punct(TokenType.EqualsEquals, 2)
          : this.punct(TokenType.Equals, 1);
      case CharCode.Exclamation:
        if (next === CharCode.Equals) return this.punct(TokenType.ExclamationEquals, 2);
        break;
      case CharCode.LessThan:
        return next === CharCode.Equals
          ? this.punct(TokenType.LessThanOrEqual, 2)
          : this.punct(TokenType.LessThan, 1);
      case CharCode.GreaterThan:
        return next === CharCode.Equals
          ? this.punct(TokenType.GreaterThanOrEqual, 2)
          : this.punct(TokenType.GreaterThan, 1);
      default:
        break;
    }

    this.index++;
    return this.makeToken(TokenType.Unknown, start, this.index, this.source.slice(start, this.index));
  }

  private punct(type: TokenType, width: number): Token {
    const start = this.index;
    this.index += width;
    return this.makeToken(type, start, this.index, undefined);
  }

  // --------------------------------------------------------------------------------------
  // Helpers: whitespace, identifiers, numbers, strings
  // --------------------------------------------------------------------------------------

  private skipWhitespace(): void {
    while (this.index < this.end && this.isWhitespace(this.charCodeAt(this.index))) {
      this.index++;
    }
  }

  private scanIdentifier(): Token {
    const start = this.index;
    this.index += this.codePointWidth(this.index);
    while (this.index < this.end && this.isIdentifierPart(this.index)) {
      this.index += this.codePointWidth(this.index);
    }

    const end = this.index;
    const text = this.source.slice(start, end);
    switch (text) {
      case "true":
      case "True":
        return this.makeToken(TokenType.BooleanLiteral, start, end, true);
      case "false":
      case "False":
        return this.makeToken(TokenType.BooleanLiteral, start, end, false);
      case "none":
      case "None":
        return this.makeToken(TokenType.NoneLiteral, start, end, null);
      default:
        return this.makeToken(TokenType.Identifier, start, end, text);
    }
  }

  /**
   * Integers are digit runs (with `_` separators) or `0x` / `0o` / `0b`
   * prefixed; anything with a fraction or exponent is a float.
   */
  private scanNumber(): Token {
    const start = this.index;
    let isFloat = false;

    const radix = this.charCodeAt(start) === CharCode.Zero ? radixOf(this.charCodeAt(start + 1)) : 0;
    if (radix !== 0 && isRadixDigit(this.charCodeAt(start + 2), radix)) {
      this.index += 2;
      this.skipDigits(radix);
      return this.integerToken(start, this.index);
    }

    this.skipDigits();

    if (this.charCodeAt(this.index) === CharCode.Dot && this.isDigit(this.charCodeAt(this.index + 1))) {
      isFloat = true;
      this.index++;
      this.skipDigits();
    }

    const e = this.charCodeAt(this.index);
    if (e === CharCode.LowercaseE || e === CharCode.UppercaseE) {
      const sign = this.charCodeAt(this.index + 1);
      const hasSign = sign === CharCode.Plus || sign === CharCode.Minus;
      if (this.isDigit(this.charCodeAt(this.index + (hasSign ? 2 : 1)))) {
        isFloat = true;
        this.index += hasSign ? 2 : 1;
        this.skipDigits();
      }
    }

    const end = this.index;
    if (!isFloat) return this.integerToken(start, end);
    return this.makeToken(TokenType.FloatLiteral, start, end, Number(this.source.slice(start, end).replace(/_/g, "")));
  }

  private integerToken(start: number, end: number): Token {
    const exact = BigInt(this.source.slice(start, end).replace(/_/g, ""));
    const tok = this.makeToken(TokenType.IntegerLiteral, start, end, Number(exact));
    tok.digits = exact.toString();
    return tok;
  }

  private skipDigits(radix = 10): void {
    while (this.index < this.end) {
      const c = this.charCodeAt(this.index);
      if (
        isRadixDigit(c, radix) ||
        (c === CharCode.Underscore && isRadixDigit(this.charCodeAt(this.index + 1), radix))
      ) {
        this.index++;
        continue;
      }
      break;
    }
  }

  private scanString(): Token {
    const quote = this.charCodeAt(this.index);
    const start = this.index;
    this.index++;

    let result = "";
    let closed = false;

    while (this.index < this.end) {
      const ch = this.charCodeAt(this.index);

      if (ch === quote) {
        this.index++;
        closed = true;
        break;
      }

      if (ch === CharCode.Backslash && this.index + 1 < this.end) {
        const next = this.charCodeAt(this.index + 1);
        this.index += 2;
        switch (next) {
          case CharCode.LowercaseN:
            result += "\n";
            break;
          case CharCode.LowercaseR:
            result += "\r";
            break;
          case CharCode.LowercaseT:
            result += "\t";
            break;
          case CharCode.Zero:
            result += "\0";
            break;
          case CharCode.SingleQuote:
          case CharCode.DoubleQuote:
          case CharCode.Backslash:
            result += String.fromCharCode(next);
            break;
          default:
            // Unknown escapes keep their backslash.
            result += "\\" + String.fromCharCode(next);
            break;
        }
        continue;
      }

      result += String.fromCharCode(ch);
      this.index++;
    }

    const tok = this.makeToken(TokenType.StringLiteral, start, this.index, result);
    if (!closed) {
      tok.unterminated = true;
    }
    return tok;
  }

  // --------------------------------------------------------------------------------------
  // Char helpers
  // --------------------------------------------------------------------------------------

  private charCodeAt(index: number): number {
    if (index < 0 || index >= this.end) return -1;
    return this.source.charCodeAt(index);
  }

  private isWhitespace(ch: number): boolean {
    return (
      ch === CharCode.Space ||
      ch === CharCode.Tab ||
      ch === CharCode.CarriageReturn ||
      ch === CharCode.LineFeed ||
      ch === CharCode.VerticalTab ||
      ch === CharCode.FormFeed
    );
  }

  private isDigit(ch: number): boolean {
    return ch >= CharCode.Zero && ch <= CharCode.Nine;
  }

  /** Identifiers follow Unicode `ID_Start` / `ID_Continue`, plus `_`. */
  private isIdentifierStart(index: number): boolean {
    const ch = this.charCodeAt(index);
    if (ch < 0x80) {
      return (
        (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseZ) ||
        (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseZ) ||
        ch === CharCode.Underscore
      );
    }
    return ID_START.test(this.codePointText(index));
  }

  private isIdentifierPart(index: number): boolean {
    const ch = this.charCodeAt(index);
    if (ch < 0x80) return this.isIdentifierStart(index) || this.isDigit(ch);
    return ID_CONTINUE.test(this.codePointText(index));
  }

  private codePointText(index: number): string {
    return this.source.slice(index, index + this.codePointWidth(index));
  }

  private codePointWidth(index: number): number {
    const cp = index < this.end ? this.source.codePointAt(index) : undefined;
    return cp !== undefined && cp > 0xffff && index + 1 < this.end ? 2 : 1;
  }

  private makeToken(type: TokenType, start: number, end: number, value: TokenValue): Token {
    return { type, value, start, end };
  }
}

const ID_START = /^\p{ID_Start}$/u;
const ID_CONTINUE = /^\p{ID_Continue}$/u;

function radixOf(ch: number): number {
  switch (ch) {
    case CharCode.LowercaseX:
    case CharCode.UppercaseX:
      return 16;
    case CharCode.LowercaseO:
    case CharCode.UppercaseO:
      return 8;
    case CharCode.LowercaseB:
    case CharCode.UppercaseB:
      return 2;
    default:
      return 0;
  }
}

function isRadixDigit(ch: number, radix: number): boolean {
  if (ch >= CharCode.Zero && ch <= CharCode.Nine) return ch - CharCode.Zero < radix;
  if (radix !== 16) return false;
  return (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseF) || (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseF);
}

// ----------------------------------------------------------------------------------------
// CharCode constants
// ----------------------------------------------------------------------------------------

export const enum CharCode {
  Tab = 0x0009,
  LineFeed = 0x000a,
  VerticalTab = 0x000b,
  FormFeed = 0x000c,
  CarriageReturn = 0x000d,
  Space = 0x0020,

  Zero = 0x0030,
  Nine = 0x0039,

  UppercaseA = 0x0041,
  UppercaseZ = 0x005a,
  LowercaseA = 0x0061,
  LowercaseZ = 0x007a,

  Exclamation = 0x0021,      // !
  DoubleQuote = 0x0022,      // "
  Hash = 0x0023,             // #
  Percent = 0x0025,          // %
  SingleQuote = 0x0027,      // '
  OpenParen = 0x0028,        // (
  CloseParen = 0x0029,       // )
  Asterisk = 0x002a,         // *
  Plus = 0x002b,             // +
  Comma = 0x002c,            // ,
  Minus = 0x002d,            // -
  Dot = 0x002e,              // .
  Slash = 0x002f,            // /
  Colon = 0x003a,            // :
  LessThan = 0x003c,         // <
  Equals = 0x003d,           // =
  GreaterThan = 0x003e,      // >
  OpenBracket = 0x005b,      // [
  Backslash = 0x005c,        // \
  CloseBracket = 0x005d,     // ]
  Underscore = 0x005f,       // _
  OpenBrace = 0x007b,        // {
  Bar = 0x007c,              // |
  CloseBrace = 0x007d,       // }
  Tilde = 0x007e,            // ~

  LowercaseN = 0x006e,       // n
  LowercaseR = 0x0072,       // r
  LowercaseT = 0x0074,       // t
  LowercaseE = 0x0065,       // e
  UppercaseE = 0x0045,       // E
  LowercaseF = 0x0066,       // f
  UppercaseF = 0x0046,       // F
  LowercaseX = 0x0078,       // x
  UppercaseX = 0x0058,       // X
  LowercaseO = 0x006f,       // o
  UppercaseO = 0x004f,       // O
  LowercaseB = 0x0062,       // b
  UppercaseB = 0x0042,       // B
}
