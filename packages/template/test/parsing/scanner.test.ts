import { test, describe, expect } from "vitest";

import { Scanner, TokenType, type Token } from "../../src/index.js";

function scanAll(source: string, start?: number, end?: number): Token[] {
  const scanner = new Scanner(source, start, end);
  const tokens: Token[] = [];
  for (;;) {
    const t = scanner.next();
    tokens.push(t);
    if (t.type === TokenType.EOF) break;
  }
  return tokens;
}

describe("scanner", () => {
  test("identifiers and literals", () => {
    const tokens = scanAll("foo 'bar' 42 3.5 True none");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.StringLiteral,
      TokenType.IntegerLiteral,
      TokenType.FloatLiteral,
      TokenType.BooleanLiteral,
      TokenType.NoneLiteral,
      TokenType.EOF,
    ]);
    expect(tokens.map((t) => t.value)).toEqual(["foo", "bar", 42, 3.5, true, null, undefined]);
  });

  test("word operators scan as identifiers", () => {
    const tokens = scanAll("a and not b is defined");
    expect(tokens.slice(0, -1).every((t) => t.type === TokenType.Identifier)).toBe(true);
    expect(tokens.map((t) => t.value).slice(0, -1)).toEqual(["a", "and", "not", "b", "is", "defined"]);
  });

  test("multi-character operators", () => {
    const tokens = scanAll("** // == != <= >= ~ |");
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.StarStar,
      TokenType.SlashSlash,
      TokenType.EqualsEquals,
      TokenType.ExclamationEquals,
      TokenType.LessThanOrEqual,
      TokenType.GreaterThanOrEqual,
      TokenType.Tilde,
      TokenType.Bar,
      TokenType.EOF,
    ]);
  });

  test("numbers: fractions and exponents are floats", () => {
    const tokens = scanAll("1_000 .5 2e3 7");
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.IntegerLiteral, 1000],
      [TokenType.FloatLiteral, 0.5],
      [TokenType.FloatLiteral, 2000],
      [TokenType.IntegerLiteral, 7],
      [TokenType.EOF, undefined],
    ]);
  });

  test("prefixed integers", () => {
    const tokens = scanAll("0x1F 0o17 0b1_01 0XfF").slice(0, -1);
    expect(tokens.map((t) => [t.type, t.value, t.digits])).toEqual([
      [TokenType.IntegerLiteral, 31, "31"],
      [TokenType.IntegerLiteral, 15, "15"],
      [TokenType.IntegerLiteral, 5, "5"],
      [TokenType.IntegerLiteral, 255, "255"],
    ]);
  });

  test("integers keep their exact digits past 2^53", () => {
    const [tok] = scanAll("9007199254740993");
    expect(tok?.value).toBe(9007199254740992);
    expect(tok?.digits).toBe("9007199254740993");
  });

  test("non-ASCII identifiers", () => {
    const tokens = scanAll("données ñ 名前_2").slice(0, -1);
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.Identifier, "données"],
      [TokenType.Identifier, "ñ"],
      [TokenType.Identifier, "名前_2"],
    ]);
  });

  test("string escapes are decoded", () => {
    const [tok] = scanAll("'it\\'s\\n' \"q\"");
    expect(tok?.value).toBe("it's\n");
    expect(tok?.unterminated).toBeUndefined();
  });

  test("unterminated strings are flagged", () => {
    const [tok] = scanAll("'open");
    expect(tok?.type).toBe(TokenType.StringLiteral);
    expect(tok?.unterminated).toBe(true);
  });

  test("scanning a range keeps absolute offsets", () => {
    const tokens = scanAll("{{ a }}", 2, 5);
    expect(tokens).toEqual([
      { type: TokenType.Identifier, value: "a", start: 3, end: 4 },
      { type: TokenType.EOF, value: undefined, start: 5, end: 5 },
    ]);
  });
});
