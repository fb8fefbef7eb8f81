import { describe, it, expect } from "vitest";
import { Lexer } from "../../src/lexer/lexer.js";
import { TokenKind } from "../../src/lexer/tokens.js";

describe("Lexer", () => {
  function tokenKinds(source: string): TokenKind[] {
    const lexer = new Lexer(source, "test.tv");
    return lexer.tokenize().map((t) => t.kind);
  }

  function tokenValues(source: string): string[] {
    const lexer = new Lexer(source, "test.tv");
    return lexer.tokenize().map((t) => t.value);
  }

  it("tokenizes empty input", () => {
    expect(tokenKinds("")).toEqual([TokenKind.EOF]);
  });

  it("tokenizes keywords", () => {
    expect(tokenKinds("module typevar tuplevar type function check")).toEqual([
      TokenKind.Module, TokenKind.TypeVar, TokenKind.TupleVar, TokenKind.Type,
      TokenKind.Function, TokenKind.Check, TokenKind.EOF,
    ]);
  });

  it("tokenizes identifiers", () => {
    expect(tokenKinds("Ts Shape _private int2")).toEqual([
      TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier,
      TokenKind.EOF,
    ]);
    expect(tokenValues("Ts Shape")).toEqual(["Ts", "Shape", ""]);
  });

  it("keeps dotted names together", () => {
    expect(tokenValues("typing.List")).toEqual(["typing.List", ""]);
  });

  it("does not include a trailing dot in an identifier", () => {
    const tokens = new Lexer("List.", "test.tv").tokenize();
    expect(tokens[0].value).toBe("List");
    expect(tokens[1].kind).toBe(TokenKind.Error);
    expect(tokens[1].value).toBe("Unexpected character: '.'");
  });

  it("tokenizes two-character operators", () => {
    expect(tokenKinds("-> ** ==")).toEqual([
      TokenKind.Arrow, TokenKind.StarStar, TokenKind.EqEq, TokenKind.EOF,
    ]);
  });

  it("tokenizes delimiters and punctuation", () => {
    expect(tokenKinds("( ) [ ] * , : =")).toEqual([
      TokenKind.LParen, TokenKind.RParen, TokenKind.LBracket, TokenKind.RBracket,
      TokenKind.Star, TokenKind.Comma, TokenKind.Colon, TokenKind.Eq, TokenKind.EOF,
    ]);
  });

  it("tokenizes a spread parameter", () => {
    expect(tokenKinds("*args: *Ts")).toEqual([
      TokenKind.Star, TokenKind.Identifier, TokenKind.Colon, TokenKind.Star, TokenKind.Identifier,
      TokenKind.EOF,
    ]);
  });

  it("skips both comment styles", () => {
    expect(tokenKinds("# a comment\ntype // another\nBatch")).toEqual([
      TokenKind.Type, TokenKind.Identifier, TokenKind.EOF,
    ]);
  });

  it("tracks line and column", () => {
    const tokens = new Lexer("module M\n  typevar T", "test.tv").tokenize();
    expect(tokens[2].span.start).toEqual({ offset: 11, line: 2, column: 3 });
    expect(tokens[3].span.start).toEqual({ offset: 19, line: 2, column: 11 });
    expect(tokens[3].span.end.column).toBe(12);
  });

  it("reports unexpected characters", () => {
    const tokens = new Lexer("type A[T] = List[T] | None", "test.tv").tokenize();
    const err = tokens.find((t) => t.kind === TokenKind.Error);
    expect(err?.value).toBe("Unexpected character: '|'");
  });
});
