import { TokenKind } from "./tokens.js";

export const KEYWORDS: Map<string, TokenKind> = new Map([
  ["module", TokenKind.Module],
  ["typevar", TokenKind.TypeVar],
  ["tuplevar", TokenKind.TupleVar],
  ["type", TokenKind.Type],
  ["function", TokenKind.Function],
  ["check", TokenKind.Check],
]);
