export enum TokenKind {
  // Identifiers
  Identifier = "Identifier",

  // Keywords
  Module = "module",
  TypeVar = "typevar",
  TupleVar = "tuplevar",
  Type = "type",
  Function = "function",
  Check = "check",

  // Delimiters
  LParen = "(",
  RParen = ")",
  LBracket = "[",
  RBracket = "]",

  // Operators
  Star = "*",
  StarStar = "**",
  EqEq = "==",

  // Punctuation
  Arrow = "->",
  Comma = ",",
  Colon = ":",
  Eq = "=",

  // Special
  EOF = "EOF",
  Error = "Error",
}

export interface Token {
  kind: TokenKind;
  value: string;
  span: {
    start: { offset: number; line: number; column: number };
    end: { offset: number; line: number; column: number };
    source: string;
  };
}
