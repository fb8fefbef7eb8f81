import type { Diagnostic } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";
import type { Token } from "../lexer/tokens.js";
import { TokenKind } from "../lexer/tokens.js";

export function unexpectedToken(token: Token, expected?: string): Diagnostic {
  if (token.kind === TokenKind.Error) {
    return error("ParseError", token.value, token.span);
  }
  const got = token.kind === TokenKind.EOF ? "end of input" : `'${token.value}'`;
  const msg = expected
    ? `Expected ${expected}, got ${got}`
    : `Unexpected token ${got}`;
  return error("ParseError", msg, token.span);
}

/** Help for constructs borrowed from other generic-type notations. */
export function declarationHint(token: Token): Diagnostic | null {
  if (token.kind !== TokenKind.Identifier) return null;
  switch (token.value) {
    case "class":
      return error(
        "ParseError",
        "Generic types are declared with 'type'",
        token.span,
        "Write: type Array[*Shape]",
      );
    case "def":
      return error(
        "ParseError",
        "Generic functions are declared with 'function'",
        token.span,
        "Write: function to_tuple(*args: *Ts) -> Tuple[*Ts]",
      );
    case "TypeVar":
      return error(
        "ParseError",
        "Type variables are declared with 'typevar'",
        token.span,
        "Write: typevar T",
      );
    case "TypeVarTuple":
    case "TypeTupleVar":
      return error(
        "ParseError",
        "Tuple variables are declared with 'tuplevar'",
        token.span,
        "Write: tuplevar Ts",
      );
    case "import":
    case "from":
      return error(
        "ParseError",
        "Imports are not supported; declare everything in one module",
        token.span,
      );
  }
  return null;
}

/** Help for spread spellings that are not part of the notation. */
export function spreadHint(token: Token): Diagnostic | null {
  if (token.kind === TokenKind.Identifier && token.value === "Unpack") {
    return error(
      "ParseError",
      "'Unpack' is not supported",
      token.span,
      "Spread a tuple variable with '*Ts' or 'Expand[Ts]'",
    );
  }
  return null;
}
