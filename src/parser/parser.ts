import { TokenKind, type Token } from "../lexer/tokens.js";
import type { Diagnostic, Span } from "../errors/diagnostic.js";
import { unexpectedToken, declarationHint, spreadHint } from "./errors.js";
import type {
  ModuleDecl, Declaration, PlaceholderDecl, PlaceholderName, TypeDecl, FunctionDecl,
  CheckDecl, CheckTarget, Parameter, RestKind,
  TypeNode, TypeArgNode, TypeRefNode, GroupNode, SpreadNode,
} from "../ast/nodes.js";

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private errors: Diagnostic[] = [];
  private filename: string;

  constructor(tokens: Token[], filename: string = "<stdin>") {
    this.tokens = tokens;
    this.filename = filename;
  }

  parse(): { module: ModuleDecl; errors: Diagnostic[] } {
    const mod = this.parseModule();
    return { module: mod, errors: this.errors };
  }

  // ============================================================
  // Module
  // ============================================================

  private parseModule(): ModuleDecl {
    const start = this.peek();
    this.expect(TokenKind.Module);
    const name = this.expectIdent();
    const declarations: Declaration[] = [];

    while (!this.isAtEnd()) {
      const errorCount = this.errors.length;
      const decl = this.parseDeclaration();
      if (decl) declarations.push(decl);
      // Skip the rest of a malformed declaration instead of reporting each token.
      if (this.errors.length > errorCount) this.synchronize();
    }

    return {
      kind: "ModuleDecl",
      name,
      declarations,
      span: this.spanFrom(start),
    };
  }

  // ============================================================
  // Declarations
  // ============================================================

  private parseDeclaration(): Declaration | null {
    const tok = this.peek();

    const hint = declarationHint(tok);
    if (hint) {
      this.errors.push(hint);
      this.advance();
      return null;
    }

    switch (tok.kind) {
      case TokenKind.TypeVar:
      case TokenKind.TupleVar:
        return this.parsePlaceholderDecl();
      case TokenKind.Type:
        return this.parseTypeDecl();
      case TokenKind.Function:
        return this.parseFunctionDecl();
      case TokenKind.Check:
        return this.parseCheckDecl();
    }

    this.errors.push(unexpectedToken(tok, "a declaration (typevar, tuplevar, type, function, check)"));
    this.advance();
    return null;
  }

  private parsePlaceholderDecl(): PlaceholderDecl {
    const start = this.advance();
    const variadic = start.kind === TokenKind.TupleVar;
    const names: PlaceholderName[] = [this.parsePlaceholderName()];
    while (this.peek().kind === TokenKind.Comma) {
      this.advance();
      names.push(this.parsePlaceholderName());
    }
    return { kind: "PlaceholderDecl", variadic, names, span: this.spanFrom(start) };
  }

  private parsePlaceholderName(): PlaceholderName {
    const start = this.peek();
    const name = this.expectIdent();
    return { kind: "PlaceholderName", name, span: this.spanFrom(start) };
  }

  private parseTypeDecl(): TypeDecl {
    const start = this.peek();
    this.expect(TokenKind.Type);
    const name = this.expectIdent();

    let params: TypeArgNode[] | null = null;
    if (this.peek().kind === TokenKind.LBracket) {
      this.advance();
      params = this.parseTypeArgList(TokenKind.RBracket);
      this.expect(TokenKind.RBracket);
    }

    let body: TypeNode | undefined;
    if (this.peek().kind === TokenKind.Eq) {
      this.advance();
      body = this.parseType();
    }

    return { kind: "TypeDecl", name, params, body, span: this.spanFrom(start) };
  }

  private parseFunctionDecl(): FunctionDecl {
    const start = this.peek();
    this.expect(TokenKind.Function);
    const name = this.expectIdent();
    this.expect(TokenKind.LParen);
    const params = this.parseParamList();
    this.expect(TokenKind.RParen);

    let returnType: TypeNode | undefined;
    if (this.peek().kind === TokenKind.Arrow) {
      this.advance();
      returnType = this.parseType();
    }

    return { kind: "FunctionDecl", name, params, returnType, span: this.spanFrom(start) };
  }

  private parseParamList(): Parameter[] {
    const params: Parameter[] = [];
    if (this.peek().kind === TokenKind.RParen) return params;

    params.push(this.parseParam());
    while (this.peek().kind === TokenKind.Comma) {
      this.advance();
      if (this.peek().kind === TokenKind.RParen) break; // trailing comma
      params.push(this.parseParam());
    }
    return params;
  }

  private parseParam(): Parameter {
    const start = this.peek();
    let rest: RestKind = "none";
    if (start.kind === TokenKind.Star) {
      this.advance();
      rest = "positional";
    } else if (start.kind === TokenKind.StarStar) {
      this.advance();
      rest = "keyword";
    }
    const name = this.expectIdent();
    this.expect(TokenKind.Colon);
    const typeAnnotation = this.parseTypeArg();
    return { kind: "Parameter", name, rest, typeAnnotation, span: this.spanFrom(start) };
  }

  private parseCheckDecl(): CheckDecl {
    const start = this.peek();
    this.expect(TokenKind.Check);
    const target = this.parseCheckTarget();

    let expected: TypeNode | undefined;
    if (this.peek().kind === TokenKind.EqEq) {
      this.advance();
      expected = this.parseType();
    }

    return { kind: "CheckDecl", target, expected, span: this.spanFrom(start) };
  }

  private parseCheckTarget(): CheckTarget {
    const start = this.peek();
    if (start.kind === TokenKind.Identifier && this.peekNext().kind === TokenKind.LParen) {
      this.advance(); // callee
      this.advance(); // '('
      const args = this.parseTypeArgList(TokenKind.RParen);
      this.expect(TokenKind.RParen);
      return { kind: "Call", callee: start.value, args, span: this.spanFrom(start) };
    }
    return this.parseType();
  }

  // ============================================================
  // Types
  // ============================================================

  private parseTypeArgList(closing: TokenKind): TypeArgNode[] {
    const args: TypeArgNode[] = [];
    if (this.peek().kind === closing) return args;

    args.push(this.parseTypeArg());
    while (this.peek().kind === TokenKind.Comma) {
      this.advance();
      if (this.peek().kind === closing) break; // trailing comma
      args.push(this.parseTypeArg());
    }
    return args;
  }

  private parseTypeArg(): TypeArgNode {
    const start = this.peek();
    if (start.kind === TokenKind.Star) {
      this.advance();
      const operand = this.parseType();
      const node: SpreadNode = { kind: "Spread", operand, span: this.spanFrom(start) };
      return node;
    }
    return this.parseType();
  }

  private parseType(): TypeNode {
    const start = this.peek();

    if (start.kind === TokenKind.LParen) return this.parseGroup();

    const hint = spreadHint(start);
    if (hint) {
      this.errors.push(hint);
    }

    const name = this.expectIdent();
    let typeArgs: TypeArgNode[] | null = null;
    if (this.peek().kind === TokenKind.LBracket) {
      this.advance();
      typeArgs = this.parseTypeArgList(TokenKind.RBracket);
      this.expect(TokenKind.RBracket);
    }
    const node: TypeRefNode = { kind: "TypeRef", name, typeArgs, span: this.spanFrom(start) };
    return node;
  }

  private parseGroup(): GroupNode {
    const start = this.peek();
    this.expect(TokenKind.LParen);
    const elements: TypeNode[] = [];
    if (this.peek().kind !== TokenKind.RParen) {
      elements.push(this.parseType());
      while (this.peek().kind === TokenKind.Comma) {
        this.advance();
        if (this.peek().kind === TokenKind.RParen) break; // `(int,)`
        elements.push(this.parseType());
      }
    }
    this.expect(TokenKind.RParen);
    return { kind: "Group", elements, span: this.spanFrom(start) };
  }

  // ============================================================
  // Helpers
  // ============================================================

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private peekNext(): Token {
    return this.tokens[this.pos + 1] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const tok = this.peek();
    if (!this.isAtEnd()) this.pos++;
    return tok;
  }

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  private expect(kind: TokenKind): Token {
    const tok = this.peek();
    if (tok.kind === kind) return this.advance();

    this.errors.push(unexpectedToken(tok, `'${kind}'`));
    // Don't advance; let the caller decide how to recover
    return tok;
  }

  private expectIdent(): string {
    const tok = this.peek();
    if (tok.kind === TokenKind.Identifier) {
      this.advance();
      return tok.value;
    }
    this.errors.push(unexpectedToken(tok, "an identifier"));
    return "<error>";
  }

  private spanFrom(startToken: Token): Span {
    const prev = this.tokens[this.pos - 1] ?? startToken;
    return {
      start: startToken.span.start,
      end: prev.span.end,
      source: this.filename,
    };
  }

  private synchronize(): void {
    while (!this.isAtEnd()) {
      switch (this.peek().kind) {
        case TokenKind.TypeVar:
        case TokenKind.TupleVar:
        case TokenKind.Type:
        case TokenKind.Function:
        case TokenKind.Check:
          return;
      }
      this.advance();
    }
  }
}
