import { TokenKind, type Token } from "./tokens.js";
import { KEYWORDS } from "./keywords.js";

export class Lexer {
  private source: string;
  private filename: string;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;

  constructor(source: string, filename: string = "<stdin>") {
    this.source = source;
    this.filename = filename;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.source.length) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.source.length) break;
      tokens.push(this.nextToken());
    }
    tokens.push(this.makeToken(TokenKind.EOF, "", this.pos, this.line, this.col));
    return tokens;
  }

  private nextToken(): Token {
    const ch = this.source[this.pos];
    if (this.isAlpha(ch) || ch === "_") return this.readIdentOrKeyword();
    return this.readPunctuation();
  }

  private readIdentOrKeyword(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (
      this.pos < this.source.length &&
      (this.isAlphaNum(this.source[this.pos]) || this.source[this.pos] === "_" || this.source[this.pos] === ".")
    ) {
      this.advance();
    }

    // Dotted names (`typing.List`) are one identifier; a trailing dot is not part of it.
    while (this.pos > startPos + 1 && this.source[this.pos - 1] === ".") {
      this.pos--;
      this.col--;
    }

    const value = this.source.slice(startPos, this.pos);
    const keyword = KEYWORDS.get(value);
    if (keyword !== undefined) {
      return this.makeToken(keyword, value, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Identifier, value, startPos, startLine, startCol);
  }

  private readPunctuation(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const ch = this.source[this.pos];
    const next = this.pos + 1 < this.source.length ? this.source[this.pos + 1] : "";

    // Two-character tokens
    switch (ch + next) {
      case "->": this.advance(); this.advance(); return this.makeToken(TokenKind.Arrow, "->", startPos, startLine, startCol);
      case "**": this.advance(); this.advance(); return this.makeToken(TokenKind.StarStar, "**", startPos, startLine, startCol);
      case "==": this.advance(); this.advance(); return this.makeToken(TokenKind.EqEq, "==", startPos, startLine, startCol);
    }

    // Single-character tokens
    this.advance();
    switch (ch) {
      case "(": return this.makeToken(TokenKind.LParen, ch, startPos, startLine, startCol);
      case ")": return this.makeToken(TokenKind.RParen, ch, startPos, startLine, startCol);
      case "[": return this.makeToken(TokenKind.LBracket, ch, startPos, startLine, startCol);
      case "]": return this.makeToken(TokenKind.RBracket, ch, startPos, startLine, startCol);
      case "*": return this.makeToken(TokenKind.Star, ch, startPos, startLine, startCol);
      case ",": return this.makeToken(TokenKind.Comma, ch, startPos, startLine, startCol);
      case ":": return this.makeToken(TokenKind.Colon, ch, startPos, startLine, startCol);
      case "=": return this.makeToken(TokenKind.Eq, ch, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Error, `Unexpected character: '${ch}'`, startPos, startLine, startCol);
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (
        ch === "#" ||
        (ch === "/" && this.pos + 1 < this.source.length && this.source[this.pos + 1] === "/")
      ) {
        // Line comment
        while (this.pos < this.source.length && this.source[this.pos] !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      this.pos++;
    }
  }

  private makeToken(
    kind: TokenKind,
    value: string,
    startPos: number,
    startLine: number,
    startCol: number,
  ): Token {
    return {
      kind,
      value,
      span: {
        start: { offset: startPos, line: startLine, column: startCol },
        end: { offset: this.pos, line: this.line, column: this.col },
        source: this.filename,
      },
    };
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
  }

  private isAlphaNum(ch: string): boolean {
    return this.isDigit(ch) || this.isAlpha(ch);
  }
}
