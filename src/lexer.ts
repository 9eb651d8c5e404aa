import { LexError } from "./errors.ts";
import { keywords, type Token, TokenType } from "./token.ts";
import { isalnum, isalpha, isdigit } from "./utils.ts";

export type ScanResult = {
  tokens: Token[];
  errors: LexError[];
};

/**Lexer */
export class Lexer {
  private pos = 0;
  private start = 0;
  private line = 1;
  private tokens: Token[] = [];
  private errors: LexError[] = [];

  constructor(private src: string) {}

  public scan = (): ScanResult => {
    this.pos = 0;
    this.line = 1;
    this.tokens = [];
    this.errors = [];

    for (;;) {
      this.skipSpaces();
      this.start = this.pos;
      if (this.pos >= this.src.length) break;
      this.nextToken();
    }
    this.start = this.pos;
    this.push(TokenType.EOF);
    return { tokens: this.tokens, errors: this.errors };
  };

  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "\0";

  private peek = (): string =>
    this.pos + 1 < this.src.length ? this.src[this.pos + 1] : "\0";

  private bump = (): void => {
    this.pos++;
  };

  private eat = (ch: string): boolean => {
    if (this.pos >= this.src.length || this.current() !== ch) return false;
    this.bump();
    return true;
  };

  private push = (type: TokenType, value?: string | number): void => {
    const tok: Token = {
      type,
      lexeme: this.src.slice(this.start, this.pos),
      line: this.line,
      offset: this.start,
      ...(value === undefined ? {} : { value }),
    };
    this.tokens.push(Object.freeze(tok));
  };

  private error = (msg: string): void => {
    this.errors.push(new LexError(msg, this.line));
  };

  private skipSpaces = (): void => {
    while (this.pos < this.src.length) {
      const ch = this.current();
      if (ch === " " || ch === "\t" || ch === "\r") this.bump();
      else if (ch === "\n") {
        this.line++;
        this.bump();
      } else if (ch === "/" && this.peek() === "/") {
        while (this.pos < this.src.length && this.current() !== "\n") {
          this.bump();
        }
      } else return;
    }
  };

  private parseNumber = (): void => {
    while (isdigit(this.current())) this.bump();

    if (this.current() === "." && isdigit(this.peek())) {
      this.bump();
      while (isdigit(this.current())) this.bump();
    }

    this.push(
      TokenType.NUMBER,
      parseFloat(this.src.slice(this.start, this.pos)),
    );
  };

  private parseAlpha = (): void => {
    while (isalnum(this.current())) this.bump();
    const ident = this.src.slice(this.start, this.pos);
    this.push(keywords.get(ident) ?? TokenType.IDENT);
  };

  private parseString = (): void => {
    this.bump();
    while (this.current() !== '"') {
      if (this.pos >= this.src.length || this.current() === "\n") {
        // resume on the next line; skipSpaces consumes the newline
        this.error("Unterminated string.");
        return;
      }
      this.bump();
    }
    this.bump();
    this.push(TokenType.STRING, this.src.slice(this.start + 1, this.pos - 1));
  };

  private nextToken = (): void => {
    const ch = this.current();
    if (isdigit(ch)) return this.parseNumber();
    if (isalpha(ch)) return this.parseAlpha();
    if (ch === '"') return this.parseString();

    this.bump();
    switch (ch) {
      case "(":
        return this.push(TokenType.LPAREN);
      case ")":
        return this.push(TokenType.RPAREN);
      case "{":
        return this.push(TokenType.LBRACE);
      case "}":
        return this.push(TokenType.RBRACE);
      case ",":
        return this.push(TokenType.COMMA);
      case ".":
        return this.push(TokenType.DOT);
      case "-":
        return this.push(TokenType.OP_SUB);
      case "+":
        return this.push(TokenType.OP_ADD);
      case ";":
        return this.push(TokenType.SEMICOLON);
      case "*":
        return this.push(TokenType.OP_MUL);
      case "/":
        return this.push(TokenType.OP_DIV);
      case "!":
        return this.push(this.eat("=") ? TokenType.COMP_NE : TokenType.LOG_NOT);
      case "=":
        return this.push(this.eat("=") ? TokenType.COMP_EQ : TokenType.OP_EQ);
      case "<":
        return this.push(this.eat("=") ? TokenType.COMP_LE : TokenType.COMP_LT);
      case ">":
        return this.push(this.eat("=") ? TokenType.COMP_GE : TokenType.COMP_GT);
      default:
        return this.error(`Unexpected character '${ch}'.`);
    }
  };
}
