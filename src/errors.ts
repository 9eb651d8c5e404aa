import { type Token, TokenType } from "./token.ts";

export type ErrorKind = "lexical" | "syntax" | "resolution" | "runtime";

/** Base class of every diagnostic Ember reports to its caller. */
export abstract class EmberError extends Error {
  public abstract readonly kind: ErrorKind;

  constructor(message: string, public readonly line: number) {
    super(message);
    this.name = new.target.name;
  }

  public abstract format(): string;
}

export class LexError extends EmberError {
  public readonly kind = "lexical";

  public format(): string {
    return `[line ${this.line}] Error: ${this.message}`;
  }
}

const where = (token: Token): string =>
  token.type === TokenType.EOF ? "at end" : `at '${token.lexeme}'`;

export class ParseError extends EmberError {
  public readonly kind = "syntax";

  constructor(public readonly token: Token, message: string) {
    super(message, token.line);
  }

  public format(): string {
    return `[line ${this.line}] Error ${where(this.token)}: ${this.message}`;
  }
}

export class ResolutionError extends EmberError {
  public readonly kind = "resolution";

  constructor(public readonly token: Token, message: string) {
    super(message, token.line);
  }

  public format(): string {
    return `[line ${this.line}] Error ${where(this.token)}: ${this.message}`;
  }
}

export class RuntimeError extends EmberError {
  public readonly kind = "runtime";

  constructor(public readonly token: Token, message: string) {
    super(message, token.line);
  }

  public format(): string {
    return `${this.message}\n[line ${this.line}]`;
  }
}

export type StaticError = LexError | ParseError | ResolutionError;
