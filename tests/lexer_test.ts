import { describe, expect, it } from "vitest";
import { Lexer } from "../src/lexer.ts";
import { TokenType } from "../src/token.ts";

const types = (src: string): TokenType[] =>
  new Lexer(src).scan().tokens.map((t) => t.type);

describe("Lexer", () => {
  it("prefers two-character operators", () => {
    expect(types("!= ! == = <= < >= >")).toEqual([
      TokenType.COMP_NE,
      TokenType.LOG_NOT,
      TokenType.COMP_EQ,
      TokenType.OP_EQ,
      TokenType.COMP_LE,
      TokenType.COMP_LT,
      TokenType.COMP_GE,
      TokenType.COMP_GT,
      TokenType.EOF,
    ]);
  });

  it("scans punctuation", () => {
    expect(types("(){},.-+;/*")).toEqual([
      TokenType.LPAREN,
      TokenType.RPAREN,
      TokenType.LBRACE,
      TokenType.RBRACE,
      TokenType.COMMA,
      TokenType.DOT,
      TokenType.OP_SUB,
      TokenType.OP_ADD,
      TokenType.SEMICOLON,
      TokenType.OP_DIV,
      TokenType.OP_MUL,
      TokenType.EOF,
    ]);
  });

  it("scans integer and decimal numbers", () => {
    const { tokens } = new Lexer("12 3.5 7.").scan();
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      [TokenType.NUMBER, 12],
      [TokenType.NUMBER, 3.5],
      [TokenType.NUMBER, 7],
      [TokenType.DOT, undefined],
      [TokenType.EOF, undefined],
    ]);
  });

  it("has no leading-dot numbers", () => {
    expect(types(".5")).toEqual([
      TokenType.DOT,
      TokenType.NUMBER,
      TokenType.EOF,
    ]);
  });

  it("tells keywords from identifiers", () => {
    const { tokens } = new Lexer("class classy _x or").scan();
    expect(tokens.map((t) => [t.type, t.lexeme])).toEqual([
      [TokenType.CLASS, "class"],
      [TokenType.IDENT, "classy"],
      [TokenType.IDENT, "_x"],
      [TokenType.OR, "or"],
      [TokenType.EOF, ""],
    ]);
  });

  it("scans string literals", () => {
    const [tok] = new Lexer('"hi there"').scan().tokens;
    expect(tok.type).toBe(TokenType.STRING);
    expect(tok.lexeme).toBe('"hi there"');
    expect(tok.value).toBe("hi there");
  });

  it("resumes on the next line after an unterminated string", () => {
    const { tokens, errors } = new Lexer('print "oops\nvar x = 1;').scan();
    expect(errors.map((e) => [e.line, e.message])).toEqual([
      [1, "Unterminated string."],
    ]);
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.PRINT,
      TokenType.VAR,
      TokenType.IDENT,
      TokenType.OP_EQ,
      TokenType.NUMBER,
      TokenType.SEMICOLON,
      TokenType.EOF,
    ]);
    expect(tokens[1].line).toBe(2);
  });

  it("reports every unknown character", () => {
    const { tokens, errors } = new Lexer("@ 1 # 2").scan();
    expect(errors.map((e) => e.message)).toEqual([
      "Unexpected character '@'.",
      "Unexpected character '#'.",
    ]);
    expect(tokens.map((t) => t.value)).toEqual([1, 2, undefined]);
  });

  it("skips comments and tracks lines", () => {
    const { tokens } = new Lexer("// c\nx // d\n\ny").scan();
    expect(tokens.map((t) => [t.lexeme, t.line])).toEqual([
      ["x", 2],
      ["y", 4],
      ["", 4],
    ]);
  });

  it("appends exactly one EOF", () => {
    expect(types("")).toEqual([TokenType.EOF]);
    expect(types("  \n\t")).toEqual([TokenType.EOF]);
    expect(types("a").filter((t) => t === TokenType.EOF)).toHaveLength(1);
  });

  it("covers the source with tokens, whitespace and comments", () => {
    const src = 'var a = "s"; // note\nfun f(x) {\n  return x * 2.5;\n}\n';
    const { tokens, errors } = new Lexer(src).scan();
    expect(errors).toEqual([]);

    let end = 0;
    for (const tok of tokens) {
      expect(src.slice(tok.offset, tok.offset + tok.lexeme.length)).toBe(
        tok.lexeme,
      );
      const gap = src.slice(end, tok.offset).replace(/\/\/[^\n]*/g, "");
      expect(gap.trim()).toBe("");
      end = tok.offset + tok.lexeme.length;
    }
    expect(tokens.at(-1)?.offset).toBe(src.length);
  });

  it("freezes tokens", () => {
    const [tok] = new Lexer("x").scan().tokens;
    expect(Object.isFrozen(tok)).toBe(true);
  });
});
