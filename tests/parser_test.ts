import { describe, expect, it } from "vitest";
import { Lexer } from "../src/lexer.ts";
import { Parser, type ParseResult } from "../src/parser.ts";
import { print } from "../src/printer.ts";

const parse = (src: string): ParseResult =>
  new Parser(new Lexer(src).scan().tokens).parse();

const show = (src: string): string => {
  const { program, errors } = parse(src);
  expect(errors).toEqual([]);
  return print(program);
};

describe("Parser", () => {
  it("parses a variable declaration", () => {
    const { program } = parse("var x = 1;");
    expect(program).toEqual({
      type: "Program",
      body: [
        {
          type: "VarDecl",
          name: { type: expect.anything(), lexeme: "x", line: 1, offset: 4 },
          value: { type: "Literal", value: 1 },
        },
      ],
    });
  });

  it("follows operator precedence", () => {
    expect(show("-1+2*3;")).toBe("(; (+ (- 1) (* 2 3)))");
    expect(show("1 < 2 == true;")).toBe("(; (== (< 1 2) true))");
    expect(show("a or b and c;")).toBe("(; (or a (and b c)))");
    expect(show("!!a;")).toBe("(; (! (! a)))");
  });

  it("associates binary operators to the left", () => {
    expect(show("2-3-4;")).toBe("(; (- (- 2 3) 4))");
    expect(show("8/4/2;")).toBe("(; (/ (/ 8 4) 2))");
  });

  it("associates assignment to the right", () => {
    expect(show("a = b = 1;")).toBe("(; (= a (= b 1)))");
  });

  it("chains calls and property access", () => {
    expect(show("a.b(1)(2).c = 3;")).toBe(
      "(; (= (. (call (call (. a b) 1) 2) c) 3))",
    );
  });

  it("binds else to the nearest if", () => {
    expect(show("if (a) if (b) print 1; else print 2;")).toBe(
      "(if a (if b (print 1) (print 2)))",
    );
  });

  it("desugars for loops into while", () => {
    expect(show("for (var i = 0; i < 3; i = i + 1) print i;")).toBe(
      "(block (var i 0) (while (< i 3) (block (print i) (; (= i (+ i 1))))))",
    );
    expect(show("for (;;) print 1;")).toBe("(while true (print 1))");
  });

  it("parses classes with superclasses and methods", () => {
    expect(
      show(
        "class B < A { init(x) { this.x = x; } get() { return super.get(); } }",
      ),
    ).toBe(
      "(class B < A (fun init (x) (; (= (. this x) x))) (fun get () (return (call (super get)))))",
    );
  });

  it("reports an invalid assignment target without unwinding", () => {
    const { program, errors } = parse("1 = 2;");
    expect(errors.map((e) => e.format())).toEqual([
      "[line 1] Error at '=': Invalid assignment target.",
    ]);
    expect(program.body).toHaveLength(1);
  });

  it("recovers at statement boundaries", () => {
    const { program, errors } = parse(
      "var = 1;\nprint 2;\nvar x = ;\nprint 3;",
    );
    expect(errors.map((e) => e.format())).toEqual([
      "[line 1] Error at '=': Expect variable name.",
      "[line 3] Error at ';': Expect expression.",
    ]);
    expect(print(program)).toBe("(print 2)\n(print 3)");
  });

  it("reports errors at the end of input", () => {
    const { errors } = parse("print 1");
    expect(errors.map((e) => e.format())).toEqual([
      "[line 1] Error at end: Expect ';' after value.",
    ]);
  });

  it("limits parameter and argument counts", () => {
    const names = Array.from({ length: 256 }, (_, i) => `p${i}`);
    const decl = parse(`fun f(${names.join(", ")}) {}`);
    expect(decl.errors.map((e) => [e.message, e.token.lexeme])).toEqual([
      ["Can't have more than 255 parameters.", "p255"],
    ]);
    expect(decl.program.body).toHaveLength(1);

    const call = parse(`f(${Array(256).fill("1").join(", ")});`);
    expect(call.errors.map((e) => e.message)).toEqual([
      "Can't have more than 255 arguments.",
    ]);
  });
});
