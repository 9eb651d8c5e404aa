import { describe, expect, it } from "vitest";
import type {
  Block,
  ClassDecl,
  FuncDecl,
  Print,
  Program,
  Return,
  Stmt,
} from "../src/ast.ts";
import { Lexer } from "../src/lexer.ts";
import { Parser } from "../src/parser.ts";
import { Resolver, type ResolveResult } from "../src/resolver.ts";

const parse = (src: string): Program => {
  const { program, errors } = new Parser(new Lexer(src).scan().tokens).parse();
  expect(errors).toEqual([]);
  return program;
};

const resolve = (src: string): ResolveResult & { program: Program } => {
  const program = parse(src);
  return { program, ...new Resolver().resolve(program) };
};

const block = (s: Stmt): Block => {
  if (s.type !== "Block") throw new Error(`expected Block, got ${s.type}`);
  return s;
};

const printStmt = (s: Stmt): Print => {
  if (s.type !== "Print") throw new Error(`expected Print, got ${s.type}`);
  return s;
};

const returnStmt = (s: Stmt): Return => {
  if (s.type !== "Return") throw new Error(`expected Return, got ${s.type}`);
  return s;
};

const funcDecl = (s: Stmt): FuncDecl => {
  if (s.type !== "FuncDecl") {
    throw new Error(`expected FuncDecl, got ${s.type}`);
  }
  return s;
};

const classDecl = (s: Stmt): ClassDecl => {
  if (s.type !== "ClassDecl") {
    throw new Error(`expected ClassDecl, got ${s.type}`);
  }
  return s;
};

const messages = (src: string): string[] =>
  resolve(src).errors.map((e) => e.message);

describe("Resolver", () => {
  it("records distances that follow block shadowing", () => {
    const { program, locals, errors } = resolve(`
      var a = 1;
      {
        var a = 2;
        {
          print a;
        }
      }
      print a;
    `);
    expect(errors).toEqual([]);

    const outer = block(program.body[1]);
    const inner = block(outer.body[1]);
    const innerPrint = printStmt(inner.body[0]);
    const globalPrint = printStmt(program.body[2]);

    expect(locals.get(innerPrint.value)).toBe(1);
    expect(locals.has(globalPrint.value)).toBe(false);
  });

  it("resolves parameters in the function's own frame", () => {
    const { program, locals } = resolve("fun f(x) { print x; { print x; } }");
    const fn = funcDecl(program.body[0]);
    const direct = printStmt(fn.body[0]);
    const nested = printStmt(block(fn.body[1]).body[0]);

    expect(locals.get(direct.value)).toBe(0);
    expect(locals.get(nested.value)).toBe(1);
  });

  it("places this and super in frames around the methods", () => {
    const plain = resolve("class A { f() { return this; } }");
    const a = classDecl(plain.program.body[0]);
    const ret = returnStmt(a.methods[0].body[0]);
    expect(ret.value && plain.locals.get(ret.value)).toBe(1);

    const sub = resolve("class B < A { f() { return super.f; } }");
    const b = classDecl(sub.program.body[0]);
    const superRet = returnStmt(b.methods[0].body[0]);
    expect(superRet.value && sub.locals.get(superRet.value)).toBe(2);
  });

  it("rejects reading a local in its own initializer", () => {
    const { errors } = resolve("{\n  var a = a;\n}");
    expect(errors.map((e) => e.format())).toEqual([
      "[line 2] Error at 'a': Can't read local variable in its own initializer.",
    ]);
    expect(messages("var a = a;")).toEqual([]);
  });

  it("rejects duplicate locals and parameters", () => {
    expect(messages("{ var a = 1; var a = 2; }")).toEqual([
      "Already a variable with this name in this scope.",
    ]);
    expect(messages("fun f(a, a) {}")).toEqual([
      "Already a variable with this name in this scope.",
    ]);
    expect(messages("var a = 1; var a = 2;")).toEqual([]);
  });

  it("checks where return may appear", () => {
    expect(messages("return 1;")).toEqual([
      "Can't return from top-level code.",
    ]);
    expect(messages("class A { init() { return 1; } }")).toEqual([
      "Can't return a value from an initializer.",
    ]);
    expect(messages("class A { init() { return; } }")).toEqual([]);
    expect(messages("fun f() { return 1; }")).toEqual([]);
  });

  it("checks where this and super may appear", () => {
    expect(messages("print this;")).toEqual([
      "Can't use 'this' outside of a class.",
    ]);
    expect(messages("fun f() { return this; }")).toEqual([
      "Can't use 'this' outside of a class.",
    ]);
    expect(messages("print super.x;")).toEqual([
      "Can't use 'super' outside of a class.",
    ]);
    expect(messages("class A { f() { super.f(); } }")).toEqual([
      "Can't use 'super' in a class with no superclass.",
    ]);
  });

  it("rejects a class inheriting from itself", () => {
    expect(messages("class A < A {}")).toEqual([
      "A class can't inherit from itself.",
    ]);
  });

  it("collects every error in one pass", () => {
    const { errors } = resolve("return 1;\nprint this;");
    expect(errors.map((e) => e.line)).toEqual([1, 2]);
  });

  it("produces the same table when run twice", () => {
    const program = parse(`
      fun outer() {
        var n = 0;
        fun inner() { n = n + 1; return n; }
        return inner;
      }
      class A { init() { this.v = 1; } }
      class B < A { init() { super.init(); } }
    `);
    const resolver = new Resolver();
    const first = resolver.resolve(program);
    const second = resolver.resolve(program);

    expect(second.locals.size).toBe(first.locals.size);
    for (const [expr, depth] of first.locals) {
      expect(second.locals.get(expr)).toBe(depth);
    }
  });
});
