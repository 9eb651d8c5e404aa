import type { ClassDecl, Expr, FuncDecl, Program, Stmt } from "./ast.ts";
import { ResolutionError } from "./errors.ts";
import { classScopes, functionScope, INITIALIZER } from "./scope.ts";
import type { Token } from "./token.ts";

/** Scope distance of every resolved local; absent expressions are globals */
export type Resolution = Map<Expr, number>;

export type ResolveResult = {
  locals: Resolution;
  errors: ResolutionError[];
};

type FunctionKind = "None" | "Function" | "Initializer" | "Method";
type ClassKind = "None" | "Class" | "Subclass";

/**Resolver */
export class Resolver {
  // name -> whether its initializer has finished
  private scopes: Map<string, boolean>[] = [];
  private locals: Resolution = new Map();
  private errors: ResolutionError[] = [];
  private fnKind: FunctionKind = "None";
  private classKind: ClassKind = "None";

  public resolve = (program: Program): ResolveResult => {
    this.scopes = [];
    this.locals = new Map();
    this.errors = [];
    this.fnKind = "None";
    this.classKind = "None";

    for (const stmt of program.body) this.stmt(stmt);
    return { locals: this.locals, errors: this.errors };
  };

  private error = (tok: Token, msg: string): void => {
    this.errors.push(new ResolutionError(tok, msg));
  };

  private enterScope = (): void => {
    this.scopes.push(new Map());
  };

  private exitScope = (): void => {
    this.scopes.pop();
  };

  private declare = (name: Token): void => {
    const scope = this.scopes.at(-1);
    if (!scope) return;
    if (scope.has(name.lexeme)) {
      this.error(name, "Already a variable with this name in this scope.");
    }
    scope.set(name.lexeme, false);
  };

  private define = (name: string): void => {
    this.scopes.at(-1)?.set(name, true);
  };

  private resolveLocal = (expr: Expr, name: Token): void => {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i].has(name.lexeme)) {
        this.locals.set(expr, this.scopes.length - 1 - i);
        return;
      }
    }
  };

  private stmt = (stmt: Stmt): void => {
    switch (stmt.type) {
      case "ExprStmt": {
        this.expr(stmt.expr);
        return;
      }
      case "Print": {
        this.expr(stmt.value);
        return;
      }
      case "VarDecl": {
        this.declare(stmt.name);
        if (stmt.value) this.expr(stmt.value);
        this.define(stmt.name.lexeme);
        return;
      }
      case "Block": {
        this.enterScope();
        for (const s of stmt.body) this.stmt(s);
        this.exitScope();
        return;
      }
      case "If": {
        this.expr(stmt.cond);
        this.stmt(stmt.body);
        if (stmt.else) this.stmt(stmt.else);
        return;
      }
      case "While": {
        this.expr(stmt.cond);
        this.stmt(stmt.body);
        return;
      }
      case "FuncDecl": {
        this.declare(stmt.name);
        this.define(stmt.name.lexeme);
        this.func(stmt, "Function");
        return;
      }
      case "Return": {
        if (this.fnKind === "None") {
          this.error(stmt.keyword, "Can't return from top-level code.");
        }
        if (stmt.value) {
          if (this.fnKind === "Initializer") {
            this.error(
              stmt.keyword,
              "Can't return a value from an initializer.",
            );
          }
          this.expr(stmt.value);
        }
        return;
      }
      case "ClassDecl": {
        this.classDecl(stmt);
        return;
      }
    }
  };

  private func = (decl: FuncDecl, kind: FunctionKind): void => {
    const enclosing = this.fnKind;
    this.fnKind = kind;

    this.enterScope();
    for (const param of functionScope(decl)) {
      this.declare(param);
      this.define(param.lexeme);
    }
    for (const s of decl.body) this.stmt(s);
    this.exitScope();

    this.fnKind = enclosing;
  };

  private classDecl = (decl: ClassDecl): void => {
    const enclosing = this.classKind;
    this.classKind = "Class";

    this.declare(decl.name);
    this.define(decl.name.lexeme);

    if (decl.superclass) {
      if (decl.superclass.name.lexeme === decl.name.lexeme) {
        this.error(decl.superclass.name, "A class can't inherit from itself.");
      }
      this.classKind = "Subclass";
      this.expr(decl.superclass);
    }

    const frames = classScopes(decl);
    for (const frame of frames) {
      this.enterScope();
      for (const name of frame) this.define(name);
    }

    for (const method of decl.methods) {
      const kind = method.name.lexeme === INITIALIZER
        ? "Initializer"
        : "Method";
      this.func(method, kind);
    }

    for (let i = 0; i < frames.length; i++) this.exitScope();
    this.classKind = enclosing;
  };

  private expr = (expr: Expr): void => {
    switch (expr.type) {
      case "Literal":
        return;
      case "Grouping": {
        this.expr(expr.expr);
        return;
      }
      case "Unary": {
        this.expr(expr.argument);
        return;
      }
      case "Binary":
      case "Logical": {
        this.expr(expr.left);
        this.expr(expr.right);
        return;
      }
      case "Variable": {
        if (this.scopes.at(-1)?.get(expr.name.lexeme) === false) {
          this.error(
            expr.name,
            "Can't read local variable in its own initializer.",
          );
        }
        this.resolveLocal(expr, expr.name);
        return;
      }
      case "Assign": {
        this.expr(expr.value);
        this.resolveLocal(expr, expr.name);
        return;
      }
      case "Call": {
        this.expr(expr.callee);
        for (const arg of expr.args) this.expr(arg);
        return;
      }
      case "Get": {
        this.expr(expr.object);
        return;
      }
      case "Set": {
        this.expr(expr.object);
        this.expr(expr.value);
        return;
      }
      case "This": {
        if (this.classKind === "None") {
          this.error(expr.keyword, "Can't use 'this' outside of a class.");
          return;
        }
        this.resolveLocal(expr, expr.keyword);
        return;
      }
      case "Super": {
        if (this.classKind === "None") {
          this.error(expr.keyword, "Can't use 'super' outside of a class.");
        } else if (this.classKind !== "Subclass") {
          this.error(
            expr.keyword,
            "Can't use 'super' in a class with no superclass.",
          );
        }
        this.resolveLocal(expr, expr.keyword);
        return;
      }
    }
  };
}
