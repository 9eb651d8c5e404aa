import type { ClassDecl, Expr, Program, Stmt } from "../ast.ts";
import { RuntimeError } from "../errors.ts";
import type { Resolution } from "../resolver.ts";
import {
  classScopes,
  functionScope,
  INITIALIZER,
  SUPER,
  THIS,
} from "../scope.ts";
import { type Token, TokenType } from "../token.ts";
import { err } from "../utils.ts";
import { createGlobals } from "./core.ts";
import { Environment } from "./environment.ts";
import {
  arity,
  bind,
  type Callable,
  type EmberClass,
  type EmberFunc,
  type EmberInstance,
  findMethod,
  getProperty,
  isCallable,
  isClass,
  isEqual,
  isInstance,
  isTruthy,
  stringify,
  type Value,
} from "./value.ts";

export type Writer = (line: string) => void;

/** How a statement finished; `Return` unwinds to the enclosing call */
export type Completion =
  | { type: "Normal" }
  | { type: "Return"; value: Value };

const NORMAL: Completion = { type: "Normal" };

const numbers = (op: Token, left: Value, right: Value): [number, number] => {
  if (typeof left === "number" && typeof right === "number") {
    return [left, right];
  }
  throw new RuntimeError(op, "Operands must be numbers.");
};

/**Interpreter */
export class Interpreter {
  private env: Environment;
  private locals: Resolution = new Map();

  constructor(
    public readonly globals: Environment = createGlobals(),
    private writer: Writer = console.log,
  ) {
    this.env = globals;
  }

  /**
   * Runs a resolved program. Returns the value of its last statement when
   * that is an expression statement, for REPL echoing.
   */
  public execute = (
    program: Program,
    locals: Resolution,
  ): Value | undefined => {
    for (const [expr, depth] of locals) this.locals.set(expr, depth);

    let result: Value | undefined = undefined;
    for (const stmt of program.body) {
      if (stmt.type === "ExprStmt") result = this.eval(stmt.expr);
      else {
        this.exec(stmt);
        result = undefined;
      }
    }
    return result;
  };

  /** Runs `body` in `env`, restoring the current frame however it exits */
  public executeBlock = (body: Stmt[], env: Environment): Completion => {
    const previous = this.env;
    try {
      this.env = env;
      for (const stmt of body) {
        const completion = this.exec(stmt);
        if (completion.type === "Return") return completion;
      }
      return NORMAL;
    } finally {
      this.env = previous;
    }
  };

  private exec = (stmt: Stmt): Completion => {
    switch (stmt.type) {
      case "ExprStmt": {
        this.eval(stmt.expr);
        return NORMAL;
      }
      case "Print": {
        this.writer(stringify(this.eval(stmt.value)));
        return NORMAL;
      }
      case "VarDecl": {
        const value = stmt.value ? this.eval(stmt.value) : null;
        this.env.define(stmt.name.lexeme, value);
        return NORMAL;
      }
      case "Block": {
        return this.executeBlock(stmt.body, new Environment(this.env));
      }
      case "If": {
        if (isTruthy(this.eval(stmt.cond))) return this.exec(stmt.body);
        else if (stmt.else) return this.exec(stmt.else);
        return NORMAL;
      }
      case "While": {
        while (isTruthy(this.eval(stmt.cond))) {
          const completion = this.exec(stmt.body);
          if (completion.type === "Return") return completion;
        }
        return NORMAL;
      }
      case "FuncDecl": {
        this.env.define(stmt.name.lexeme, {
          type: "EmberFunc",
          decl: stmt,
          closure: this.env,
          isInitializer: false,
        });
        return NORMAL;
      }
      case "Return": {
        const value = stmt.value ? this.eval(stmt.value) : null;
        return { type: "Return", value };
      }
      case "ClassDecl": {
        this.classDecl(stmt);
        return NORMAL;
      }
    }
  };

  private classDecl = (decl: ClassDecl): void => {
    let superclass: EmberClass | null = null;
    if (decl.superclass) {
      const sup = this.eval(decl.superclass);
      if (!isClass(sup)) {
        throw new RuntimeError(
          decl.superclass.name,
          "Superclass must be a class.",
        );
      }
      superclass = sup;
    }

    this.env.define(decl.name.lexeme, null);

    // every frame but the innermost; bind() opens that one per instance
    const bindings = new Map<string, Value>([[SUPER, superclass]]);
    let closure = this.env;
    for (const frame of classScopes(decl).slice(0, -1)) {
      closure = new Environment(closure);
      for (const name of frame) {
        const value = bindings.get(name);
        if (value === undefined) {
          return err("Interpreter", `Nothing to bind for '${name}'`);
        }
        closure.define(name, value);
      }
    }

    const methods = new Map<string, EmberFunc>();
    for (const method of decl.methods) {
      methods.set(method.name.lexeme, {
        type: "EmberFunc",
        decl: method,
        closure,
        isInitializer: method.name.lexeme === INITIALIZER,
      });
    }

    this.env.assign(decl.name, {
      type: "Class",
      name: decl.name.lexeme,
      superclass,
      methods,
    });
  };

  private lookup = (name: Token, expr: Expr): Value => {
    const depth = this.locals.get(expr);
    if (depth !== undefined) return this.env.getAt(depth, name.lexeme);
    return this.globals.get(name);
  };

  private eval = (expr: Expr): Value => {
    switch (expr.type) {
      case "Literal": {
        return expr.value;
      }
      case "Grouping": {
        return this.eval(expr.expr);
      }
      case "Unary": {
        const val = this.eval(expr.argument);
        switch (expr.op.type) {
          case TokenType.LOG_NOT:
            return !isTruthy(val);
          case TokenType.OP_SUB: {
            if (typeof val !== "number") {
              throw new RuntimeError(expr.op, "Operand must be a number.");
            }
            return -val;
          }
          default:
            return err(
              "Interpreter",
              `Unknown unary operator: ${expr.op.lexeme}`,
            );
        }
      }
      case "Binary": {
        const left = this.eval(expr.left);
        const right = this.eval(expr.right);

        switch (expr.op.type) {
          case TokenType.OP_ADD: {
            if (typeof left === "number" && typeof right === "number") {
              return left + right;
            }
            if (typeof left === "string" && typeof right === "string") {
              return left + right;
            }
            throw new RuntimeError(
              expr.op,
              "Operands must be two numbers or two strings.",
            );
          }
          case TokenType.OP_SUB: {
            const [l, r] = numbers(expr.op, left, right);
            return l - r;
          }
          case TokenType.OP_MUL: {
            const [l, r] = numbers(expr.op, left, right);
            return l * r;
          }
          case TokenType.OP_DIV: {
            const [l, r] = numbers(expr.op, left, right);
            return l / r;
          }
          case TokenType.COMP_GT: {
            const [l, r] = numbers(expr.op, left, right);
            return l > r;
          }
          case TokenType.COMP_GE: {
            const [l, r] = numbers(expr.op, left, right);
            return l >= r;
          }
          case TokenType.COMP_LT: {
            const [l, r] = numbers(expr.op, left, right);
            return l < r;
          }
          case TokenType.COMP_LE: {
            const [l, r] = numbers(expr.op, left, right);
            return l <= r;
          }
          case TokenType.COMP_EQ:
            return isEqual(left, right);
          case TokenType.COMP_NE:
            return !isEqual(left, right);
          default:
            return err("Interpreter", `Unknown operator: ${expr.op.lexeme}`);
        }
      }
      case "Logical": {
        const left = this.eval(expr.left);
        if (expr.op.type === TokenType.OR) {
          if (isTruthy(left)) return left;
        } else if (!isTruthy(left)) return left;
        return this.eval(expr.right);
      }
      case "Variable": {
        return this.lookup(expr.name, expr);
      }
      case "Assign": {
        const value = this.eval(expr.value);
        const depth = this.locals.get(expr);
        if (depth !== undefined) this.env.assignAt(depth, expr.name, value);
        else this.globals.assign(expr.name, value);
        return value;
      }
      case "Call": {
        const callee = this.eval(expr.callee);
        const args = expr.args.map((arg) => this.eval(arg));
        if (!isCallable(callee)) {
          throw new RuntimeError(
            expr.paren,
            "Can only call functions and classes.",
          );
        }
        return this.call(callee, args, expr.paren);
      }
      case "Get": {
        const object = this.eval(expr.object);
        if (!isInstance(object)) {
          throw new RuntimeError(expr.name, "Only instances have properties.");
        }
        return getProperty(object, expr.name);
      }
      case "Set": {
        const object = this.eval(expr.object);
        if (!isInstance(object)) {
          throw new RuntimeError(expr.name, "Only instances have fields.");
        }
        const value = this.eval(expr.value);
        object.fields.set(expr.name.lexeme, value);
        return value;
      }
      case "This": {
        return this.lookup(expr.keyword, expr);
      }
      case "Super": {
        const depth = this.locals.get(expr);
        if (depth === undefined) {
          return err("Interpreter", "Unresolved 'super' expression");
        }
        const superclass = this.env.getAt(depth, SUPER);
        // the `this` frame sits directly inside the `super` frame
        const object = this.env.getAt(depth - 1, THIS);
        if (!isClass(superclass) || !isInstance(object)) {
          return err("Interpreter", "Malformed method frames");
        }
        const method = findMethod(superclass, expr.method.lexeme);
        if (!method) {
          throw new RuntimeError(
            expr.method,
            `Undefined property '${expr.method.lexeme}'.`,
          );
        }
        return bind(method, object);
      }
    }
  };

  private call = (callee: Callable, args: Value[], paren: Token): Value => {
    const expected = arity(callee);
    if (args.length !== expected) {
      throw new RuntimeError(
        paren,
        `Expected ${expected} arguments but got ${args.length}.`,
      );
    }

    try {
      return this.invoke(callee, args);
    } catch (e) {
      // host stack exhausted by Ember recursion
      if (e instanceof RangeError) {
        throw new RuntimeError(paren, "Stack overflow.");
      }
      throw e;
    }
  };

  private invoke = (callee: Callable, args: Value[]): Value => {
    switch (callee.type) {
      case "NativeFunc":
        return callee.fn(...args);
      case "EmberFunc":
        return this.callFunction(callee, args);
      case "Class": {
        const instance: EmberInstance = {
          type: "Instance",
          klass: callee,
          fields: new Map(),
        };
        const init = findMethod(callee, INITIALIZER);
        if (init) this.callFunction(bind(init, instance), args);
        return instance;
      }
    }
  };

  private callFunction = (fn: EmberFunc, args: Value[]): Value => {
    const frame = new Environment(fn.closure);
    functionScope(fn.decl).forEach((param, i) => {
      frame.define(param.lexeme, args[i]);
    });

    const completion = this.executeBlock(fn.decl.body, frame);
    if (fn.isInitializer) return fn.closure.getAt(0, THIS);
    return completion.type === "Return" ? completion.value : null;
  };
}
