import type { FuncDecl } from "../ast.ts";
import { RuntimeError } from "../errors.ts";
import { INITIALIZER, THIS } from "../scope.ts";
import type { Literal, Token } from "../token.ts";
import { Environment } from "./environment.ts";

/** Functions implemented in TypeScript */
export interface NativeFunc {
  type: "NativeFunc";
  name: string;
  arity: number;
  fn: (...args: Value[]) => Value;
}

/** Functions defined in ember code, closed over their defining frame */
export interface EmberFunc {
  type: "EmberFunc";
  decl: FuncDecl;
  closure: Environment;
  isInitializer: boolean;
}

export interface EmberClass {
  type: "Class";
  name: string;
  superclass: EmberClass | null;
  methods: Map<string, EmberFunc>;
}

export interface EmberInstance {
  type: "Instance";
  klass: EmberClass;
  fields: Map<string, Value>;
}

export type Callable = NativeFunc | EmberFunc | EmberClass;

export type Value = Literal | Callable | EmberInstance;

export const isCallable = (v: Value): v is Callable =>
  typeof v === "object" && v !== null && v.type !== "Instance";

export const isClass = (v: Value): v is EmberClass =>
  typeof v === "object" && v !== null && v.type === "Class";

export const isInstance = (v: Value): v is EmberInstance =>
  typeof v === "object" && v !== null && v.type === "Instance";

/** nil and false are falsy, everything else is truthy */
export const isTruthy = (v: Value): boolean => v !== null && v !== false;

// primitives compare by value, objects by identity
export const isEqual = (a: Value, b: Value): boolean => a === b;

export const findMethod = (
  klass: EmberClass,
  name: string,
): EmberFunc | undefined => {
  for (let k: EmberClass | null = klass; k; k = k.superclass) {
    const method = k.methods.get(name);
    if (method) return method;
  }
  return undefined;
};

export const bind = (method: EmberFunc, instance: EmberInstance): EmberFunc => {
  const env = new Environment(method.closure);
  env.define(THIS, instance);
  return { ...method, closure: env };
};

export const arity = (callee: Callable): number => {
  switch (callee.type) {
    case "NativeFunc":
      return callee.arity;
    case "EmberFunc":
      return callee.decl.params.length;
    case "Class": {
      const init = findMethod(callee, INITIALIZER);
      return init ? init.decl.params.length : 0;
    }
  }
};

/** Fields shadow methods; methods come back bound to the instance */
export const getProperty = (instance: EmberInstance, name: Token): Value => {
  const field = instance.fields.get(name.lexeme);
  if (field !== undefined) return field;

  const method = findMethod(instance.klass, name.lexeme);
  if (method) return bind(method, instance);

  throw new RuntimeError(name, `Undefined property '${name.lexeme}'.`);
};

const showNumber = (n: number): string => {
  if (Object.is(n, -0)) return "-0";
  // integral values past 1e21 would otherwise print in exponent form
  if (Number.isInteger(n)) return BigInt(n).toString();
  return String(n);
};

export const stringify = (v: Value): string => {
  if (v === null) return "nil";
  if (typeof v === "number") return showNumber(v);
  if (typeof v === "boolean" || typeof v === "string") return String(v);
  switch (v.type) {
    case "NativeFunc":
      return "<native fn>";
    case "EmberFunc":
      return `<fn ${v.decl.name.lexeme}>`;
    case "Class":
      return v.name;
    case "Instance":
      return `${v.klass.name} instance`;
  }
};
