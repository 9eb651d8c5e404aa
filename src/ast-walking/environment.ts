import { RuntimeError } from "../errors.ts";
import type { Token } from "../token.ts";
import { err } from "../utils.ts";
import type { Value } from "./value.ts";

/** Runtime frame: variables of one scope plus a link to the enclosing one */
export class Environment {
  private values = new Map<string, Value>();

  constructor(public readonly enclosing: Environment | null = null) {}

  // `var` semantics: redefining a name in the same frame overwrites it
  public define = (name: string, value: Value): void => {
    this.values.set(name, value);
  };

  public get = (name: Token): Value => {
    for (let env: Environment | null = this; env; env = env.enclosing) {
      const v = env.values.get(name.lexeme);
      if (v !== undefined) return v;
    }
    throw new RuntimeError(name, `Undefined variable '${name.lexeme}'.`);
  };

  public assign = (name: Token, value: Value): void => {
    for (let env: Environment | null = this; env; env = env.enclosing) {
      if (env.values.has(name.lexeme)) {
        env.values.set(name.lexeme, value);
        return;
      }
    }
    throw new RuntimeError(name, `Undefined variable '${name.lexeme}'.`);
  };

  public ancestor = (distance: number): Environment => {
    let env: Environment = this;
    for (let i = 0; i < distance; i++) {
      if (!env.enclosing) {
        return err("Environment", `No frame at distance ${distance}`);
      }
      env = env.enclosing;
    }
    return env;
  };

  public getAt = (distance: number, name: string): Value => {
    const v = this.ancestor(distance).values.get(name);
    if (v !== undefined) return v;
    return err(
      "Environment",
      `Variable '${name}' not found at distance ${distance}`,
    );
  };

  public assignAt = (distance: number, name: Token, value: Value): void => {
    this.ancestor(distance).values.set(name.lexeme, value);
  };
}
