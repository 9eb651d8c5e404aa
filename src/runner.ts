import { createGlobals } from "./ast-walking/core.ts";
import type { Environment } from "./ast-walking/environment.ts";
import { Interpreter, type Writer } from "./ast-walking/interpreter.ts";
import type { Value } from "./ast-walking/value.ts";
import { RuntimeError, type StaticError } from "./errors.ts";
import { Lexer } from "./lexer.ts";
import { Parser } from "./parser.ts";
import { Resolver } from "./resolver.ts";

export type Phase = "lexical" | "syntax" | "resolution";

export type Outcome =
  | { type: "Ok"; value: Value | undefined }
  | { type: "StaticError"; phase: Phase; errors: StaticError[] }
  | { type: "RuntimeError"; error: RuntimeError };

export type RunnerOptions = {
  /** Caller-owned global frame; defaults to a fresh one with the natives */
  globals?: Environment;
  writer?: Writer;
};

export const EXIT_OK = 0;
export const EXIT_STATIC = 65;
export const EXIT_RUNTIME = 70;

/**
 * Loads and runs source text. Successive `run` calls share one global frame
 * and one interpreter, so a Runner doubles as a REPL session.
 */
export class Runner {
  public readonly globals: Environment;
  private interpreter: Interpreter;

  constructor(options: RunnerOptions = {}) {
    this.globals = options.globals ?? createGlobals();
    this.interpreter = new Interpreter(this.globals, options.writer);
  }

  public run = (source: string): Outcome => {
    const { tokens, errors: lexErrors } = new Lexer(source).scan();
    const { program, errors: parseErrors } = new Parser(tokens).parse();
    if (lexErrors.length > 0 || parseErrors.length > 0) {
      return {
        type: "StaticError",
        phase: lexErrors.length > 0 ? "lexical" : "syntax",
        errors: [...lexErrors, ...parseErrors],
      };
    }

    const { locals, errors } = new Resolver().resolve(program);
    if (errors.length > 0) {
      return { type: "StaticError", phase: "resolution", errors };
    }

    try {
      return { type: "Ok", value: this.interpreter.execute(program, locals) };
    } catch (e) {
      if (e instanceof RuntimeError) return { type: "RuntimeError", error: e };
      throw e;
    }
  };
}

export const exitCode = (outcome: Outcome): number => {
  switch (outcome.type) {
    case "Ok":
      return EXIT_OK;
    case "StaticError":
      return EXIT_STATIC;
    case "RuntimeError":
      return EXIT_RUNTIME;
  }
};

/** Diagnostic lines for an outcome; empty on success */
export const formatOutcome = (outcome: Outcome): string[] => {
  switch (outcome.type) {
    case "Ok":
      return [];
    case "StaticError":
      return outcome.errors.map((e) => e.format());
    case "RuntimeError":
      return [outcome.error.format()];
  }
};
