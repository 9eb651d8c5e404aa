export { Lexer } from "./lexer.ts";
export { Parser } from "./parser.ts";
export { Resolver } from "./resolver.ts";
export { Interpreter } from "./ast-walking/interpreter.ts";
export { Environment } from "./ast-walking/environment.ts";
export { createGlobals } from "./ast-walking/core.ts";
export { stringify } from "./ast-walking/value.ts";
export { print } from "./printer.ts";
export {
  EXIT_OK,
  EXIT_RUNTIME,
  EXIT_STATIC,
  exitCode,
  formatOutcome,
  Runner,
} from "./runner.ts";
export { showToken } from "./token.ts";
export * from "./errors.ts";
export type { Program, Expr, Stmt } from "./ast.ts";
export type { Token } from "./token.ts";
export type { Resolution } from "./resolver.ts";
export type { Value } from "./ast-walking/value.ts";
export type { Completion, Writer } from "./ast-walking/interpreter.ts";
export type { Outcome, Phase, RunnerOptions } from "./runner.ts";
