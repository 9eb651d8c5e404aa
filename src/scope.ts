import type { ClassDecl, FuncDecl } from "./ast.ts";
import type { Token } from "./token.ts";

export const THIS = "this";
export const SUPER = "super";
export const INITIALIZER = "init";

/*
 * Frame shapes shared by the Resolver and the Interpreter. Both passes open
 * their scopes from these helpers, so a distance computed statically always
 * lands on the frame the runtime builds.
 */

/**
 * Names bound by the single frame a call opens. The body runs directly in
 * this frame; no extra block frame is pushed for it.
 */
export const functionScope = (decl: FuncDecl): readonly Token[] =>
  decl.params;

/**
 * Frames enclosing every method of a class, outermost first. All but the
 * last are opened once, at class declaration; the last is opened each time a
 * method is bound to an instance.
 */
export const classScopes = (decl: ClassDecl): readonly string[][] =>
  decl.superclass ? [[SUPER], [THIS]] : [[THIS]];
