import type { Literal, Token } from "./token.ts";

export type NodeType =
  | "Program"
  | "Literal"
  | "Grouping"
  | "Unary"
  | "Binary"
  | "Logical"
  | "Variable"
  | "Assign"
  | "Call"
  | "Get"
  | "Set"
  | "This"
  | "Super"
  | "ExprStmt"
  | "Print"
  | "VarDecl"
  | "Block"
  | "If"
  | "While"
  | "FuncDecl"
  | "Return"
  | "ClassDecl";

export interface Node {
  type: NodeType;
}

export interface Program extends Node {
  type: "Program";
  body: Stmt[];
}

export type Expr =
  | LiteralExpr
  | Grouping
  | Unary
  | Binary
  | Logical
  | Variable
  | Assign
  | Call
  | GetProp
  | SetProp
  | This
  | Super;

export type Stmt =
  | ExprStmt
  | Print
  | VarDecl
  | Block
  | If
  | While
  | FuncDecl
  | Return
  | ClassDecl;

export interface LiteralExpr extends Node {
  type: "Literal";
  value: Literal;
}

export interface Grouping extends Node {
  type: "Grouping";
  expr: Expr;
}

export interface Unary extends Node {
  type: "Unary";
  op: Token;
  argument: Expr;
}

export interface Binary extends Node {
  type: "Binary";
  op: Token;
  left: Expr;
  right: Expr;
}

/** `and` / `or`; kept apart from Binary since they short-circuit. */
export interface Logical extends Node {
  type: "Logical";
  op: Token;
  left: Expr;
  right: Expr;
}

export interface Variable extends Node {
  type: "Variable";
  name: Token;
}

export interface Assign extends Node {
  type: "Assign";
  name: Token;
  value: Expr;
}

export interface Call extends Node {
  type: "Call";
  callee: Expr;
  paren: Token; // closing paren, for error lines
  args: Expr[];
}

export interface GetProp extends Node {
  type: "Get";
  object: Expr;
  name: Token;
}

export interface SetProp extends Node {
  type: "Set";
  object: Expr;
  name: Token;
  value: Expr;
}

export interface This extends Node {
  type: "This";
  keyword: Token;
}

export interface Super extends Node {
  type: "Super";
  keyword: Token;
  method: Token;
}

export interface ExprStmt extends Node {
  type: "ExprStmt";
  expr: Expr;
}

export interface Print extends Node {
  type: "Print";
  value: Expr;
}

export interface VarDecl extends Node {
  type: "VarDecl";
  name: Token;
  value?: Expr;
}

export interface Block extends Node {
  type: "Block";
  body: Stmt[];
}

export interface If extends Node {
  type: "If";
  cond: Expr;
  body: Stmt;
  else?: Stmt;
}

export interface While extends Node {
  type: "While";
  cond: Expr;
  body: Stmt;
}

export interface FuncDecl extends Node {
  type: "FuncDecl";
  name: Token;
  params: Token[];
  body: Stmt[];
}

export interface Return extends Node {
  type: "Return";
  keyword: Token;
  value?: Expr;
}

export interface ClassDecl extends Node {
  type: "ClassDecl";
  name: Token;
  superclass?: Variable;
  methods: FuncDecl[];
}
