import type { Expr, Program, Stmt } from "./ast.ts";

const parenthesize = (...parts: string[]): string => `(${parts.join(" ")})`;

/** Prefix form of a node, e.g. `(* (- 123) (group 45.67))` */
export const print = (node: Program | Stmt | Expr): string => {
  switch (node.type) {
    case "Program":
      return node.body.map(print).join("\n");

    case "Literal":
      return node.value === null ? "nil" : String(node.value);
    case "Grouping":
      return parenthesize("group", print(node.expr));
    case "Unary":
      return parenthesize(node.op.lexeme, print(node.argument));
    case "Binary":
    case "Logical":
      return parenthesize(node.op.lexeme, print(node.left), print(node.right));
    case "Variable":
      return node.name.lexeme;
    case "Assign":
      return parenthesize("=", node.name.lexeme, print(node.value));
    case "Call":
      return parenthesize("call", print(node.callee), ...node.args.map(print));
    case "Get":
      return parenthesize(".", print(node.object), node.name.lexeme);
    case "Set":
      return parenthesize(
        "=",
        parenthesize(".", print(node.object), node.name.lexeme),
        print(node.value),
      );
    case "This":
      return "this";
    case "Super":
      return parenthesize("super", node.method.lexeme);

    case "ExprStmt":
      return parenthesize(";", print(node.expr));
    case "Print":
      return parenthesize("print", print(node.value));
    case "VarDecl":
      return node.value
        ? parenthesize("var", node.name.lexeme, print(node.value))
        : parenthesize("var", node.name.lexeme);
    case "Block":
      return parenthesize("block", ...node.body.map(print));
    case "If":
      return node.else
        ? parenthesize(
          "if",
          print(node.cond),
          print(node.body),
          print(node.else),
        )
        : parenthesize("if", print(node.cond), print(node.body));
    case "While":
      return parenthesize("while", print(node.cond), print(node.body));
    case "FuncDecl":
      return parenthesize(
        "fun",
        node.name.lexeme,
        parenthesize(...node.params.map((p) => p.lexeme)),
        ...node.body.map(print),
      );
    case "Return":
      return node.value
        ? parenthesize("return", print(node.value))
        : parenthesize("return");
    case "ClassDecl": {
      const head = node.superclass
        ? [node.name.lexeme, "<", node.superclass.name.lexeme]
        : [node.name.lexeme];
      return parenthesize("class", ...head, ...node.methods.map(print));
    }
  }
};
