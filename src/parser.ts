import type { Block, Expr, FuncDecl, Program, Stmt, Variable } from "./ast.ts";
import { ParseError } from "./errors.ts";
import { type Token, TokenType } from "./token.ts";

export const MAX_ARITY = 255;

export type ParseResult = {
  program: Program;
  errors: ParseError[];
};

const STATEMENT_STARTS: ReadonlySet<TokenType> = new Set([
  TokenType.CLASS,
  TokenType.FUN,
  TokenType.VAR,
  TokenType.FOR,
  TokenType.IF,
  TokenType.WHILE,
  TokenType.PRINT,
  TokenType.RETURN,
]);

/**Parser */
export class Parser {
  private pos = 0;
  private errors: ParseError[] = [];

  constructor(private tokens: Token[]) {}

  public parse = (): ParseResult => {
    this.pos = 0;
    this.errors = [];
    const body: Stmt[] = [];
    while (!this.atEnd()) {
      const stmt = this.declaration();
      if (stmt) body.push(stmt);
    }
    return { program: { type: "Program", body }, errors: this.errors };
  };

  private current = (): Token => this.tokens[this.pos];

  private previous = (): Token => this.tokens[this.pos - 1];

  private atEnd = (): boolean => this.current().type === TokenType.EOF;

  private check = (type: TokenType): boolean =>
    this.current().type === type;

  private bump = (): Token => {
    if (!this.atEnd()) this.pos++;
    return this.previous();
  };

  private eat = (...types: TokenType[]): boolean => {
    if (!types.some(this.check)) return false;
    this.bump();
    return true;
  };

  private expect = (type: TokenType, msg: string): Token => {
    if (this.check(type)) return this.bump();
    throw this.error(this.current(), msg);
  };

  /** Records the error; the caller decides whether to unwind. */
  private error = (tok: Token, msg: string): ParseError => {
    const e = new ParseError(tok, msg);
    this.errors.push(e);
    return e;
  };

  private synchronize = (): void => {
    this.bump();
    while (!this.atEnd()) {
      if (this.previous().type === TokenType.SEMICOLON) return;
      if (STATEMENT_STARTS.has(this.current().type)) return;
      this.bump();
    }
  };

  private declaration = (): Stmt | undefined => {
    try {
      if (this.eat(TokenType.CLASS)) return this.classDecl();
      if (this.eat(TokenType.FUN)) return this.funcDecl("function");
      if (this.eat(TokenType.VAR)) return this.varDecl();
      return this.stmt();
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      this.synchronize();
      return undefined;
    }
  };

  private classDecl = (): Stmt => {
    const name = this.expect(TokenType.IDENT, "Expect class name.");

    let superclass: Variable | undefined;
    if (this.eat(TokenType.COMP_LT)) {
      const sup = this.expect(TokenType.IDENT, "Expect superclass name.");
      superclass = { type: "Variable", name: sup };
    }

    this.expect(TokenType.LBRACE, "Expect '{' before class body.");
    const methods: FuncDecl[] = [];
    while (!this.check(TokenType.RBRACE) && !this.atEnd()) {
      methods.push(this.funcDecl("method"));
    }
    this.expect(TokenType.RBRACE, "Expect '}' after class body.");

    return { type: "ClassDecl", name, superclass, methods };
  };

  private funcDecl = (kind: "function" | "method"): FuncDecl => {
    const name = this.expect(TokenType.IDENT, `Expect ${kind} name.`);
    this.expect(TokenType.LPAREN, `Expect '(' after ${kind} name.`);
    const params: Token[] = [];
    if (!this.check(TokenType.RPAREN)) {
      do {
        if (params.length >= MAX_ARITY) {
          this.error(
            this.current(),
            `Can't have more than ${MAX_ARITY} parameters.`,
          );
        }
        params.push(this.expect(TokenType.IDENT, "Expect parameter name."));
      } while (this.eat(TokenType.COMMA));
    }
    this.expect(TokenType.RPAREN, "Expect ')' after parameters.");
    this.expect(TokenType.LBRACE, `Expect '{' before ${kind} body.`);
    return { type: "FuncDecl", name, params, body: this.block() };
  };

  private varDecl = (): Stmt => {
    const name = this.expect(TokenType.IDENT, "Expect variable name.");
    const value = this.eat(TokenType.OP_EQ) ? this.expr() : undefined;
    this.expect(TokenType.SEMICOLON, "Expect ';' after variable declaration.");
    return { type: "VarDecl", name, value };
  };

  private stmt = (): Stmt => {
    switch (this.current().type) {
      case TokenType.FOR: {
        this.bump();
        return this.forStmt();
      }
      case TokenType.IF: {
        this.bump();
        this.expect(TokenType.LPAREN, "Expect '(' after 'if'.");
        const cond = this.expr();
        this.expect(TokenType.RPAREN, "Expect ')' after if condition.");
        const body = this.stmt();
        if (this.eat(TokenType.ELSE)) {
          return { type: "If", cond, body, else: this.stmt() };
        }
        return { type: "If", cond, body };
      }
      case TokenType.PRINT: {
        this.bump();
        const value = this.expr();
        this.expect(TokenType.SEMICOLON, "Expect ';' after value.");
        return { type: "Print", value };
      }
      case TokenType.RETURN: {
        const keyword = this.bump();
        const value = this.check(TokenType.SEMICOLON) ? undefined : this.expr();
        this.expect(TokenType.SEMICOLON, "Expect ';' after return value.");
        return { type: "Return", keyword, value };
      }
      case TokenType.WHILE: {
        this.bump();
        this.expect(TokenType.LPAREN, "Expect '(' after 'while'.");
        const cond = this.expr();
        this.expect(TokenType.RPAREN, "Expect ')' after condition.");
        return { type: "While", cond, body: this.stmt() };
      }
      case TokenType.LBRACE: {
        this.bump();
        return { type: "Block", body: this.block() };
      }
      default: {
        const expr = this.expr();
        this.expect(TokenType.SEMICOLON, "Expect ';' after expression.");
        return { type: "ExprStmt", expr };
      }
    }
  };

  // for (init; cond; incr) body  =>  { init; while (cond) { body; incr; } }
  private forStmt = (): Stmt => {
    this.expect(TokenType.LPAREN, "Expect '(' after 'for'.");

    let init: Stmt | undefined;
    if (this.eat(TokenType.VAR)) init = this.varDecl();
    else if (!this.eat(TokenType.SEMICOLON)) {
      const expr = this.expr();
      this.expect(TokenType.SEMICOLON, "Expect ';' after expression.");
      init = { type: "ExprStmt", expr };
    }

    const cond: Expr = this.check(TokenType.SEMICOLON)
      ? { type: "Literal", value: true }
      : this.expr();
    this.expect(TokenType.SEMICOLON, "Expect ';' after loop condition.");

    const incr = this.check(TokenType.RPAREN) ? undefined : this.expr();
    this.expect(TokenType.RPAREN, "Expect ')' after for clauses.");

    let body = this.stmt();
    if (incr) {
      const loop: Block = {
        type: "Block",
        body: [body, { type: "ExprStmt", expr: incr }],
      };
      body = loop;
    }
    body = { type: "While", cond, body };
    if (init) body = { type: "Block", body: [init, body] };
    return body;
  };

  private block = (): Stmt[] => {
    const body: Stmt[] = [];
    while (!this.check(TokenType.RBRACE) && !this.atEnd()) {
      const stmt = this.declaration();
      if (stmt) body.push(stmt);
    }
    this.expect(TokenType.RBRACE, "Expect '}' after block.");
    return body;
  };

  private expr = (): Expr => this.assignment();

  private assignment = (): Expr => {
    const target = this.or();

    if (this.check(TokenType.OP_EQ)) {
      const equals = this.bump();
      const value = this.assignment();

      if (target.type === "Variable") {
        return { type: "Assign", name: target.name, value };
      }
      if (target.type === "Get") {
        return { type: "Set", object: target.object, name: target.name, value };
      }
      // reported without unwinding: the parser is not confused
      this.error(equals, "Invalid assignment target.");
    }
    return target;
  };

  private or = (): Expr => {
    let left = this.and();
    while (this.eat(TokenType.OR)) {
      const op = this.previous();
      const right = this.and();
      left = { type: "Logical", op, left, right };
    }
    return left;
  };

  private and = (): Expr => {
    let left = this.equality();
    while (this.eat(TokenType.AND)) {
      const op = this.previous();
      const right = this.equality();
      left = { type: "Logical", op, left, right };
    }
    return left;
  };

  private equality = (): Expr => {
    let left = this.comparison();
    while (this.eat(TokenType.COMP_EQ, TokenType.COMP_NE)) {
      const op = this.previous();
      const right = this.comparison();
      left = { type: "Binary", op, left, right };
    }
    return left;
  };

  private comparison = (): Expr => {
    let left = this.additive();
    while (
      this.eat(
        TokenType.COMP_GT,
        TokenType.COMP_GE,
        TokenType.COMP_LT,
        TokenType.COMP_LE,
      )
    ) {
      const op = this.previous();
      const right = this.additive();
      left = { type: "Binary", op, left, right };
    }
    return left;
  };

  private additive = (): Expr => {
    let left = this.term();
    while (this.eat(TokenType.OP_ADD, TokenType.OP_SUB)) {
      const op = this.previous();
      const right = this.term();
      left = { type: "Binary", op, left, right };
    }
    return left;
  };

  private term = (): Expr => {
    let left = this.unary();
    while (this.eat(TokenType.OP_MUL, TokenType.OP_DIV)) {
      const op = this.previous();
      const right = this.unary();
      left = { type: "Binary", op, left, right };
    }
    return left;
  };

  private unary = (): Expr => {
    if (this.eat(TokenType.LOG_NOT, TokenType.OP_SUB)) {
      const op = this.previous();
      return { type: "Unary", op, argument: this.unary() };
    }
    return this.call();
  };

  private call = (): Expr => {
    let expr = this.factor();
    for (;;) {
      if (this.eat(TokenType.LPAREN)) {
        expr = this.finishCall(expr);
      } else if (this.eat(TokenType.DOT)) {
        const name = this.expect(
          TokenType.IDENT,
          "Expect property name after '.'.",
        );
        expr = { type: "Get", object: expr, name };
      } else return expr;
    }
  };

  private finishCall = (callee: Expr): Expr => {
    const args: Expr[] = [];
    if (!this.check(TokenType.RPAREN)) {
      do {
        if (args.length >= MAX_ARITY) {
          this.error(
            this.current(),
            `Can't have more than ${MAX_ARITY} arguments.`,
          );
        }
        args.push(this.expr());
      } while (this.eat(TokenType.COMMA));
    }
    const paren = this.expect(TokenType.RPAREN, "Expect ')' after arguments.");
    return { type: "Call", callee, paren, args };
  };

  private factor = (): Expr => {
    const tok = this.current();

    switch (tok.type) {
      case TokenType.FALSE: {
        this.bump();
        return { type: "Literal", value: false };
      }
      case TokenType.TRUE: {
        this.bump();
        return { type: "Literal", value: true };
      }
      case TokenType.NIL: {
        this.bump();
        return { type: "Literal", value: null };
      }
      case TokenType.NUMBER:
      case TokenType.STRING: {
        this.bump();
        return { type: "Literal", value: tok.value ?? null };
      }
      case TokenType.THIS: {
        this.bump();
        return { type: "This", keyword: tok };
      }
      case TokenType.SUPER: {
        this.bump();
        this.expect(TokenType.DOT, "Expect '.' after 'super'.");
        const method = this.expect(
          TokenType.IDENT,
          "Expect superclass method name.",
        );
        return { type: "Super", keyword: tok, method };
      }
      case TokenType.IDENT: {
        this.bump();
        return { type: "Variable", name: tok };
      }
      case TokenType.LPAREN: {
        this.bump();
        const expr = this.expr();
        this.expect(TokenType.RPAREN, "Expect ')' after expression.");
        return { type: "Grouping", expr };
      }
      default:
        throw this.error(tok, "Expect expression.");
    }
  };
}
