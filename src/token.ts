export const enum TokenType {
  LPAREN,
  RPAREN,
  LBRACE,
  RBRACE,
  COMMA,
  DOT,
  OP_SUB,
  OP_ADD,
  SEMICOLON,
  OP_DIV,
  OP_MUL,
  LOG_NOT,
  COMP_NE,
  OP_EQ,
  COMP_EQ,
  COMP_GT,
  COMP_GE,
  COMP_LT,
  COMP_LE,
  IDENT,
  STRING,
  NUMBER,
  AND,
  CLASS,
  ELSE,
  FALSE,
  FUN,
  FOR,
  IF,
  NIL,
  OR,
  PRINT,
  RETURN,
  SUPER,
  THIS,
  TRUE,
  VAR,
  WHILE,
  EOF,
}

export type Literal = string | number | boolean | null;

export type Token = {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly value?: string | number;
  readonly line: number;
  readonly offset: number;
};

export const keywords: ReadonlyMap<string, TokenType> = new Map([
  ["and", TokenType.AND],
  ["class", TokenType.CLASS],
  ["else", TokenType.ELSE],
  ["false", TokenType.FALSE],
  ["for", TokenType.FOR],
  ["fun", TokenType.FUN],
  ["if", TokenType.IF],
  ["nil", TokenType.NIL],
  ["or", TokenType.OR],
  ["print", TokenType.PRINT],
  ["return", TokenType.RETURN],
  ["super", TokenType.SUPER],
  ["this", TokenType.THIS],
  ["true", TokenType.TRUE],
  ["var", TokenType.VAR],
  ["while", TokenType.WHILE],
]);

const names: Record<TokenType, string> = {
  [TokenType.LPAREN]: "LPAREN",
  [TokenType.RPAREN]: "RPAREN",
  [TokenType.LBRACE]: "LBRACE",
  [TokenType.RBRACE]: "RBRACE",
  [TokenType.COMMA]: "COMMA",
  [TokenType.DOT]: "DOT",
  [TokenType.OP_SUB]: "OP_SUB",
  [TokenType.OP_ADD]: "OP_ADD",
  [TokenType.SEMICOLON]: "SEMICOLON",
  [TokenType.OP_DIV]: "OP_DIV",
  [TokenType.OP_MUL]: "OP_MUL",
  [TokenType.LOG_NOT]: "LOG_NOT",
  [TokenType.COMP_NE]: "COMP_NE",
  [TokenType.OP_EQ]: "OP_EQ",
  [TokenType.COMP_EQ]: "COMP_EQ",
  [TokenType.COMP_GT]: "COMP_GT",
  [TokenType.COMP_GE]: "COMP_GE",
  [TokenType.COMP_LT]: "COMP_LT",
  [TokenType.COMP_LE]: "COMP_LE",
  [TokenType.IDENT]: "IDENT",
  [TokenType.STRING]: "STRING",
  [TokenType.NUMBER]: "NUMBER",
  [TokenType.AND]: "AND",
  [TokenType.CLASS]: "CLASS",
  [TokenType.ELSE]: "ELSE",
  [TokenType.FALSE]: "FALSE",
  [TokenType.FUN]: "FUN",
  [TokenType.FOR]: "FOR",
  [TokenType.IF]: "IF",
  [TokenType.NIL]: "NIL",
  [TokenType.OR]: "OR",
  [TokenType.PRINT]: "PRINT",
  [TokenType.RETURN]: "RETURN",
  [TokenType.SUPER]: "SUPER",
  [TokenType.THIS]: "THIS",
  [TokenType.TRUE]: "TRUE",
  [TokenType.VAR]: "VAR",
  [TokenType.WHILE]: "WHILE",
  [TokenType.EOF]: "EOF",
};

/** e.g. `NUMBER 1.5 1.5 @1` */
export const showToken = (tok: Token): string => {
  const parts = [names[tok.type]];
  if (tok.lexeme !== "") parts.push(tok.lexeme);
  if (tok.value !== undefined) parts.push(String(tok.value));
  return `${parts.join(" ")} @${tok.line}`;
};
