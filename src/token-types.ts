// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Single-character tokens
  LEFT_PAREN: 'LEFT_PAREN', // (
  RIGHT_PAREN: 'RIGHT_PAREN', // )
  LEFT_BRACE: 'LEFT_BRACE', // {
  RIGHT_BRACE: 'RIGHT_BRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  STAR: 'STAR', // *

  // One or two character tokens
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FN: 'FN',
  FOR: 'FOR',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Token types whose text is carried as a string literal */
export type TextTokenType =
  | typeof TOKEN_TYPES.IDENTIFIER
  | typeof TOKEN_TYPES.STRING;

/** Token types that carry no literal payload */
export type SimpleTokenType = Exclude<
  TokenType,
  TextTokenType | typeof TOKEN_TYPES.NUMBER
>;

interface BaseToken {
  /** Exact source text that produced the token */
  readonly lexeme: string;
  /** 1-based line of the token's first character */
  readonly line: number;
}

export interface NumberToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.NUMBER;
  readonly literal: number;
}

export interface TextToken extends BaseToken {
  readonly type: TextTokenType;
  readonly literal: string;
}

export interface SimpleToken extends BaseToken {
  readonly type: SimpleTokenType;
  readonly literal: null;
}

export type Token = NumberToken | TextToken | SimpleToken;

/**
 * Render a token for the CLI token dump.
 *
 * @example
 * formatToken({ type: 'NUMBER', lexeme: '1.5', literal: 1.5, line: 1 })
 * // 'NUMBER "1.5" 1.5'
 */
export function formatToken(token: Token): string {
  const head = `${token.type} ${JSON.stringify(token.lexeme)}`;
  if (token.literal === null) return head;
  return `${head} ${JSON.stringify(token.literal)}`;
}
