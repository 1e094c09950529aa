/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { DiagnosticReporter } from '../diagnostics.js';
import { ParseError } from '../error-classes.js';
import { messageFor } from '../error-registry.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
  /** Sink for parse diagnostics; every ParseError is reported before it is thrown */
  readonly reporter: DiagnosticReporter;
}

export function createParserState(
  tokens: readonly Token[],
  reporter: DiagnosticReporter
): ParserState {
  return { tokens, pos: 0, reporter };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function previous(state: ParserState): Token {
  const token = state.tokens[state.pos - 1];
  if (token) return token;
  throw new Error('No token consumed yet');
}

/** At EOF, or past the last token of an array that lacks one */
export function isAtEnd(state: ParserState): boolean {
  if (state.pos >= state.tokens.length) return true;
  return current(state).type === TOKEN_TYPES.EOF;
}

/** True if the current token has the given type. Always false at EOF. */
export function check(state: ParserState, type: TokenType): boolean {
  if (isAtEnd(state)) return false;
  return current(state).type === type;
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the current token if it has any of the given types */
export function match(state: ParserState, ...types: TokenType[]): boolean {
  for (const type of types) {
    if (check(state, type)) {
      advance(state);
      return true;
    }
  }
  return false;
}

/**
 * Report a parse error at `token` and return it for the caller to throw.
 * @internal
 */
export function parseError(
  state: ParserState,
  token: Token,
  errorId: string,
  context?: Record<string, unknown>
): ParseError {
  const error = new ParseError(
    errorId,
    messageFor(errorId, context),
    token,
    context
  );
  state.reporter.report(error.toDiagnostic());
  return error;
}

/** Consume a token of the given type or fail with `errorId` */
export function expect(
  state: ParserState,
  type: TokenType,
  errorId: string
): Token {
  if (check(state, type)) return advance(state);
  throw parseError(state, current(state), errorId);
}

// ============================================================
// ERROR RECOVERY
// ============================================================

const STATEMENT_KEYWORDS: ReadonlySet<TokenType> = new Set([
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.FN,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.RETURN,
]);

/**
 * Discard tokens until a likely statement boundary: just past a `;`, or
 * before a statement keyword, or at EOF. The expression grammar never calls
 * this; it is kept for a statement-level parser.
 */
export function synchronize(state: ParserState): void {
  advance(state);

  while (!isAtEnd(state)) {
    if (previous(state).type === TOKEN_TYPES.SEMICOLON) return;
    if (STATEMENT_KEYWORDS.has(current(state).type)) return;
    advance(state);
  }
}
