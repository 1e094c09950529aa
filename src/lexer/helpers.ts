/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  SimpleTokenType,
  TextTokenType,
  Token,
} from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError } from './errors.js';
import { messageFor } from '../error-registry.js';
import { currentLexeme, type LexerState } from './state.js';

const ALPHABETIC = /^\p{Alphabetic}$/u;
const NUMERIC = /^\p{N}$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string): boolean {
  return ch === '_' || ALPHABETIC.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || NUMERIC.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

// ============================================================
// TOKEN CONSTRUCTION
// ============================================================

function push(state: LexerState, token: Token): void {
  state.tokens.push(token);
}

/** Emit a payload-free token spanning the current unit */
export function addToken(state: LexerState, type: SimpleTokenType): void {
  push(state, {
    type,
    lexeme: currentLexeme(state),
    line: state.startLine,
    literal: null,
  });
}

export function addTextToken(
  state: LexerState,
  type: TextTokenType,
  literal: string
): void {
  push(state, {
    type,
    lexeme: currentLexeme(state),
    line: state.startLine,
    literal,
  });
}

export function addNumberToken(state: LexerState, literal: number): void {
  push(state, {
    type: TOKEN_TYPES.NUMBER,
    lexeme: currentLexeme(state),
    line: state.startLine,
    literal,
  });
}

// ============================================================
// ERROR REPORTING
// ============================================================

/** Report a scan fault at the current line and keep scanning */
export function reportLexerError(state: LexerState, errorId: string): void {
  const error = new LexerError(errorId, messageFor(errorId), state.line);
  state.reporter.report(error.toDiagnostic());
}
