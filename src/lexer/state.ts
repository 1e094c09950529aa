/**
 * Lexer State
 * Tracks the cursor over source characters during tokenization
 */

import type { DiagnosticReporter } from '../diagnostics.js';
import type { Token } from '../token-types.js';

export interface LexerState {
  /** Source split into characters (code points) */
  readonly chars: readonly string[];
  /** Index of the first character of the unit being scanned */
  start: number;
  /** Index of the next unconsumed character */
  pos: number;
  /** Line of the next unconsumed character */
  line: number;
  /** Line on which the current unit started */
  startLine: number;
  readonly tokens: Token[];
  readonly reporter: DiagnosticReporter;
}

export function createLexerState(
  source: string,
  reporter: DiagnosticReporter
): LexerState {
  return {
    chars: Array.from(source),
    start: 0,
    pos: 0,
    line: 1,
    startLine: 1,
    tokens: [],
    reporter,
  };
}

export function peek(state: LexerState): string {
  return state.chars[state.pos] ?? '';
}

export function peekNext(state: LexerState): string {
  return state.chars[state.pos + 1] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.chars[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
  }
  return ch;
}

/** Consume the next character only if it is `expected` */
export function matchChar(state: LexerState, expected: string): boolean {
  if (isAtEnd(state) || peek(state) !== expected) return false;
  advance(state);
  return true;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}

/** Source text of the unit being scanned */
export function currentLexeme(state: LexerState): string {
  return state.chars.slice(state.start, state.pos).join('');
}
