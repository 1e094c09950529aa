/**
 * Tokenizer
 * Main tokenization loop
 */

import {
  createConsoleReporter,
  type DiagnosticReporter,
} from '../diagnostics.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  addToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  reportLexerError,
} from './helpers.js';
import { EQUAL_SUFFIX_OPERATORS, SINGLE_CHAR_OPERATORS } from './operators.js';
import {
  readIdentifier,
  readNumber,
  readString,
  skipLineComment,
} from './readers.js';
import {
  advance,
  createLexerState,
  isAtEnd,
  type LexerState,
  matchChar,
} from './state.js';

/** Scan one lexical unit starting at `state.start` */
export function scanToken(state: LexerState): void {
  const ch = advance(state);

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    addToken(state, singleCharType);
    return;
  }

  // Maximal munch: ! = < > take a following '='
  const pair = EQUAL_SUFFIX_OPERATORS[ch];
  if (pair) {
    addToken(state, matchChar(state, '=') ? pair[1] : pair[0]);
    return;
  }

  if (ch === '/') {
    if (matchChar(state, '/')) {
      skipLineComment(state);
    } else {
      addToken(state, TOKEN_TYPES.SLASH);
    }
    return;
  }

  // Newlines are counted by advance()
  if (isWhitespace(ch) || ch === '\n') return;

  if (ch === '"') {
    readString(state);
    return;
  }

  if (isDigit(ch)) {
    readNumber(state);
    return;
  }

  if (isIdentifierStart(ch)) {
    readIdentifier(state);
    return;
  }

  reportLexerError(state, 'TERN-L002');
}

export interface TokenizeOptions {
  /** Sink for scan diagnostics (default: stderr) */
  reporter?: DiagnosticReporter | undefined;
}

/**
 * Convert source text into tokens.
 *
 * Scan faults (unterminated strings, unexpected characters) are reported
 * and skipped; the result always ends with a single EOF token.
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createLexerState(
    source,
    options?.reporter ?? createConsoleReporter()
  );

  while (!isAtEnd(state)) {
    state.start = state.pos;
    state.startLine = state.line;
    scanToken(state);
  }

  state.tokens.push({
    type: TOKEN_TYPES.EOF,
    lexeme: '',
    line: state.line,
    literal: null,
  });
  return state.tokens;
}
