/**
 * Token Readers
 * Multi-character lexical units: strings, numbers, identifiers, comments
 */

import { TOKEN_TYPES } from '../token-types.js';
import {
  addNumberToken,
  addTextToken,
  addToken,
  isDigit,
  isIdentifierChar,
  reportLexerError,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLexeme,
  isAtEnd,
  type LexerState,
  peek,
  peekNext,
} from './state.js';

/** Skip a `//` comment up to, not including, the newline */
export function skipLineComment(state: LexerState): void {
  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
}

/**
 * Read a string literal after its opening quote.
 * The literal is the verbatim text between the quotes; escapes are not
 * interpreted and newlines are allowed.
 */
export function readString(state: LexerState): void {
  while (!isAtEnd(state) && peek(state) !== '"') {
    advance(state);
  }

  if (isAtEnd(state)) {
    reportLexerError(state, 'TERN-L001');
    return;
  }

  advance(state); // closing "

  const lexeme = currentLexeme(state);
  addTextToken(state, TOKEN_TYPES.STRING, lexeme.slice(1, -1));
}

/** Read digits with an optional fractional part after the first digit */
export function readNumber(state: LexerState): void {
  while (isDigit(peek(state))) advance(state);

  // A trailing '.' without digits is left for the next unit
  if (peek(state) === '.' && isDigit(peekNext(state))) {
    advance(state);
    while (isDigit(peek(state))) advance(state);
  }

  const lexeme = currentLexeme(state);
  const value = Number(lexeme);
  if (Number.isNaN(value)) {
    throw new Error(`Scanned number could not be parsed: ${lexeme}`);
  }
  addNumberToken(state, value);
}

/** Read an identifier after its first character; keywords map to their type */
export function readIdentifier(state: LexerState): void {
  while (isIdentifierChar(peek(state))) advance(state);

  const text = currentLexeme(state);
  const keyword = KEYWORDS.get(text);
  if (keyword !== undefined) {
    addToken(state, keyword);
    return;
  }
  addTextToken(state, TOKEN_TYPES.IDENTIFIER, text);
}
