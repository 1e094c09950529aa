/**
 * Operator and Keyword Lookup Tables
 */

import type { SimpleTokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, SimpleTokenType>> =
  Object.freeze({
    '(': TOKEN_TYPES.LEFT_PAREN,
    ')': TOKEN_TYPES.RIGHT_PAREN,
    '{': TOKEN_TYPES.LEFT_BRACE,
    '}': TOKEN_TYPES.RIGHT_BRACE,
    ',': TOKEN_TYPES.COMMA,
    '.': TOKEN_TYPES.DOT,
    '-': TOKEN_TYPES.MINUS,
    '+': TOKEN_TYPES.PLUS,
    ';': TOKEN_TYPES.SEMICOLON,
    '*': TOKEN_TYPES.STAR,
  });

/**
 * Operators that take a trailing `=` to form a two-character token.
 * Maps the first character to [one-char type, two-char type].
 */
export const EQUAL_SUFFIX_OPERATORS: Readonly<
  Record<string, readonly [SimpleTokenType, SimpleTokenType]>
> = Object.freeze<Record<string, readonly [SimpleTokenType, SimpleTokenType]>>({
  '!': [TOKEN_TYPES.BANG, TOKEN_TYPES.BANG_EQUAL],
  '=': [TOKEN_TYPES.EQUAL, TOKEN_TYPES.EQUAL_EQUAL],
  '<': [TOKEN_TYPES.LESS, TOKEN_TYPES.LESS_EQUAL],
  '>': [TOKEN_TYPES.GREATER, TOKEN_TYPES.GREATER_EQUAL],
});

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, SimpleTokenType> = new Map([
  ['and', TOKEN_TYPES.AND],
  ['class', TOKEN_TYPES.CLASS],
  ['else', TOKEN_TYPES.ELSE],
  ['false', TOKEN_TYPES.FALSE],
  ['fn', TOKEN_TYPES.FN],
  ['for', TOKEN_TYPES.FOR],
  ['if', TOKEN_TYPES.IF],
  ['nil', TOKEN_TYPES.NIL],
  ['or', TOKEN_TYPES.OR],
  ['print', TOKEN_TYPES.PRINT],
  ['return', TOKEN_TYPES.RETURN],
  ['super', TOKEN_TYPES.SUPER],
  ['this', TOKEN_TYPES.THIS],
  ['true', TOKEN_TYPES.TRUE],
  ['var', TOKEN_TYPES.VAR],
  ['while', TOKEN_TYPES.WHILE],
]);
