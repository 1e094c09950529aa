/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { KEYWORDS } from './operators.js';
export { createLexerState, type LexerState } from './state.js';
export { scanToken, tokenize, type TokenizeOptions } from './tokenizer.js';
