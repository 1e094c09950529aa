/**
 * Lexer Errors
 */

import { assertCategory, TernError } from '../error-classes.js';

/**
 * Scan-time fault. Handed to the diagnostic reporter, never thrown by the
 * tokenizer: scanning always runs to the end of input.
 */
export class LexerError extends TernError {
  constructor(
    errorId: string,
    message: string,
    line: number,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'lexer');
    super({ errorId, message, line, context });
    this.name = 'LexerError';
  }
}
