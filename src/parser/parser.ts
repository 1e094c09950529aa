/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Grammar rules are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ExprNode } from '../ast-nodes.js';
import type { DiagnosticReporter } from '../diagnostics.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Recursive-descent parser for a single expression.
 *
 * Rules are organized across files:
 * - parser-expr.ts: equality, comparison, term, factor, unary
 * - parser-literals.ts: primary (literals and groupings)
 *
 * A parser makes one pass over one token array.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, reporter);
 * const expr = parser.parse();
 * ```
 */
export class Parser {
  /** Token cursor and diagnostic sink */
  readonly state: ParserState;

  constructor(tokens: readonly Token[], reporter: DiagnosticReporter) {
    this.state = createParserState(tokens, reporter);
  }

  /**
   * Parse one expression. Throws ParseError on the first structural fault.
   */
  parse(): ExprNode {
    return this.parseExpression();
  }
}
