/**
 * Tern Parser
 * Main entry point and re-exports
 */

import type { ExprNode } from '../ast-nodes.js';
import {
  createConsoleReporter,
  type DiagnosticReporter,
} from '../diagnostics.js';
import { tokenize } from '../lexer/index.js';
import type { Token } from '../token-types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-literals.js';

export interface ParseOptions {
  /** Sink for scan and parse diagnostics (default: stderr) */
  reporter?: DiagnosticReporter | undefined;
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token array into one expression tree.
 *
 * Reports and throws ParseError on the first syntax error; no partial tree
 * is returned. Tokens after a complete expression are not consumed.
 *
 * @example
 * ```typescript
 * const expr = parse(tokenize('1 + 2'));
 * ```
 */
export function parse(tokens: readonly Token[], options?: ParseOptions): ExprNode {
  const parser = new Parser(
    tokens,
    options?.reporter ?? createConsoleReporter()
  );
  return parser.parse();
}

/**
 * Scan and parse source text with one shared reporter.
 */
export function parseSource(source: string, options?: ParseOptions): ExprNode {
  const reporter = options?.reporter ?? createConsoleReporter();
  return parse(tokenize(source, { reporter }), { reporter });
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  createParserState,
  synchronize,
  type ParserState,
} from './state.js';

export { Parser } from './parser.js';
