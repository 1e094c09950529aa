/**
 * Parser Extension: Primary Expressions
 * Literals and parenthesized groupings
 *
 *   primary → NUMBER | STRING | "true" | "false" | "nil" | "(" expression ")"
 */

import { Parser } from './parser.js';
import {
  groupingExpr,
  literalExpr,
  NIL,
  type ExprNode,
  type GroupingExpr,
} from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { advance, current, expect, isAtEnd, parseError } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExprNode;
    parseGrouping(): GroupingExpr;
  }
}

Parser.prototype.parsePrimary = function (this: Parser): ExprNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return literalExpr({ kind: 'boolean', value: false });
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return literalExpr({ kind: 'boolean', value: true });
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return literalExpr(NIL);
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return literalExpr({ kind: 'number', value: token.literal });
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return literalExpr({ kind: 'string', value: token.literal });
    case TOKEN_TYPES.LEFT_PAREN:
      return this.parseGrouping();
    default:
      throw parseError(this.state, token, 'TERN-P001');
  }
};

/**
 * The `(` is consumed before recursing, so a bare `(` cannot loop.
 * Input that ends right after `(` is an unclosed grouping, not a missing
 * operand.
 */
Parser.prototype.parseGrouping = function (this: Parser): GroupingExpr {
  advance(this.state); // consume (
  if (isAtEnd(this.state)) {
    throw parseError(this.state, current(this.state), 'TERN-P002');
  }
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RIGHT_PAREN, 'TERN-P002');
  return groupingExpr(expression);
};
