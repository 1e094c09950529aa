/**
 * Parser Extension: Expression Parsing
 * Precedence chain from equality down to unary
 *
 *   expression → equality
 *   equality   → comparison ( ( "!=" | "==" ) comparison )*
 *   comparison → term ( ( ">" | ">=" | "<" | "<=" ) term )*
 *   term       → factor ( ( "-" | "+" ) factor )*
 *   factor     → unary ( ( "/" | "*" ) unary )*
 *   unary      → ( "!" | "-" ) unary | primary
 */

import { Parser } from './parser.js';
import { binaryExpr, unaryExpr, type ExprNode } from '../ast-nodes.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { match, previous } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExprNode;
    parseEquality(): ExprNode;
    parseComparison(): ExprNode;
    parseTerm(): ExprNode;
    parseFactor(): ExprNode;
    parseUnary(): ExprNode;
    parseLeftAssociative(
      operand: () => ExprNode,
      operators: readonly TokenType[]
    ): ExprNode;
  }
}

const EQUALITY_OPS: readonly TokenType[] = [
  TOKEN_TYPES.BANG_EQUAL,
  TOKEN_TYPES.EQUAL_EQUAL,
];

const COMPARISON_OPS: readonly TokenType[] = [
  TOKEN_TYPES.GREATER,
  TOKEN_TYPES.GREATER_EQUAL,
  TOKEN_TYPES.LESS,
  TOKEN_TYPES.LESS_EQUAL,
];

const TERM_OPS: readonly TokenType[] = [TOKEN_TYPES.MINUS, TOKEN_TYPES.PLUS];

const FACTOR_OPS: readonly TokenType[] = [TOKEN_TYPES.SLASH, TOKEN_TYPES.STAR];

const UNARY_OPS: readonly TokenType[] = [TOKEN_TYPES.BANG, TOKEN_TYPES.MINUS];

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExprNode {
  return this.parseEquality();
};

/**
 * Parse `operand (op operand)*`, folding each new operand into the
 * accumulated expression as its right sibling. The accumulated tree always
 * becomes the left child, so `a - b + c` is `(a - b) + c`.
 */
Parser.prototype.parseLeftAssociative = function (
  this: Parser,
  operand: () => ExprNode,
  operators: readonly TokenType[]
): ExprNode {
  let expr = operand();

  while (match(this.state, ...operators)) {
    const operator = previous(this.state);
    const right = operand();
    expr = binaryExpr(expr, operator, right);
  }

  return expr;
};

Parser.prototype.parseEquality = function (this: Parser): ExprNode {
  return this.parseLeftAssociative(() => this.parseComparison(), EQUALITY_OPS);
};

Parser.prototype.parseComparison = function (this: Parser): ExprNode {
  return this.parseLeftAssociative(() => this.parseTerm(), COMPARISON_OPS);
};

Parser.prototype.parseTerm = function (this: Parser): ExprNode {
  return this.parseLeftAssociative(() => this.parseFactor(), TERM_OPS);
};

Parser.prototype.parseFactor = function (this: Parser): ExprNode {
  return this.parseLeftAssociative(() => this.parseUnary(), FACTOR_OPS);
};

// ============================================================
// UNARY
// ============================================================

/** Prefix operators nest to the right: `!!x` is `!(!x)` */
Parser.prototype.parseUnary = function (this: Parser): ExprNode {
  if (match(this.state, ...UNARY_OPS)) {
    const operator = previous(this.state);
    const right = this.parseUnary();
    return unaryExpr(operator, right);
  }

  return this.parsePrimary();
};
