/**
 * AST Printer
 * Fully parenthesized prefix rendering of expression trees
 */

import {
  formatLiteralValue,
  type AssignExpr,
  type BinaryExpr,
  type CallExpr,
  type ExprNode,
  type GetExpr,
  type GroupingExpr,
  type LiteralExpr,
  type LogicalExpr,
  type SetExpr,
  type UnaryExpr,
  type VariableExpr,
} from './ast-nodes.js';
import { UnsupportedConstructError } from './error-classes.js';
import { acceptExpr, type ExprVisitor } from './visitor.js';

/**
 * Renders `1 + 2 * 3` as `(+ 1 (* 2 3))`.
 *
 * Calls are not rendered: the grammar never builds them, so reaching one
 * throws UnsupportedConstructError.
 */
export class AstPrinter implements ExprVisitor<string> {
  print(expr: ExprNode): string {
    return acceptExpr(expr, this);
  }

  visitAssignExpr(expr: AssignExpr): string {
    return this.parenthesize(expr.name.lexeme, expr.value);
  }

  visitBinaryExpr(expr: BinaryExpr): string {
    return this.parenthesize(expr.operator.lexeme, expr.left, expr.right);
  }

  visitCallExpr(expr: CallExpr): string {
    throw new UnsupportedConstructError('call expression', expr.paren);
  }

  visitGetExpr(expr: GetExpr): string {
    return this.parenthesize(expr.name.lexeme, expr.object);
  }

  visitGroupingExpr(expr: GroupingExpr): string {
    return this.parenthesize('group', expr.expression);
  }

  visitLiteralExpr(expr: LiteralExpr): string {
    return formatLiteralValue(expr.value);
  }

  visitLogicalExpr(expr: LogicalExpr): string {
    return this.parenthesize(expr.operator.lexeme, expr.left, expr.right);
  }

  visitSetExpr(expr: SetExpr): string {
    return this.parenthesize(expr.name.lexeme, expr.object, expr.value);
  }

  visitSuperExpr(): string {
    return 'super';
  }

  visitThisExpr(): string {
    return 'this';
  }

  visitUnaryExpr(expr: UnaryExpr): string {
    return this.parenthesize(expr.operator.lexeme, expr.right);
  }

  visitVariableExpr(expr: VariableExpr): string {
    return expr.name.lexeme;
  }

  private parenthesize(name: string, ...exprs: ExprNode[]): string {
    let result = `(${name}`;
    for (const expr of exprs) {
      result += ` ${acceptExpr(expr, this)}`;
    }
    return `${result})`;
  }
}

/** Render an expression with a fresh printer */
export function printExpr(expr: ExprNode): string {
  return new AstPrinter().print(expr);
}
