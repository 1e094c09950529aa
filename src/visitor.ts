/**
 * Visitor Dispatch
 * Double dispatch over the closed expression and statement unions.
 *
 * Algorithms implement a visitor; the tree never depends on them. Adding a
 * node variant breaks every visitor at compile time until it handles the
 * new case.
 */

import type {
  AssignExpr,
  BinaryExpr,
  BlockStmt,
  CallExpr,
  ClassStmt,
  ExpressionStmt,
  ExprNode,
  FunctionStmt,
  GetExpr,
  GroupingExpr,
  IfStmt,
  LiteralExpr,
  LogicalExpr,
  PrintStmt,
  ReturnStmt,
  SetExpr,
  StmtNode,
  SuperExpr,
  ThisExpr,
  UnaryExpr,
  VarStmt,
  VariableExpr,
  WhileStmt,
} from './ast-nodes.js';

// ============================================================
// EXPRESSION VISITOR
// ============================================================

/**
 * One method per expression variant. Methods return the visitor's result
 * type and signal failure by throwing a TernError.
 */
export interface ExprVisitor<R> {
  visitAssignExpr(expr: AssignExpr): R;
  visitBinaryExpr(expr: BinaryExpr): R;
  visitCallExpr(expr: CallExpr): R;
  visitGetExpr(expr: GetExpr): R;
  visitGroupingExpr(expr: GroupingExpr): R;
  /** Literals are leaves: this method never recurses */
  visitLiteralExpr(expr: LiteralExpr): R;
  visitLogicalExpr(expr: LogicalExpr): R;
  visitSetExpr(expr: SetExpr): R;
  visitSuperExpr(expr: SuperExpr): R;
  visitThisExpr(expr: ThisExpr): R;
  visitUnaryExpr(expr: UnaryExpr): R;
  visitVariableExpr(expr: VariableExpr): R;
}

function assertNever(node: never): never {
  throw new Error(`Unknown node: ${JSON.stringify(node)}`);
}

/** Invoke the visitor method matching the node's variant */
export function acceptExpr<R>(expr: ExprNode, visitor: ExprVisitor<R>): R {
  switch (expr.type) {
    case 'Assign':
      return visitor.visitAssignExpr(expr);
    case 'Binary':
      return visitor.visitBinaryExpr(expr);
    case 'Call':
      return visitor.visitCallExpr(expr);
    case 'Get':
      return visitor.visitGetExpr(expr);
    case 'Grouping':
      return visitor.visitGroupingExpr(expr);
    case 'Literal':
      return visitor.visitLiteralExpr(expr);
    case 'Logical':
      return visitor.visitLogicalExpr(expr);
    case 'Set':
      return visitor.visitSetExpr(expr);
    case 'Super':
      return visitor.visitSuperExpr(expr);
    case 'This':
      return visitor.visitThisExpr(expr);
    case 'Unary':
      return visitor.visitUnaryExpr(expr);
    case 'Variable':
      return visitor.visitVariableExpr(expr);
    default:
      return assertNever(expr);
  }
}

// ============================================================
// STATEMENT VISITOR
// ============================================================

export interface StmtVisitor<R> {
  visitBlockStmt(stmt: BlockStmt): R;
  visitClassStmt(stmt: ClassStmt): R;
  visitExpressionStmt(stmt: ExpressionStmt): R;
  visitFunctionStmt(stmt: FunctionStmt): R;
  visitIfStmt(stmt: IfStmt): R;
  visitPrintStmt(stmt: PrintStmt): R;
  visitReturnStmt(stmt: ReturnStmt): R;
  visitVarStmt(stmt: VarStmt): R;
  visitWhileStmt(stmt: WhileStmt): R;
}

export function acceptStmt<R>(stmt: StmtNode, visitor: StmtVisitor<R>): R {
  switch (stmt.type) {
    case 'Block':
      return visitor.visitBlockStmt(stmt);
    case 'Class':
      return visitor.visitClassStmt(stmt);
    case 'Expression':
      return visitor.visitExpressionStmt(stmt);
    case 'Function':
      return visitor.visitFunctionStmt(stmt);
    case 'If':
      return visitor.visitIfStmt(stmt);
    case 'Print':
      return visitor.visitPrintStmt(stmt);
    case 'Return':
      return visitor.visitReturnStmt(stmt);
    case 'Var':
      return visitor.visitVarStmt(stmt);
    case 'While':
      return visitor.visitWhileStmt(stmt);
    default:
      return assertNever(stmt);
  }
}
