import type { Token } from './token-types.js';

// ============================================================
// LITERAL VALUES
// ============================================================

export type LiteralValue =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'nil' };

export const NIL: LiteralValue = { kind: 'nil' };

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest round-trip digits, always in plain decimal notation:
 * `1e-7` renders as `0.0000001`, `1e21` as `1000000000000000000000`.
 */
export function formatNumber(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (match === null) return text;

  const [, sign = '', lead = '', fraction = '', exponent = '0'] = match;
  const digits = lead + fraction;
  // Digits before the decimal point
  const point = 1 + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Canonical text of a literal: numbers in plain decimal form, strings unquoted */
export function formatLiteralValue(value: LiteralValue): string {
  switch (value.kind) {
    case 'number':
      return formatNumber(value.value);
    case 'string':
      return value.value;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'nil':
      return 'nil';
  }
}

// ============================================================
// EXPRESSIONS
// ============================================================

/** Assignment: name = value */
export interface AssignExpr {
  readonly type: 'Assign';
  readonly name: Token;
  readonly value: ExprNode;
}

/** Eager binary operator: arithmetic, comparison, equality */
export interface BinaryExpr {
  readonly type: 'Binary';
  readonly left: ExprNode;
  readonly operator: Token;
  readonly right: ExprNode;
}

/** Call: callee(arguments). `paren` is the closing parenthesis. */
export interface CallExpr {
  readonly type: 'Call';
  readonly callee: ExprNode;
  readonly paren: Token;
  readonly arguments: readonly ExprNode[];
}

/** Property read: object.name */
export interface GetExpr {
  readonly type: 'Get';
  readonly object: ExprNode;
  readonly name: Token;
}

/** Parenthesized expression. Always exactly one inner expression. */
export interface GroupingExpr {
  readonly type: 'Grouping';
  readonly expression: ExprNode;
}

export interface LiteralExpr {
  readonly type: 'Literal';
  readonly value: LiteralValue;
}

/** Short-circuiting `and` / `or` */
export interface LogicalExpr {
  readonly type: 'Logical';
  readonly left: ExprNode;
  readonly operator: Token;
  readonly right: ExprNode;
}

/** Property write: object.name = value */
export interface SetExpr {
  readonly type: 'Set';
  readonly object: ExprNode;
  readonly name: Token;
  readonly value: ExprNode;
}

/** super.method */
export interface SuperExpr {
  readonly type: 'Super';
  readonly keyword: Token;
  readonly method: Token;
}

export interface ThisExpr {
  readonly type: 'This';
  readonly keyword: Token;
}

/** Prefix operator: !right, -right */
export interface UnaryExpr {
  readonly type: 'Unary';
  readonly operator: Token;
  readonly right: ExprNode;
}

export interface VariableExpr {
  readonly type: 'Variable';
  readonly name: Token;
}

export type ExprNode =
  | AssignExpr
  | BinaryExpr
  | CallExpr
  | GetExpr
  | GroupingExpr
  | LiteralExpr
  | LogicalExpr
  | SetExpr
  | SuperExpr
  | ThisExpr
  | UnaryExpr
  | VariableExpr;

export type ExprType = ExprNode['type'];

// ============================================================
// EXPRESSION BUILDERS
// ============================================================

export function assignExpr(name: Token, value: ExprNode): AssignExpr {
  return { type: 'Assign', name, value };
}

export function binaryExpr(
  left: ExprNode,
  operator: Token,
  right: ExprNode
): BinaryExpr {
  return { type: 'Binary', left, operator, right };
}

export function callExpr(
  callee: ExprNode,
  paren: Token,
  args: readonly ExprNode[]
): CallExpr {
  return { type: 'Call', callee, paren, arguments: args };
}

export function getExpr(object: ExprNode, name: Token): GetExpr {
  return { type: 'Get', object, name };
}

export function groupingExpr(expression: ExprNode): GroupingExpr {
  return { type: 'Grouping', expression };
}

export function literalExpr(value: LiteralValue): LiteralExpr {
  return { type: 'Literal', value };
}

export function logicalExpr(
  left: ExprNode,
  operator: Token,
  right: ExprNode
): LogicalExpr {
  return { type: 'Logical', left, operator, right };
}

export function setExpr(
  object: ExprNode,
  name: Token,
  value: ExprNode
): SetExpr {
  return { type: 'Set', object, name, value };
}

export function superExpr(keyword: Token, method: Token): SuperExpr {
  return { type: 'Super', keyword, method };
}

export function thisExpr(keyword: Token): ThisExpr {
  return { type: 'This', keyword };
}

export function unaryExpr(operator: Token, right: ExprNode): UnaryExpr {
  return { type: 'Unary', operator, right };
}

export function variableExpr(name: Token): VariableExpr {
  return { type: 'Variable', name };
}

// ============================================================
// STATEMENTS
// ============================================================
// Target shapes for a statement grammar. Nothing in the expression parser
// produces them yet.

export interface BlockStmt {
  readonly type: 'Block';
  readonly statements: readonly StmtNode[];
}

export interface ClassStmt {
  readonly type: 'Class';
  readonly name: Token;
  readonly superclass: VariableExpr | null;
  readonly methods: readonly FunctionStmt[];
}

export interface ExpressionStmt {
  readonly type: 'Expression';
  readonly expression: ExprNode;
}

export interface FunctionStmt {
  readonly type: 'Function';
  readonly name: Token;
  readonly params: readonly Token[];
  readonly body: readonly StmtNode[];
}

export interface IfStmt {
  readonly type: 'If';
  readonly condition: ExprNode;
  readonly thenBranch: StmtNode;
  readonly elseBranch: StmtNode | null;
}

export interface PrintStmt {
  readonly type: 'Print';
  readonly expression: ExprNode;
}

export interface ReturnStmt {
  readonly type: 'Return';
  readonly keyword: Token;
  readonly value: ExprNode | null;
}

export interface VarStmt {
  readonly type: 'Var';
  readonly name: Token;
  readonly initializer: ExprNode | null;
}

export interface WhileStmt {
  readonly type: 'While';
  readonly condition: ExprNode;
  readonly body: StmtNode;
}

export type StmtNode =
  | BlockStmt
  | ClassStmt
  | ExpressionStmt
  | FunctionStmt
  | IfStmt
  | PrintStmt
  | ReturnStmt
  | VarStmt
  | WhileStmt;

export type StmtType = StmtNode['type'];
