/**
 * Tern Error Classes
 * Structured error types with registry-based error codes
 */

import type { Diagnostic } from './diagnostics.js';
import { ERROR_REGISTRY, messageFor } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';
import { TOKEN_TYPES, type Token } from './token-types.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TernErrorData {
  readonly errorId: string;
  readonly message: string;
  /** 1-based source line, when the error is tied to source text */
  readonly line?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Look up an error definition and check its category.
 * @internal
 */
export function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/**
 * Location suffix used in diagnostics for a token-tagged error.
 * @internal
 */
export function whereOf(token: Token): string {
  return token.type === TOKEN_TYPES.EOF ? ' at end' : ` at '${token.lexeme}'`;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tern errors.
 * Provides structured data for host applications to format as needed.
 */
export class TernError extends Error {
  readonly errorId: string;
  readonly line?: number | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TernErrorData, options?: ErrorOptions) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message, options);
    this.name = 'TernError';
    this.errorId = data.errorId;
    this.line = data.line;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TernErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      line: this.line,
      context: this.context,
    };
  }

  /** Location suffix for the `[line N] Error<where>: ...` format */
  protected where(): string {
    return '';
  }

  /** Diagnostic record for reporters. Errors without a line use line 0. */
  toDiagnostic(): Diagnostic {
    return {
      errorId: this.errorId,
      line: this.line ?? 0,
      where: this.where(),
      message: this.message,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TernErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors, tagged with the offending token */
export class ParseError extends TernError {
  readonly token: Token;

  constructor(
    errorId: string,
    message: string,
    token: Token,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, line: token.line, context });
    this.name = 'ParseError';
    this.token = token;
  }

  protected override where(): string {
    return whereOf(this.token);
  }
}

/**
 * Evaluation errors, tagged with the token of the failing operation.
 * Reserved for tree-walking algorithms; the grammar never raises it.
 */
export class RuntimeError extends TernError {
  readonly token: Token;

  constructor(
    errorId: string,
    message: string,
    token: Token,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'runtime');
    super({ errorId, message, line: token.line, context });
    this.name = 'RuntimeError';
    this.token = token;
  }

  protected override where(): string {
    return whereOf(this.token);
  }
}

/** A visitor reached a node variant it has no rendering or semantics for */
export class UnsupportedConstructError extends RuntimeError {
  readonly construct: string;

  constructor(construct: string, token: Token) {
    super('TERN-R002', messageFor('TERN-R002', { construct }), token, {
      construct,
    });
    this.name = 'UnsupportedConstructError';
    this.construct = construct;
  }
}

/** File system failures, wrapped so every boundary error is a TernError */
export class IoError extends TernError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(
      {
        errorId: 'TERN-I001',
        message: messageFor('TERN-I001', { path }),
        context: { path },
      },
      { cause }
    );
    this.name = 'IoError';
    this.path = path;
  }
}
