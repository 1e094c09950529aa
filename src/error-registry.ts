/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime' | 'io';

/**
 * Example demonstrating an error condition.
 * Used by `tern --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TERN-{category letter}{3-digit} (e.g., TERN-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (TERN-L0xx)
  {
    errorId: 'TERN-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string.',
    cause: 'A string was opened with a double quote but never closed.',
    resolution:
      'Add the closing double quote. Strings may span several lines but must end before the end of input.',
    examples: [
      {
        description: 'Missing closing quote',
        code: '"hello',
      },
    ],
  },
  {
    errorId: 'TERN-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character.',
    cause: 'The character is not part of the language syntax.',
    resolution:
      'Remove the character or place it inside a string literal. The rest of the line is still scanned.',
    examples: [
      {
        description: 'Stray at-sign between operands',
        code: '1 @ 2',
      },
    ],
  },

  // Parse Errors (TERN-P0xx)
  {
    errorId: 'TERN-P001',
    category: 'parse',
    description: 'Expression expected',
    messageTemplate: 'Expect expression.',
    cause:
      'The token cannot start an expression: an operand is missing or an operator is misplaced.',
    resolution:
      'Provide a number, string, true, false, nil, or a parenthesized expression at this position.',
    examples: [
      {
        description: 'Binary operator without right operand',
        code: '1 +',
      },
      {
        description: 'Closing parenthesis without an expression',
        code: ')',
      },
    ],
  },
  {
    errorId: 'TERN-P002',
    category: 'parse',
    description: 'Unclosed grouping',
    messageTemplate: "Expect ')' after expression.",
    cause: 'A parenthesized expression was opened but not closed.',
    resolution: "Add the matching ')' after the grouped expression.",
    examples: [
      {
        description: 'Lone opening parenthesis',
        code: '(1 + 2',
      },
    ],
  },

  // Runtime Errors (TERN-R0xx)
  {
    errorId: 'TERN-R001',
    category: 'runtime',
    description: 'Runtime error',
    messageTemplate: '{message}',
    cause: 'An evaluator failed while walking the expression tree.',
    resolution: 'Inspect the message for the operation that failed.',
  },
  {
    errorId: 'TERN-R002',
    category: 'runtime',
    description: 'Unsupported construct',
    messageTemplate: 'Unsupported construct: {construct}.',
    cause:
      'A tree-walking algorithm reached a node variant it does not handle, such as a call in a hand-built tree.',
    resolution:
      'Only pass trees produced by the expression grammar, or extend the visitor to handle the variant.',
  },

  // I/O Errors (TERN-I0xx)
  {
    errorId: 'TERN-I001',
    category: 'io',
    description: 'File read failed',
    messageTemplate: 'Failed to read file: {path}',
    cause: 'The source or configuration file is missing or unreadable.',
    resolution: 'Check the path and the file permissions.',
  },
];

/** Central registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template, replacing `{name}` placeholders from context.
 *
 * Missing values render as an empty string; `{{` and `}}` are literal braces.
 * An unclosed placeholder returns the template unchanged.
 *
 * @example
 * renderMessage('Failed to read file: {path}', { path: 'a.tern' })
 * // 'Failed to read file: a.tern'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) === '{') {
      result += '{';
      i += 2;
      continue;
    }

    if (char === '}' && template.charAt(i + 1) === '}') {
      result += '}';
      i += 2;
      continue;
    }

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

/**
 * Render the message of a registered error.
 * @throws TypeError if errorId is not registered
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown> = {}
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}
