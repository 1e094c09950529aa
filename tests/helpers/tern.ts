/**
 * Test utilities for Tern scanner, parser and CLI tests
 */

import {
  createCollectingReporter,
  formatDiagnostic,
  parseSource,
  printExpr,
  tokenize,
  type SimpleToken,
  type SimpleTokenType,
  type TextToken,
  type Token,
} from '../../src/index.js';
import type { CliIo } from '../../src/cli-shared.js';

/** Scan source with a collecting reporter */
export function scan(source: string): {
  tokens: Token[];
  diagnostics: string[];
} {
  const reporter = createCollectingReporter();
  const tokens = tokenize(source, { reporter });
  return { tokens, diagnostics: reporter.diagnostics.map(formatDiagnostic) };
}

/** Token types of a scan, for compact assertions */
export function types(source: string): string[] {
  return scan(source).tokens.map((token) => token.type);
}

/** Scan, parse and print; fails the test on any diagnostic */
export function render(source: string): string {
  const reporter = createCollectingReporter();
  const expr = parseSource(source, { reporter });
  if (reporter.hadError) {
    throw new Error(
      `Unexpected diagnostics: ${reporter.diagnostics.map(formatDiagnostic).join('; ')}`
    );
  }
  return printExpr(expr);
}

/** Parse source expected to fail; returns the thrown error and diagnostics */
export function parseFailure(source: string): {
  error: unknown;
  diagnostics: string[];
} {
  const reporter = createCollectingReporter();
  try {
    parseSource(source, { reporter });
  } catch (error) {
    return { error, diagnostics: reporter.diagnostics.map(formatDiagnostic) };
  }
  throw new Error(`Expected parse of ${JSON.stringify(source)} to fail`);
}

// ============================================================
// TOKEN BUILDERS
// ============================================================

export function token(
  type: SimpleTokenType,
  lexeme: string,
  line = 1
): SimpleToken {
  return { type, lexeme, line, literal: null };
}

export function identifier(name: string, line = 1): TextToken {
  return { type: 'IDENTIFIER', lexeme: name, line, literal: name };
}

// ============================================================
// CLI
// ============================================================

/** In-memory CliIo recording every line */
export interface MemoryIo extends CliIo {
  readonly stdout: string[];
  readonly stderr: string[];
}

export function createMemoryIo(): MemoryIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => {
      stdout.push(text);
    },
    err: (text) => {
      stderr.push(text);
    },
  };
}
