/**
 * Tern Parser Tests: syntax errors and recovery
 */

import { describe, expect, it } from 'vitest';
import {
  createCollectingReporter,
  createParserState,
  formatDiagnostic,
  parse,
  ParseError,
  parseSource,
  printExpr,
  synchronize,
  tokenize,
} from '../../src/index.js';
import { parseFailure, token } from '../helpers/tern.js';

describe('Tern Parser errors', () => {
  describe('unclosed groupings', () => {
    it('reports a lone opening parenthesis at end of input', () => {
      const { error, diagnostics } = parseFailure('(');

      expect(diagnostics).toEqual([
        "[line 1] Error at end: Expect ')' after expression.",
      ]);
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.errorId).toBe('TERN-P002');
      expect(error.token.type).toBe('EOF');
    });

    it('reports a missing closing parenthesis after an expression', () => {
      expect(parseFailure('(1 + 2').diagnostics).toEqual([
        "[line 1] Error at end: Expect ')' after expression.",
      ]);
    });

    it('tags the token found instead of the closing parenthesis', () => {
      expect(parseFailure('(1 2)').diagnostics).toEqual([
        "[line 1] Error at '2': Expect ')' after expression.",
      ]);
    });
  });

  describe('token arrays without EOF', () => {
    it('treats the end of the array as end of input', () => {
      const reporter = createCollectingReporter();

      expect(() => parse([token('LEFT_PAREN', '(')], { reporter })).toThrow(
        ParseError
      );
      expect(reporter.diagnostics.map(formatDiagnostic)).toEqual([
        "[line 1] Error at '(': Expect ')' after expression.",
      ]);
    });
  });

  describe('missing operands', () => {
    it('reports a stray closing parenthesis', () => {
      const { error, diagnostics } = parseFailure(')');

      expect(diagnostics).toEqual(["[line 1] Error at ')': Expect expression."]);
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.errorId).toBe('TERN-P001');
      expect(error.message).toBe('Expect expression.');
      expect(error.line).toBe(1);
    });

    it('reports a binary operator without right operand', () => {
      expect(parseFailure('1 +').diagnostics).toEqual([
        '[line 1] Error at end: Expect expression.',
      ]);
    });

    it('reports empty input', () => {
      expect(parseFailure('').diagnostics).toEqual([
        '[line 1] Error at end: Expect expression.',
      ]);
    });

    it('reports the line of the offending token', () => {
      expect(parseFailure('1 +\n\n*').diagnostics).toEqual([
        "[line 3] Error at '*': Expect expression.",
      ]);
    });

    it('does not accept identifiers or keywords as operands', () => {
      expect(parseFailure('foo').diagnostics).toEqual([
        "[line 1] Error at 'foo': Expect expression.",
      ]);
      expect(parseFailure('and').diagnostics).toEqual([
        "[line 1] Error at 'and': Expect expression.",
      ]);
    });

    it('renders the thrown error in diagnostic form', () => {
      const { error } = parseFailure(')');
      if (!(error instanceof ParseError)) throw new Error('expected ParseError');
      expect(formatDiagnostic(error.toDiagnostic())).toBe(
        "[line 1] Error at ')': Expect expression."
      );
    });
  });

  describe('scan diagnostics', () => {
    it('shares one reporter between scanning and parsing', () => {
      expect(parseFailure('@').diagnostics).toEqual([
        '[line 1] Error: Unexpected character.',
        '[line 1] Error at end: Expect expression.',
      ]);
    });

    it('parses the remaining tokens after a scan fault', () => {
      const reporter = createCollectingReporter();
      const expr = parseSource('1 @ + 2', { reporter });

      expect(printExpr(expr)).toBe('(+ 1 2)');
      expect(reporter.diagnostics.map(formatDiagnostic)).toEqual([
        '[line 1] Error: Unexpected character.',
      ]);
    });
  });

  describe('synchronize', () => {
    const setup = (source: string) => {
      const reporter = createCollectingReporter();
      return createParserState(tokenize(source, { reporter }), reporter);
    };

    it('stops just after a semicolon', () => {
      const state = setup('1 + ; var x');
      synchronize(state);
      expect(state.pos).toBe(3);
      expect(state.tokens[state.pos]?.type).toBe('VAR');
    });

    it('stops before a statement keyword', () => {
      const state = setup('a b print c');
      synchronize(state);
      expect(state.pos).toBe(2);
      expect(state.tokens[state.pos]?.type).toBe('PRINT');
    });

    it('stops at end of input', () => {
      const state = setup('a b c');
      synchronize(state);
      expect(state.tokens[state.pos]?.type).toBe('EOF');
    });
  });
});
