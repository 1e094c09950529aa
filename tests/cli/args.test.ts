/**
 * Tern CLI Tests: argument parsing
 */

import { describe, expect, it } from 'vitest';
import { parseArgs, UsageError } from '../../src/cli-exec.js';

describe('parseArgs', () => {
  describe('run modes', () => {
    it('starts the REPL without arguments', () => {
      expect(parseArgs([])).toEqual({
        mode: 'run',
        source: { kind: 'repl' },
        tokens: false,
        configPath: null,
      });
    });

    it('takes one positional argument as a file', () => {
      expect(parseArgs(['expr.tern'])).toEqual({
        mode: 'run',
        source: { kind: 'file', path: 'expr.tern' },
        tokens: false,
        configPath: null,
      });
    });

    it('takes inline source after -e', () => {
      expect(parseArgs(['-e', '1 + 2'])).toEqual({
        mode: 'run',
        source: { kind: 'inline', source: '1 + 2' },
        tokens: false,
        configPath: null,
      });
    });

    it('collects --tokens and --config in any order', () => {
      expect(parseArgs(['expr.tern', '--config', 'c.yaml', '--tokens'])).toEqual(
        {
          mode: 'run',
          source: { kind: 'file', path: 'expr.tern' },
          tokens: true,
          configPath: 'c.yaml',
        }
      );
    });
  });

  describe('informational modes', () => {
    it('gives --help and --version priority in any position', () => {
      expect(parseArgs(['expr.tern', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
      expect(parseArgs(['--bogus', '-v'])).toEqual({ mode: 'version' });
    });

    it('parses --explain with its id', () => {
      expect(parseArgs(['--explain', 'TERN-P001'])).toEqual({
        mode: 'explain',
        errorId: 'TERN-P001',
      });
    });
  });

  describe('usage errors', () => {
    it('rejects more than one positional argument', () => {
      expect(() => parseArgs(['a.tern', 'b.tern'])).toThrow(
        new UsageError('Too many arguments: a.tern b.tern')
      );
    });

    it('rejects unknown options', () => {
      expect(() => parseArgs(['--bogus'])).toThrow(
        new UsageError('Unknown option: --bogus')
      );
    });

    it('rejects options without their value', () => {
      expect(() => parseArgs(['-e'])).toThrow('Missing value for -e');
      expect(() => parseArgs(['--config'])).toThrow(
        'Missing value for --config'
      );
      expect(() => parseArgs(['--explain'])).toThrow(
        'Missing value for --explain'
      );
    });

    it('rejects inline source together with a file', () => {
      expect(() => parseArgs(['-e', '1', 'expr.tern'])).toThrow(
        'Cannot combine -e with a file argument'
      );
    });

    it('throws UsageError instances', () => {
      expect(() => parseArgs(['--bogus'])).toThrow(UsageError);
    });
  });
});
