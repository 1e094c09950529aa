/**
 * Tests for the error registry and message templates
 */

import { describe, expect, it } from 'vitest';
import {
  ERROR_REGISTRY,
  messageFor,
  renderMessage,
} from '../../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('registers every error id once', () => {
    expect([...ERROR_REGISTRY.entries()].map(([id]) => id)).toEqual([
      'TERN-L001',
      'TERN-L002',
      'TERN-P001',
      'TERN-P002',
      'TERN-R001',
      'TERN-R002',
      'TERN-I001',
    ]);
    expect(ERROR_REGISTRY.size).toBe(7);
  });

  it('derives the id letter from the category', () => {
    const letters = { lexer: 'L', parse: 'P', runtime: 'R', io: 'I' };
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id.charAt(5)).toBe(letters[definition.category]);
    }
  });

  it('returns undefined for unknown ids', () => {
    expect(ERROR_REGISTRY.get('TERN-P999')).toBeUndefined();
    expect(ERROR_REGISTRY.has('TERN-P999')).toBe(false);
  });
});

describe('renderMessage', () => {
  it('substitutes placeholders from context', () => {
    expect(
      renderMessage('Failed to read file: {path}', { path: 'a.tern' })
    ).toBe('Failed to read file: a.tern');
  });

  it('treats doubled braces as literal braces', () => {
    expect(renderMessage('{{x}} = {x}', { x: 1 })).toBe('{x} = 1');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('a {missing} b', {})).toBe('a  b');
  });

  it('returns the template when a placeholder is unclosed', () => {
    expect(renderMessage('open {brace', { brace: 'x' })).toBe('open {brace');
  });
});

describe('messageFor', () => {
  it('renders registered templates', () => {
    expect(messageFor('TERN-P002')).toBe("Expect ')' after expression.");
    expect(messageFor('TERN-R002', { construct: 'call expression' })).toBe(
      'Unsupported construct: call expression.'
    );
  });

  it('rejects unknown ids', () => {
    expect(() => messageFor('TERN-X999')).toThrow(
      new TypeError('Unknown error ID: TERN-X999')
    );
  });
});
