/**
 * Tern Types
 * Shared type and error re-exports for internal modules and hosts
 */

export * from './token-types.js';
export * from './ast-nodes.js';
export * from './diagnostics.js';
export * from './error-registry.js';
export * from './error-classes.js';
export { LexerError } from './lexer/errors.js';
