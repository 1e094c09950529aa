/**
 * CLI Shared Utilities
 * Output sinks, exit codes, and error formatting for the tern CLI
 */

import * as fs from 'fs';
import { formatDiagnostic } from './diagnostics.js';
import { IoError, TernError } from './error-classes.js';

/** Process exit codes */
export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  IO: 5,
  USAGE: 64,
  PARSE: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Where the CLI writes results (`out`) and diagnostics (`err`) */
export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Format error for stderr output
 *
 * Line-tagged errors use the diagnostic format; I/O errors append the
 * system error code when one is available.
 *
 * @example
 * formatError(new IoError('missing.tern', enoent))
 * // 'Failed to read file: missing.tern (ENOENT)'
 */
export function formatError(err: unknown): string {
  if (err instanceof IoError) {
    const cause = err.cause;
    if (
      cause instanceof Error &&
      'code' in cause &&
      typeof cause.code === 'string'
    ) {
      return `${err.message} (${cause.code})`;
    }
    return err.message;
  }

  if (err instanceof TernError && err.line !== undefined) {
    return formatDiagnostic(err.toDiagnostic());
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}

/**
 * Package version, read from package.json beside the sources.
 * Falls back to 0.0.0 when the file is missing or malformed.
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  } catch {
    return '0.0.0';
  }
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}
