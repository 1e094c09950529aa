/**
 * Configuration Loader for the tern CLI
 * Loads and validates .ternrc.yaml configuration files.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { IoError } from './error-classes.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = '.ternrc.yaml';

/** What a run prints: the rendered tree or the token stream */
export type OutputMode = 'ast' | 'tokens';

export interface CliConfig {
  /** REPL prompt */
  readonly prompt: string;
  readonly output: OutputMode;
}

export function createDefaultConfig(): CliConfig {
  return { prompt: '> ', output: 'ast' };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS: ReadonlySet<string> = new Set(['prompt', 'output']);

function isOutputMode(value: unknown): value is OutputMode {
  return value === 'ast' || value === 'tokens';
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): asserts data is {
  prompt?: string;
  output?: OutputMode;
} {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key '${key}'`);
    }
  }

  if ('prompt' in data && typeof data.prompt !== 'string') {
    throw new Error('Invalid configuration: prompt must be a string');
  }

  if ('output' in data && !isOutputMode(data.output)) {
    throw new Error(
      "Invalid configuration: output must be one of 'ast', 'tokens'"
    );
  }
}

/**
 * Parse YAML configuration text over the defaults.
 * Empty documents yield the defaults.
 */
export function parseConfig(text: string): CliConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration: ${reason}`, { cause: err });
  }

  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }

  validateConfig(data);
  return {
    prompt: data.prompt ?? defaults.prompt,
    output: data.output ?? defaults.output,
  };
}

// ============================================================
// LOADING
// ============================================================

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load configuration.
 *
 * With an explicit `configPath` the file must exist. Otherwise
 * `.ternrc.yaml` in `cwd` is used when present, and defaults when not.
 *
 * @throws IoError when a file cannot be read
 * @throws Error when the file content is invalid
 */
export async function loadConfig(
  cwd: string,
  configPath?: string | null
): Promise<CliConfig> {
  const explicit = configPath !== undefined && configPath !== null;
  const filePath = explicit
    ? path.resolve(cwd, configPath)
    : path.join(cwd, CONFIG_FILE_NAME);

  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (!explicit && isNotFound(err)) {
      return createDefaultConfig();
    }
    throw new IoError(filePath, err);
  }

  return parseConfig(text);
}
