/**
 * Tern CLI Tests: .ternrc.yaml loading and validation
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from '../../src/cli-config.js';
import { IoError } from '../../src/error-classes.js';

describe('parseConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({ prompt: '> ', output: 'ast' });
  });

  it('overrides defaults with the given keys', () => {
    expect(parseConfig('prompt: "tern> "\n')).toEqual({
      prompt: 'tern> ',
      output: 'ast',
    });
    expect(parseConfig('output: tokens\n')).toEqual({
      prompt: '> ',
      output: 'tokens',
    });
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('colour: red\n')).toThrow(
      "Invalid configuration: unknown key 'colour'"
    );
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig('prompt: 3\n')).toThrow(
      'Invalid configuration: prompt must be a string'
    );
    expect(() => parseConfig('output: xml\n')).toThrow(
      "Invalid configuration: output must be one of 'ast', 'tokens'"
    );
  });

  it('rejects documents that are not mappings', () => {
    expect(() => parseConfig('- a\n- b\n')).toThrow(
      'Invalid configuration: must be an object'
    );
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseConfig('prompt: [unclosed\n')).toThrow(
      /^Invalid configuration: /
    );
  });
});

describe('validateConfig', () => {
  it('accepts a partial configuration', () => {
    expect(() => validateConfig({ prompt: '$ ' })).not.toThrow();
  });

  it('rejects null', () => {
    expect(() => validateConfig(null)).toThrow(
      'Invalid configuration: must be an object'
    );
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tern-config-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  afterEach(async () => {
    await fs.rm(path.join(tempDir, CONFIG_FILE_NAME), { force: true });
  });

  it('uses defaults when the working directory has no config file', async () => {
    await expect(loadConfig(tempDir)).resolves.toEqual(createDefaultConfig());
  });

  it('reads the config file from the working directory', async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE_NAME),
      'prompt: "? "\noutput: tokens\n',
      'utf-8'
    );
    await expect(loadConfig(tempDir)).resolves.toEqual({
      prompt: '? ',
      output: 'tokens',
    });
  });

  it('reads an explicit path relative to the working directory', async () => {
    await fs.writeFile(path.join(tempDir, 'custom.yaml'), 'prompt: "% "\n');
    await expect(loadConfig(tempDir, 'custom.yaml')).resolves.toEqual({
      prompt: '% ',
      output: 'ast',
    });
  });

  it('fails with IoError when an explicit path is missing', async () => {
    await expect(loadConfig(tempDir, 'missing.yaml')).rejects.toThrow(
      new IoError(path.join(tempDir, 'missing.yaml'), null)
    );
    await expect(loadConfig(tempDir, 'missing.yaml')).rejects.toBeInstanceOf(
      IoError
    );
  });
});
