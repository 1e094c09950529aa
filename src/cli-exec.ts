/**
 * CLI Execution
 *
 * Implements parseArgs(), runSource(), runFile(), runRepl() and main() for
 * the tern binary. Output goes through a CliIo, never to the console
 * directly.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as readline from 'readline';
import type { ExprNode } from './ast-nodes.js';
import { loadConfig, type CliConfig, type OutputMode } from './cli-config.js';
import { explainError } from './cli-explain.js';
import {
  consoleIo,
  EXIT_CODES,
  formatError,
  readVersion,
  type CliIo,
  type ExitCode,
} from './cli-shared.js';
import { createConsoleReporter } from './diagnostics.js';
import { IoError, ParseError } from './error-classes.js';
import { tokenize } from './lexer/index.js';
import { parseSource } from './parser/index.js';
import { printExpr } from './printer.js';
import { formatToken } from './token-types.js';

// ============================================================
// ARGUMENTS
// ============================================================

export const USAGE = `Usage:
  tern                    Start an interactive session
  tern <file>             Print the syntax tree of a file
  tern -e <source>        Print the syntax tree of inline source
  tern --tokens ...       Print the token stream instead of the tree
  tern --config <path>    Load configuration from <path>
  tern --explain <id>     Show documentation for an error id
  tern --help, -h         Show this help message
  tern --version, -v      Show version information

Examples:
  tern -e "(2 + 3) * 5"
  tern --tokens expr.tern
  tern --explain TERN-P002`;

/** Where the source of a run comes from */
export type SourceInput =
  | { kind: 'file'; path: string }
  | { kind: 'inline'; source: string }
  | { kind: 'repl' };

export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string }
  | {
      mode: 'run';
      source: SourceInput;
      tokens: boolean;
      configPath: string | null;
    };

/** Malformed command line; main() answers with the usage text and exit 64 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse command-line arguments into a structured command.
 *
 * `--help` and `--version` win in any position.
 *
 * @param argv - Raw arguments (typically process.argv.slice(2))
 * @throws UsageError for unknown options, missing values, or extra arguments
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const positionals: string[] = [];
  let inline: string | null = null;
  let explain: string | null = null;
  let configPath: string | null = null;
  let tokens = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '--tokens':
        tokens = true;
        break;
      case '--config':
        configPath = takeValue();
        break;
      case '--explain':
        explain = takeValue();
        break;
      case '-e':
        inline = takeValue();
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (explain !== null) {
    return { mode: 'explain', errorId: explain };
  }

  if (positionals.length > 1) {
    throw new UsageError(`Too many arguments: ${positionals.join(' ')}`);
  }

  const file = positionals[0];
  if (inline !== null && file !== undefined) {
    throw new UsageError('Cannot combine -e with a file argument');
  }

  let source: SourceInput;
  if (inline !== null) {
    source = { kind: 'inline', source: inline };
  } else if (file !== undefined) {
    source = { kind: 'file', path: file };
  } else {
    source = { kind: 'repl' };
  }

  return { mode: 'run', source, tokens, configPath };
}

// ============================================================
// RUNNING SOURCE
// ============================================================

export interface RunOptions {
  readonly output: OutputMode;
  readonly io: CliIo;
}

/**
 * Scan and print tokens, or scan, parse and print the tree.
 *
 * Diagnostics go to `io.err` as they are reported. A parse failure has
 * already been reported when it is caught here, so only the code remains.
 */
export function runSource(source: string, options: RunOptions): ExitCode {
  const { output, io } = options;
  const reporter = createConsoleReporter((line) => io.err(line));

  if (output === 'tokens') {
    for (const token of tokenize(source, { reporter })) {
      io.out(formatToken(token));
    }
    return EXIT_CODES.OK;
  }

  let expr: ExprNode;
  try {
    expr = parseSource(source, { reporter });
  } catch (err) {
    if (err instanceof ParseError) {
      return EXIT_CODES.PARSE;
    }
    throw err;
  }

  io.out(printExpr(expr));
  return EXIT_CODES.OK;
}

export interface RunFileOptions extends RunOptions {
  /** Base directory for relative paths (default: process cwd) */
  readonly cwd?: string | undefined;
}

/**
 * Read a file and run its content.
 * Read failures are reported as `Failed to read file: <path>` with exit 5.
 */
export async function runFile(
  filePath: string,
  options: RunFileOptions
): Promise<ExitCode> {
  const resolved =
    options.cwd !== undefined ? path.resolve(options.cwd, filePath) : filePath;

  let source: string;
  try {
    source = await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    options.io.err(formatError(new IoError(filePath, err)));
    return EXIT_CODES.IO;
  }

  return runSource(source, options);
}

export interface ReplOptions extends RunOptions {
  readonly prompt: string;
  readonly input: NodeJS.ReadableStream;
  readonly promptOutput: NodeJS.WritableStream;
}

/**
 * Interactive loop: every line is an independent source.
 * Errors are reported and the loop continues until input closes.
 */
export function runRepl(options: ReplOptions): Promise<ExitCode> {
  const { io, prompt } = options;
  const rl = readline.createInterface({
    input: options.input,
    output: options.promptOutput,
    terminal: false,
  });

  return new Promise((resolve) => {
    rl.setPrompt(prompt);
    rl.on('line', (line) => {
      try {
        runSource(line, options);
      } catch (err) {
        io.err(formatError(err));
      }
      rl.prompt();
    });
    rl.on('close', () => resolve(EXIT_CODES.OK));
    rl.prompt();
  });
}

// ============================================================
// ENTRY POINT
// ============================================================

/** Process resources main() runs against */
export interface CliContext {
  readonly io: CliIo;
  readonly cwd: string;
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
}

export function createProcessContext(): CliContext {
  return {
    io: consoleIo,
    cwd: process.cwd(),
    stdin: process.stdin,
    stdout: process.stdout,
  };
}

async function run(
  parsed: Extract<ParsedArgs, { mode: 'run' }>,
  context: CliContext
): Promise<ExitCode> {
  const { io, cwd } = context;

  let config: CliConfig;
  try {
    config = await loadConfig(cwd, parsed.configPath);
  } catch (err) {
    io.err(formatError(err));
    return err instanceof IoError ? EXIT_CODES.IO : EXIT_CODES.FAILURE;
  }

  const output: OutputMode = parsed.tokens ? 'tokens' : config.output;

  switch (parsed.source.kind) {
    case 'file':
      return runFile(parsed.source.path, { output, io, cwd });
    case 'inline':
      return runSource(parsed.source.source, { output, io });
    case 'repl':
      return runRepl({
        output,
        io,
        prompt: config.prompt,
        input: context.stdin,
        promptOutput: context.stdout,
      });
  }
}

/**
 * Entry point for the tern binary.
 *
 * @returns Process exit code; never calls process.exit itself
 */
export async function main(
  argv: readonly string[],
  context: CliContext = createProcessContext()
): Promise<ExitCode> {
  const { io } = context;

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`Error: ${err.message}`);
      io.err(USAGE);
      return EXIT_CODES.USAGE;
    }
    throw err;
  }

  try {
    switch (parsed.mode) {
      case 'help':
        io.out(USAGE);
        return EXIT_CODES.OK;

      case 'version':
        io.out(readVersion());
        return EXIT_CODES.OK;

      case 'explain': {
        const text = explainError(parsed.errorId);
        if (text === null) {
          io.err(`Unknown error id: ${parsed.errorId}`);
          return EXIT_CODES.FAILURE;
        }
        io.out(text);
        return EXIT_CODES.OK;
      }

      case 'run':
        return await run(parsed, context);
    }
  } catch (err) {
    io.err(formatError(err));
    return EXIT_CODES.FAILURE;
  }
}
