#!/usr/bin/env node
/**
 * forthic-tokens: print the token stream of a Forthic source file
 *
 * Usage:
 *   forthic-tokens program.forthic
 *   forthic-tokens --format json program.forthic
 *   cat program.forthic | forthic-tokens -
 *   forthic-tokens --explain FORTHIC-L001
 */

import * as fs from 'node:fs';
import { LexerError, tokenize, type Token } from 'forthic-tokenizer';
import { loadConfig, type CliConfig } from './cli-config.js';
import { formatError } from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import { formatTokens, readVersion } from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'tokens';
      file: string;
      format: 'human' | 'json';
      /** undefined = take the value from the config file */
      includeComments: boolean | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' }
  | { mode: 'explain'; errorId: string };

/** Host I/O, injected so the command can run inside tests */
export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readStdin: () => string;
  readonly cwd: string;
}

/** Exit codes */
export const EXIT_OK = 0;
export const EXIT_TOKENIZE_FAILED = 1;
export const EXIT_USAGE = 2;

const FLAGS_WITH_VALUE = ['--format', '--explain'];
const KNOWN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--no-comments',
  ...FLAGS_WITH_VALUE,
];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown flags, a bad --format value, or a missing file
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const errorId = argv[explainIndex + 1];
    if (!errorId) {
      throw new Error('Missing error ID after --explain');
    }
    return { mode: 'explain', errorId };
  }

  let format: 'human' | 'json' = 'human';
  let includeComments: boolean | undefined;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      const value = argv[i + 1];
      if (value !== 'human' && value !== 'json') {
        throw new Error(
          `Invalid --format value: ${value ?? ''}. Must be one of: human, json`
        );
      }
      format = value;
      i++;
      continue;
    }

    if (arg === '--no-comments') {
      includeComments = false;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-' && !KNOWN_FLAGS.includes(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }

    positional.push(arg);
  }

  const file = positional[0];
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (positional.length > 1) {
    throw new Error(`Unexpected argument: ${positional[1] ?? ''}`);
  }

  return { mode: 'tokens', file, format, includeComments };
}

function showHelp(io: CliIO): void {
  io.stdout(`Forthic Tokenizer

Usage:
  forthic-tokens <file>              Print the tokens of a Forthic file
  forthic-tokens -                   Read source from stdin
  forthic-tokens --explain <id>      Explain an error ID (e.g. FORTHIC-L001)
  forthic-tokens --help              Show this help message
  forthic-tokens --version           Show version information

Options:
  --format human|json                Output format (default: human)
  --no-comments                      Omit comment tokens

Configuration is read from .forthic-tokens.yaml in the working directory.`);
}

/**
 * Tokenize source using the CLI configuration.
 * Command-line settings override the config file.
 */
export function tokenizeWithConfig(
  source: string,
  config: CliConfig | null,
  includeComments: boolean | undefined
): Token[] {
  return tokenize(source, {
    whitespace: config?.whitespace,
    quoteChars: config?.quoteChars,
    includeComments: includeComments ?? config?.includeComments ?? true,
  });
}

/**
 * Run the command and return its exit code.
 *
 * Exit codes: 0 success, 1 tokenizer failure, 2 usage, config or file error.
 */
export function run(argv: string[], io: CliIO): number {
  let command: ParsedArgs;
  try {
    command = parseArgs(argv);
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return EXIT_USAGE;
  }

  if (command.mode === 'help') {
    showHelp(io);
    return EXIT_OK;
  }

  if (command.mode === 'version') {
    io.stdout(`forthic-tokens ${readVersion()}`);
    return EXIT_OK;
  }

  if (command.mode === 'explain') {
    const doc = explainError(command.errorId);
    if (doc === null) {
      io.stderr(`Unknown error ID: ${command.errorId}`);
      return EXIT_USAGE;
    }
    io.stdout(doc);
    return EXIT_OK;
  }

  const formatOptions = { format: command.format, file: command.file };
  let source: string | undefined;

  try {
    const config = loadConfig(io.cwd);
    source =
      command.file === '-'
        ? io.readStdin()
        : fs.readFileSync(command.file, 'utf-8');

    const tokens = tokenizeWithConfig(source, config, command.includeComments);
    io.stdout(formatTokens(tokens, command.format));
    return EXIT_OK;
  } catch (err) {
    if (!(err instanceof Error)) {
      throw err;
    }
    io.stderr(formatError(err, source, formatOptions));
    return err instanceof LexerError ? EXIT_TOKENIZE_FAILED : EXIT_USAGE;
  }
}

/**
 * Entry point for forthic-tokens binary
 */
function main(): void {
  process.exitCode = run(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readStdin: () => fs.readFileSync(0, 'utf-8'),
    cwd: process.cwd(),
  });
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
