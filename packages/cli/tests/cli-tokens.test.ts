/**
 * forthic-tokens CLI Tests
 * Argument parsing and end-to-end runs against temporary files
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  type CliIO,
  EXIT_OK,
  EXIT_TOKENIZE_FAILED,
  EXIT_USAGE,
  parseArgs,
  run,
} from '../src/cli-tokens.js';
import { CONFIG_FILE_NAME } from '../src/cli-config.js';

interface CapturedIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
}

function captureIO(cwd: string, stdin = ''): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    readStdin: () => stdin,
    cwd,
  };
}

describe('parseArgs', () => {
  it('parses a file argument with defaults', () => {
    expect(parseArgs(['prog.forthic'])).toEqual({
      mode: 'tokens',
      file: 'prog.forthic',
      format: 'human',
      includeComments: undefined,
    });
  });

  it('parses --format and --no-comments in any position', () => {
    expect(parseArgs(['--no-comments', 'a.forthic', '--format', 'json'])).toEqual(
      {
        mode: 'tokens',
        file: 'a.forthic',
        format: 'json',
        includeComments: false,
      }
    );
  });

  it('accepts "-" for stdin', () => {
    expect(parseArgs(['-'])).toMatchObject({ mode: 'tokens', file: '-' });
  });

  it('detects help and version flags', () => {
    expect(parseArgs(['x', '-h'])).toEqual({ mode: 'help' });
    expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
  });

  it('parses --explain', () => {
    expect(parseArgs(['--explain', 'FORTHIC-L001'])).toEqual({
      mode: 'explain',
      errorId: 'FORTHIC-L001',
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--verbose', 'a'])).toThrow(
      'Unknown option: --verbose'
    );
  });

  it('rejects an invalid --format value', () => {
    expect(() => parseArgs(['--format', 'xml', 'a'])).toThrow(
      'Invalid --format value: xml. Must be one of: human, json'
    );
  });

  it('requires a file argument', () => {
    expect(() => parseArgs([])).toThrow('Missing file argument');
    expect(() => parseArgs(['--explain'])).toThrow(
      'Missing error ID after --explain'
    );
  });

  it('rejects a second positional argument', () => {
    expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b');
  });
});

describe('run', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forthic-tokens-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeSource(name: string, content: string): Promise<string> {
    const file = path.join(tempDir, name);
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  it('prints one line per token', async () => {
    const file = await writeSource('square.forthic', ': SQUARE ;\n# c\n');
    const io = captureIO(tempDir);

    expect(run([file], io)).toBe(EXIT_OK);
    expect(io.err).toEqual([]);
    expect(io.out).toEqual([
      [
        '1:1' + ' '.repeat(6) + 'start_definition' + ' "SQUARE"',
        '1:10' + ' '.repeat(5) + 'end_definition' + ' '.repeat(3) + '";"',
        '2:1' + ' '.repeat(6) + 'comment' + ' '.repeat(10) + '""',
        '3:1' + ' '.repeat(6) + 'end_of_stream' + ' '.repeat(4) + '""',
      ].join('\n'),
    ]);
  });

  it('omits comments with --no-comments', async () => {
    const file = await writeSource('comment.forthic', '# only a comment\n');
    const io = captureIO(tempDir);

    expect(run(['--no-comments', file], io)).toBe(EXIT_OK);
    expect(io.out).toEqual(['2:1' + ' '.repeat(6) + 'end_of_stream    ""']);
  });

  it('prints JSON tokens with --format json', async () => {
    const file = await writeSource('module.forthic', '{util}');
    const io = captureIO(tempDir);

    expect(run(['--format', 'json', file], io)).toBe(EXIT_OK);
    const tokens: unknown = JSON.parse(io.out[0] ?? '');
    expect(tokens).toEqual([
      {
        kind: 'start_module',
        text: 'util',
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 6, offset: 5 },
        },
      },
      {
        kind: 'end_module',
        text: '}',
        span: {
          start: { line: 1, column: 6, offset: 5 },
          end: { line: 1, column: 7, offset: 6 },
        },
      },
      {
        kind: 'end_of_stream',
        text: '',
        span: {
          start: { line: 1, column: 7, offset: 6 },
          end: { line: 1, column: 7, offset: 6 },
        },
      },
    ]);
  });

  it('reads source from stdin', () => {
    const io = captureIO(tempDir, '[ ]');

    expect(run(['-'], io)).toBe(EXIT_OK);
    expect(io.out[0]?.split('\n')).toHaveLength(3);
  });

  it('reports an unterminated string with a snippet', async () => {
    const file = await writeSource('bad.forthic', ': GREET """hello\n');
    const io = captureIO(tempDir);

    expect(run([file], io)).toBe(EXIT_TOKENIZE_FAILED);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([
      [
        'error[FORTHIC-L001]: Unterminated string literal: no closing """ before end of input',
        `  --> ${file}:1:9`,
        '   |',
        ' 1 | : GREET """hello',
        '   | ' + ' '.repeat(8) + '^^^',
        '   |',
        '   = note: input ended at 2:1',
      ].join('\n'),
    ]);
  });

  it('reports an unterminated string as JSON', async () => {
    const file = await writeSource('bad-json.forthic', "'''x");
    const io = captureIO(tempDir);

    expect(run(['--format', 'json', file], io)).toBe(EXIT_TOKENIZE_FAILED);
    expect(JSON.parse(io.err[0] ?? '')).toEqual({
      errorId: 'FORTHIC-L001',
      message:
        "Unterminated string literal: no closing ''' before end of input",
      file,
      line: 1,
      column: 1,
    });
  });

  it('reports a missing file with exit code 2', () => {
    const missing = path.join(tempDir, 'missing.forthic');
    const io = captureIO(tempDir);

    expect(run([missing], io)).toBe(EXIT_USAGE);
    expect(io.err).toEqual([`File not found: ${missing}`]);
  });

  it('reports a missing file as JSON with --format json', () => {
    const missing = path.join(tempDir, 'missing.forthic');
    const io = captureIO(tempDir);

    expect(run(['--format', 'json', missing], io)).toBe(EXIT_USAGE);
    expect(JSON.parse(io.err[0] ?? '')).toEqual({
      message: `File not found: ${missing}`,
      file: missing,
    });
  });

  it('reports usage errors with exit code 2', () => {
    const io = captureIO(tempDir);
    expect(run(['--bogus'], io)).toBe(EXIT_USAGE);
    expect(io.err).toEqual(['Unknown option: --bogus']);
  });

  it('prints the version from package.json', () => {
    const io = captureIO(tempDir);
    expect(run(['--version'], io)).toBe(EXIT_OK);
    expect(io.out).toEqual(['forthic-tokens 0.1.0']);
  });

  it('prints help', () => {
    const io = captureIO(tempDir);
    expect(run(['--help'], io)).toBe(EXIT_OK);
    expect(io.out[0]?.split('\n')[0]).toBe('Forthic Tokenizer');
  });

  it('explains a known error ID', () => {
    const io = captureIO(tempDir);
    expect(run(['--explain', 'FORTHIC-L001'], io)).toBe(EXIT_OK);
    expect(io.out[0]?.split('\n')[0]).toBe(
      'FORTHIC-L001: Unterminated string literal'
    );
  });

  it('rejects an unknown error ID', () => {
    const io = captureIO(tempDir);
    expect(run(['--explain', 'FORTHIC-L999'], io)).toBe(EXIT_USAGE);
    expect(io.err).toEqual(['Unknown error ID: FORTHIC-L999']);
  });

  describe('with a configuration file', () => {
    let configDir: string;

    beforeAll(async () => {
      configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forthic-config-'));
    });

    afterAll(async () => {
      await fs.rm(configDir, { recursive: true, force: true });
    });

    it('applies quote characters and comment settings from the file', async () => {
      await fs.writeFile(
        path.join(configDir, CONFIG_FILE_NAME),
        'quoteChars: "`"\nincludeComments: false\n',
        'utf-8'
      );
      const io = captureIO(configDir, '# c\n```x``` """y"""');

      expect(run(['-'], io)).toBe(EXIT_OK);
      expect(io.out).toEqual([
        [
          '2:1' + ' '.repeat(6) + 'string' + ' '.repeat(11) + '"x"',
          '2:16' + ' '.repeat(5) + 'end_of_stream    ""',
        ].join('\n'),
      ]);
    });

    it('lets --no-comments override includeComments: true', async () => {
      await fs.writeFile(
        path.join(configDir, CONFIG_FILE_NAME),
        'includeComments: true\n',
        'utf-8'
      );
      const io = captureIO(configDir, '# c');

      expect(run(['--no-comments', '-'], io)).toBe(EXIT_OK);
      expect(io.out).toEqual(['1:4' + ' '.repeat(6) + 'end_of_stream    ""']);
    });

    it('reports an invalid configuration with exit code 2', async () => {
      const configPath = path.join(configDir, CONFIG_FILE_NAME);
      await fs.writeFile(configPath, 'colour: blue\n', 'utf-8');
      const io = captureIO(configDir, ';');

      expect(run(['-'], io)).toBe(EXIT_USAGE);
      expect(io.err).toEqual([
        `error[FORTHIC-C002]: Invalid configuration in ${configPath}: unknown key colour`,
      ]);
    });
  });
});
