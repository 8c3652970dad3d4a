/**
 * CLI Error Formatter
 * Format tokenizer errors for human-readable or JSON output
 */

import {
  ForthicError,
  type SourceLocation,
  UnterminatedStringError,
} from 'forthic-tokenizer';

export interface FormatOptions {
  readonly format: 'human' | 'json';
  /** Display name of the input ('-' for stdin) */
  readonly file: string;
}

/** Source line for a 1-based line number, without its line terminator */
function sourceLine(source: string, line: number): string | undefined {
  const content = source.split('\n')[line - 1];
  return content?.replace(/\r$/, '');
}

/**
 * Render a source line with a caret underline.
 *
 * ```
 *    |
 *  3 | : GREET """hello
 *    |         ^^^
 *    |
 * ```
 */
function renderSnippet(
  source: string,
  at: SourceLocation,
  width: number
): string[] {
  const content = sourceLine(source, at.line);
  if (content === undefined) {
    return [];
  }
  const lineNumber = String(at.line);
  const gutter = ' '.repeat(lineNumber.length);
  const caret = ' '.repeat(at.column - 1) + '^'.repeat(width);
  return [
    ` ${gutter} |`,
    ` ${lineNumber} | ${content}`,
    ` ${gutter} | ${caret}`,
    ` ${gutter} |`,
  ];
}

function formatHuman(
  err: ForthicError,
  source: string | undefined,
  file: string
): string {
  const lines = [`error[${err.errorId}]: ${err.toData().message}`];

  if (err instanceof UnterminatedStringError) {
    const { start, location } = err;
    lines.push(`  --> ${file}:${start.line}:${start.column}`);
    if (source !== undefined) {
      lines.push(...renderSnippet(source, start, 3));
    }
    lines.push(
      `   = note: input ended at ${location.line}:${location.column}`
    );
    return lines.join('\n');
  }

  if (err.location) {
    lines.push(`  --> ${file}:${err.location.line}:${err.location.column}`);
    if (source !== undefined) {
      lines.push(...renderSnippet(source, err.location, 1));
    }
  }
  return lines.join('\n');
}

function formatJson(err: ForthicError, file: string): string {
  const start =
    err instanceof UnterminatedStringError ? err.start : err.location;
  return JSON.stringify({
    errorId: err.errorId,
    message: err.toData().message,
    file,
    line: start?.line,
    column: start?.column,
  });
}

function plainMessage(err: Error): string {
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }
  return err.message;
}

/**
 * Format an error for stderr.
 *
 * Forthic errors get an `error[ID]` header, a location, and a source
 * snippet when the source is known. Missing files render as
 * `File not found: path`; anything else as its message. With the json
 * format every error is a single JSON object.
 */
export function formatError(
  err: Error,
  source: string | undefined,
  options: FormatOptions
): string {
  if (err instanceof ForthicError) {
    return options.format === 'json'
      ? formatJson(err, options.file)
      : formatHuman(err, source, options.file);
  }

  const message = plainMessage(err);
  if (options.format === 'json') {
    return JSON.stringify({ message, file: options.file });
  }
  return message;
}
