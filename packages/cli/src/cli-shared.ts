/**
 * CLI Shared Utilities
 * Token formatting and version lookup
 */

import * as fs from 'node:fs';
import type { Token } from 'forthic-tokenizer';

/**
 * Format one token as a line: location, kind, JSON-quoted text.
 *
 * @example
 * formatToken(token)
 * // '1:1      start_definition "SQUARE"'
 */
export function formatToken(token: Token): string {
  const { line, column } = token.span.start;
  const position = `${line}:${column}`;
  return `${position.padEnd(8)} ${token.kind.padEnd(16)} ${JSON.stringify(token.text)}`;
}

export function formatTokens(
  tokens: readonly Token[],
  format: 'human' | 'json'
): string {
  if (format === 'json') {
    return JSON.stringify(tokens, null, 2);
  }
  return tokens.map(formatToken).join('\n');
}

/** Package version from package.json */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}
