/**
 * Tokenizer Options
 * Character sets and observability callbacks
 */

import { ConfigError } from '../types.js';
import type { SourceLocation, Token } from '../types.js';

/** Separators skipped at top level; parentheses make `( a -- b )` inert */
export const DEFAULT_WHITESPACE = ' \t\n\r()';

/** Characters that open a string literal when tripled */
export const DEFAULT_QUOTE_CHARS = `"'`;

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted after each token is produced */
export interface TokenEvent {
  /** Token index (0-based) */
  readonly index: number;
  readonly token: Token;
}

/** Event emitted before a tokenizer failure propagates */
export interface TokenizerErrorEvent {
  readonly error: Error;
  /** Cursor location when scanning stopped */
  readonly location: SourceLocation;
}

export interface TokenizerCallbacks {
  onToken?: (event: TokenEvent) => void;
  onError?: (event: TokenizerErrorEvent) => void;
}

// ============================================================
// OPTIONS
// ============================================================

export interface TokenizerOptions {
  whitespace?: string | undefined;
  quoteChars?: string | undefined;
  observability?: TokenizerCallbacks | undefined;
}

export interface ResolvedTokenizerOptions {
  readonly whitespace: string;
  readonly quoteChars: string;
  readonly observability: TokenizerCallbacks;
}

/**
 * Fill defaults and validate tokenizer options.
 *
 * @throws ConfigError (FORTHIC-C001) when a character set is not a string
 * or a character is both whitespace and a quote character
 */
export function resolveTokenizerOptions(
  options?: TokenizerOptions
): ResolvedTokenizerOptions {
  const whitespace: unknown = options?.whitespace ?? DEFAULT_WHITESPACE;
  const quoteChars: unknown = options?.quoteChars ?? DEFAULT_QUOTE_CHARS;

  if (typeof whitespace !== 'string') {
    throw new ConfigError('FORTHIC-C001', {
      reason: 'whitespace must be a string',
    });
  }
  if (typeof quoteChars !== 'string') {
    throw new ConfigError('FORTHIC-C001', {
      reason: 'quoteChars must be a string',
    });
  }

  for (const ch of quoteChars) {
    if (whitespace.includes(ch)) {
      throw new ConfigError('FORTHIC-C001', {
        reason: `${JSON.stringify(ch)} is both whitespace and a quote character`,
      });
    }
  }

  return {
    whitespace,
    quoteChars,
    observability: options?.observability ?? {},
  };
}
