/**
 * Lexer Helper Functions
 * Character classification, bounded lookahead, and token construction
 */

import type { SourceLocation, Token, TokenKind } from '../types.js';

export function isWhitespace(whitespace: string, ch: string): boolean {
  return ch !== '' && whitespace.includes(ch);
}

export function isQuote(quoteChars: string, ch: string): boolean {
  return ch !== '' && quoteChars.includes(ch);
}

/**
 * True when `text` occurs in `source` starting at `offset`.
 * Reads nothing outside the buffer.
 */
export function matchesAt(
  source: string,
  offset: number,
  text: string
): boolean {
  if (offset < 0 || offset + text.length > source.length) {
    return false;
  }
  return source.startsWith(text, offset);
}

/** Three copies of the same quote character start at `offset` */
export function isTripleQuote(
  source: string,
  offset: number,
  quoteChars: string
): boolean {
  const ch = source.charAt(offset);
  if (!isQuote(quoteChars, ch)) {
    return false;
  }
  return matchesAt(source, offset, ch.repeat(3));
}

export function isStartMemo(source: string, offset: number): boolean {
  return matchesAt(source, offset, '@:');
}

export function makeToken(
  kind: TokenKind,
  text: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { kind, text, span: { start, end } };
}
