/**
 * Token Readers
 * Sub-scanners entered from the top-level loop once the introducing
 * character has been consumed
 */

import type { SourceLocation, Token, TokenKind } from '../types.js';
import { TOKEN_KINDS, UnterminatedStringError } from '../types.js';
import { isWhitespace, makeToken, matchesAt } from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  unread,
} from './state.js';

/**
 * Skip to end of line. The newline is consumed; comment text is not kept.
 */
export function readComment(state: LexerState, start: SourceLocation): Token {
  while (!isAtEnd(state)) {
    if (advance(state) === '\n') {
      break;
    }
  }
  return makeToken(TOKEN_KINDS.COMMENT, '', start, currentLocation(state));
}

/**
 * Skip whitespace after the introducing `:` or `@:`, then gather a name up
 * to the next whitespace character, which is consumed.
 */
function readName(
  state: LexerState,
  kind: TokenKind,
  start: SourceLocation,
  whitespace: string
): Token {
  while (!isAtEnd(state) && isWhitespace(whitespace, peek(state))) {
    advance(state);
  }

  let value = '';
  while (!isAtEnd(state)) {
    const ch = advance(state);
    if (isWhitespace(whitespace, ch)) {
      break;
    }
    value += ch;
  }
  return makeToken(kind, value, start, currentLocation(state));
}

export function readDefinitionName(
  state: LexerState,
  start: SourceLocation,
  whitespace: string
): Token {
  return readName(state, TOKEN_KINDS.START_DEFINITION, start, whitespace);
}

export function readMemoName(
  state: LexerState,
  start: SourceLocation,
  whitespace: string
): Token {
  return readName(state, TOKEN_KINDS.START_MEMO, start, whitespace);
}

/**
 * Gather a module name. Stops at whitespace (consumed) or `}`, which is
 * pushed back so the next call yields its end_module token.
 */
export function readModuleName(
  state: LexerState,
  start: SourceLocation,
  whitespace: string
): Token {
  let value = '';
  while (!isAtEnd(state)) {
    const ch = advance(state);
    if (isWhitespace(whitespace, ch)) {
      break;
    }
    if (ch === '}') {
      unread(state);
      break;
    }
    value += ch;
  }
  return makeToken(
    TOKEN_KINDS.START_MODULE,
    value,
    start,
    currentLocation(state)
  );
}

/**
 * Read string content after an opening triple quote. Only three copies of
 * `quoteChar` close it; the other quote character and shorter runs are
 * content.
 *
 * @throws UnterminatedStringError if input ends first
 */
export function readTripleQuoteString(
  state: LexerState,
  quoteChar: string,
  start: SourceLocation
): Token {
  const delimiter = quoteChar.repeat(3);
  let value = '';

  while (!isAtEnd(state)) {
    if (
      peek(state) === quoteChar &&
      matchesAt(state.source, state.pos, delimiter)
    ) {
      advance(state);
      advance(state);
      advance(state);
      return makeToken(
        TOKEN_KINDS.STRING,
        value,
        start,
        currentLocation(state)
      );
    }
    value += advance(state);
  }

  throw new UnterminatedStringError(quoteChar, start, currentLocation(state));
}
