/**
 * Lexer State
 * Cursor over an immutable source buffer
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Offset of the next character to read; 0 <= pos <= source.length */
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Consume one character. At end of input returns '' and stays put. */
export function advance(state: LexerState): string {
  if (isAtEnd(state)) {
    return '';
  }
  const ch = state.source.charAt(state.pos);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/**
 * Step the cursor back over the character just consumed.
 * @throws TypeError at the start of input
 */
export function unread(state: LexerState): void {
  if (state.pos === 0) {
    throw new TypeError('Cannot unread at start of input');
  }
  state.pos--;
  if (state.source.charAt(state.pos) === '\n') {
    state.line--;
    const prevNewline =
      state.pos > 0 ? state.source.lastIndexOf('\n', state.pos - 1) : -1;
    state.column = state.pos - prevNewline;
  } else {
    state.column--;
  }
}
