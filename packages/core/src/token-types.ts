import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN KINDS
// ============================================================

/**
 * Closed set of token kinds.
 * Values are stable names a parser can dispatch on.
 */
export const TOKEN_KINDS = {
  COMMENT: 'comment', // # ... (text always empty)
  START_DEFINITION: 'start_definition', // :NAME
  START_MEMO: 'start_memo', // @:NAME
  END_DEFINITION: 'end_definition', // ;
  START_ARRAY: 'start_array', // [
  END_ARRAY: 'end_array', // ]
  START_MODULE: 'start_module', // {name
  END_MODULE: 'end_module', // }
  STRING: 'string', // """...""" or '''...'''
  END_OF_STREAM: 'end_of_stream',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export interface Token {
  readonly kind: TokenKind;
  /** Owned copy of the scanned text (may be empty) */
  readonly text: string;
  readonly span: SourceSpan;
}

