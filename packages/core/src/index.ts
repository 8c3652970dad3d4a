/**
 * Forthic Tokenizer
 * Exports the lexer, token model, and error taxonomy
 */

export {
  type CharacterSets,
  createLexerState,
  currentLocation,
  DEFAULT_QUOTE_CHARS,
  DEFAULT_WHITESPACE,
  isStartMemo,
  isTripleQuote,
  type LexerState,
  matchesAt,
  nextToken,
  resolveTokenizerOptions,
  type ResolvedTokenizerOptions,
  type TokenEvent,
  tokenize,
  Tokenizer,
  type TokenizeOptions,
  type TokenizerCallbacks,
  type TokenizerErrorEvent,
  type TokenizerOptions,
  unread,
} from './lexer/index.js';

export * from './types.js';
