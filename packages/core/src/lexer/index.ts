/**
 * Lexer Module
 * Converts Forthic source text into tokens
 */

export {
  createLexerState,
  currentLocation,
  type LexerState,
  unread,
} from './state.js';
export { isStartMemo, isTripleQuote, matchesAt } from './helpers.js';
export {
  DEFAULT_QUOTE_CHARS,
  DEFAULT_WHITESPACE,
  resolveTokenizerOptions,
  type ResolvedTokenizerOptions,
  type TokenEvent,
  type TokenizerCallbacks,
  type TokenizerErrorEvent,
  type TokenizerOptions,
} from './options.js';
export {
  type CharacterSets,
  nextToken,
  tokenize,
  Tokenizer,
  type TokenizeOptions,
} from './tokenizer.js';
