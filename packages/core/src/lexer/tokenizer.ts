/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation, Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import {
  isStartMemo,
  isTripleQuote,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  resolveTokenizerOptions,
  type ResolvedTokenizerOptions,
  type TokenizerOptions,
} from './options.js';
import {
  readComment,
  readDefinitionName,
  readMemoName,
  readModuleName,
  readTripleQuoteString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
} from './state.js';

export type CharacterSets = Pick<
  ResolvedTokenizerOptions,
  'whitespace' | 'quoteChars'
>;

/**
 * Scan from the cursor and return exactly one token.
 *
 * Dispatch order matters: whitespace is tested first, so a character that
 * is configured as whitespace never starts a token.
 *
 * @throws UnterminatedStringError when a triple-quoted string never closes
 */
export function nextToken(state: LexerState, sets: CharacterSets): Token {
  const { whitespace, quoteChars } = sets;

  while (!isAtEnd(state)) {
    const start = currentLocation(state);
    const ch = advance(state);
    const consumedAt = state.pos - 1;

    if (isWhitespace(whitespace, ch)) {
      continue;
    }

    if (ch === '#') {
      return readComment(state, start);
    }

    if (ch === ':') {
      return readDefinitionName(state, start, whitespace);
    }

    if (isStartMemo(state.source, consumedAt)) {
      advance(state); // consume ':' of '@:'
      return readMemoName(state, start, whitespace);
    }

    switch (ch) {
      case ';':
        return makeToken(
          TOKEN_KINDS.END_DEFINITION,
          ch,
          start,
          currentLocation(state)
        );
      case '[':
        return makeToken(
          TOKEN_KINDS.START_ARRAY,
          ch,
          start,
          currentLocation(state)
        );
      case ']':
        return makeToken(
          TOKEN_KINDS.END_ARRAY,
          ch,
          start,
          currentLocation(state)
        );
      case '{':
        return readModuleName(state, start, whitespace);
      case '}':
        return makeToken(
          TOKEN_KINDS.END_MODULE,
          ch,
          start,
          currentLocation(state)
        );
    }

    if (isTripleQuote(state.source, consumedAt, quoteChars)) {
      advance(state);
      advance(state);
      return readTripleQuoteString(state, ch, start);
    }

    // Anything else is not part of a token shape and is dropped
  }

  const loc = currentLocation(state);
  return makeToken(TOKEN_KINDS.END_OF_STREAM, '', loc, loc);
}

/**
 * Stateful tokenizer over one source buffer.
 *
 * Call `nextToken()` until it returns an end_of_stream token; further
 * calls keep returning end_of_stream. After an UnterminatedStringError
 * the instance should be discarded.
 *
 * @example
 * const tokenizer = new Tokenizer(': SQUARE DUP * ;');
 * tokenizer.nextToken(); // { kind: 'start_definition', text: 'SQUARE', ... }
 */
export class Tokenizer implements Iterable<Token> {
  private readonly state: LexerState;
  private readonly options: ResolvedTokenizerOptions;
  private produced = 0;

  constructor(source: string, options?: TokenizerOptions) {
    this.options = resolveTokenizerOptions(options);
    this.state = createLexerState(source);
  }

  /** Cursor offset into the source */
  get position(): number {
    return this.state.pos;
  }

  get location(): SourceLocation {
    return currentLocation(this.state);
  }

  get whitespace(): string {
    return this.options.whitespace;
  }

  get quoteChars(): string {
    return this.options.quoteChars;
  }

  nextToken(): Token {
    const { onToken, onError } = this.options.observability;
    let token: Token;
    try {
      token = nextToken(this.state, this.options);
    } catch (err) {
      if (onError && err instanceof Error) {
        onError({ error: err, location: currentLocation(this.state) });
      }
      throw err;
    }
    onToken?.({ index: this.produced, token });
    this.produced++;
    return token;
  }

  /** Yields tokens up to and including end_of_stream */
  *[Symbol.iterator](): Iterator<Token> {
    while (true) {
      const token = this.nextToken();
      yield token;
      if (token.kind === TOKEN_KINDS.END_OF_STREAM) {
        return;
      }
    }
  }
}

export interface TokenizeOptions extends TokenizerOptions {
  includeComments?: boolean | undefined;
}

/**
 * Tokenize a whole source buffer. The result always ends with an
 * end_of_stream token. Comment tokens are dropped unless
 * `includeComments` is true.
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const tokens = Array.from(new Tokenizer(source, options));

  if (options?.includeComments !== true) {
    return tokens.filter((t) => t.kind !== TOKEN_KINDS.COMMENT);
  }

  return tokens;
}
