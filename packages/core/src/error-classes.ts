/**
 * Forthic Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ForthicErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Forthic tooling errors.
 * Provides structured data for host applications to format as needed.
 */
export class ForthicError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ForthicErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ForthicError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ForthicErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ForthicErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors. Always carry the location where scanning stopped. */
export class LexerError extends ForthicError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/**
 * A triple-quoted string reached end of input without its closing delimiter.
 *
 * `location` is where the cursor stopped (end of input); `start` is where
 * the opening delimiter began.
 */
export class UnterminatedStringError extends LexerError {
  readonly quoteChar: string;
  readonly start: SourceLocation;

  constructor(quoteChar: string, start: SourceLocation, end: SourceLocation) {
    const delimiter = quoteChar.repeat(3);
    super(
      'FORTHIC-L001',
      renderMessage(
        lookupDefinition('FORTHIC-L001').messageTemplate,
        { delimiter }
      ),
      end,
      { delimiter, startLine: start.line, startColumn: start.column }
    );
    this.name = 'UnterminatedStringError';
    this.quoteChar = quoteChar;
    this.start = start;
  }

  /** Cursor offset at the time of failure */
  get position(): number {
    return this.location.offset;
  }
}

/** Invalid tokenizer options or configuration files */
export class ConfigError extends ForthicError {
  constructor(errorId: string, context: Record<string, unknown>) {
    const definition = lookupDefinition(errorId, 'config');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 * Lexer IDs produce a LexerError (location required), config IDs a
 * ConfigError.
 *
 * @throws TypeError if errorId is not registered, or a lexer ID is given
 * without a location
 *
 * @example
 * createError('FORTHIC-C001', { reason: 'whitespace must be a string' })
 * // ConfigError: "Invalid tokenizer options: whitespace must be a string"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): ForthicError {
  const definition = lookupDefinition(errorId);

  if (definition.category === 'config') {
    return new ConfigError(errorId, context);
  }

  if (!location) {
    throw new TypeError(`Lexer error ${errorId} requires a location`);
  }
  return new LexerError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    location,
    context
  );
}
