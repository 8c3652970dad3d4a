/**
 * Forthic Tokenizer Types
 * Source locations, tokens, and the error taxonomy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_KINDS, type Token, type TokenKind } from './token-types.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ConfigError,
  createError,
  ForthicError,
  type ForthicErrorData,
  LexerError,
  UnterminatedStringError,
} from './error-classes.js';
