/**
 * Error Registry
 * Central error definitions with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix (L = lexer, C = config) */
export type ErrorCategory = 'lexer' | 'config';

/**
 * Example demonstrating an error condition.
 * Used by `forthic-tokens --explain`.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Registry entry holding all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: FORTHIC-{category}{3-digit} (e.g., FORTHIC-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Read-only registry of error definitions with O(1) lookup.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (FORTHIC-L0xx)
  {
    errorId: 'FORTHIC-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate:
      'Unterminated string literal: no closing {delimiter} before end of input',
    cause:
      'A triple-quoted string was opened but the input ended before three matching quote characters closed it.',
    resolution:
      'Close the string with the same quote character it was opened with, repeated three times. A string opened with """ is not closed by \'\'\'.',
    examples: [
      {
        description: 'Missing closing delimiter',
        code: '"""hello',
      },
      {
        description: 'Closed with the other quote character',
        code: "\"\"\"hello'''",
      },
    ],
  },

  // Configuration Errors (FORTHIC-C0xx)
  {
    errorId: 'FORTHIC-C001',
    category: 'config',
    description: 'Invalid tokenizer options',
    messageTemplate: 'Invalid tokenizer options: {reason}',
    cause:
      'The whitespace or quote character set is not a string, or a character appears in both sets.',
    resolution:
      'Pass strings for whitespace and quoteChars and keep the two sets disjoint.',
  },
  {
    errorId: 'FORTHIC-C002',
    category: 'config',
    description: 'Invalid configuration file',
    messageTemplate: 'Invalid configuration in {path}: {reason}',
    cause:
      'The configuration file is not valid YAML, is not a mapping, or holds a key with the wrong type.',
    resolution:
      'Use a YAML mapping with optional string keys whitespace and quoteChars and an optional boolean includeComments.',
    examples: [
      {
        description: 'Quote characters given as a number',
        code: 'quoteChars: 3',
      },
    ],
  },
  {
    errorId: 'FORTHIC-C003',
    category: 'config',
    description: 'Configuration file unreadable',
    messageTemplate: 'Cannot read configuration file {path}: {reason}',
    cause: 'The configuration file exists but could not be read.',
    resolution: 'Check the file permissions.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `{name}` placeholders with values from context.
 * Missing values render as the empty string; others go through String().
 *
 * @example
 * renderMessage('Invalid tokenizer options: {reason}', { reason: 'x' })
 * // 'Invalid tokenizer options: x'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}
