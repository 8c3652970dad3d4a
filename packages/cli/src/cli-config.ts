/**
 * Configuration Loader for forthic-tokens
 * Loads and validates .forthic-tokens.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError, resolveTokenizerOptions } from 'forthic-tokenizer';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.forthic-tokens.yaml';

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'whitespace',
  'quoteChars',
  'includeComments',
]);

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  readonly whitespace?: string | undefined;
  readonly quoteChars?: string | undefined;
  readonly includeComments?: boolean | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(
  data: Record<string, unknown>,
  key: string,
  path: string
): string | undefined {
  const value = data[key];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new ConfigError('FORTHIC-C002', {
    path,
    reason: `${key} must be a string`,
  });
}

/**
 * Validate parsed YAML and narrow it to CliConfig.
 * An empty document is an empty configuration.
 */
function validateConfig(data: unknown, path: string): CliConfig {
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw new ConfigError('FORTHIC-C002', {
      path,
      reason: 'must be a mapping',
    });
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError('FORTHIC-C002', {
        path,
        reason: `unknown key ${key}`,
      });
    }
  }

  const includeComments = data['includeComments'];
  if (includeComments !== undefined && typeof includeComments !== 'boolean') {
    throw new ConfigError('FORTHIC-C002', {
      path,
      reason: 'includeComments must be true or false',
    });
  }

  return {
    whitespace: optionalString(data, 'whitespace', path),
    quoteChars: optionalString(data, 'quoteChars', path),
    includeComments,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .forthic-tokens.yaml in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns CliConfig, or null if the file does not exist
 * @throws ConfigError FORTHIC-C003 if the file cannot be read
 * @throws ConfigError FORTHIC-C002 if the YAML or its values are invalid
 * @throws ConfigError FORTHIC-C001 if the character sets overlap
 */
export function loadConfig(cwd: string): CliConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError('FORTHIC-C003', {
      path: configPath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new ConfigError('FORTHIC-C002', {
      path: configPath,
      reason: `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    });
  }

  const config = validateConfig(parsed, configPath);
  resolveTokenizerOptions(config);
  return config;
}
