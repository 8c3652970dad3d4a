/**
 * CLI Error Explanation
 * Renders full error documentation for --explain
 */

import { ERROR_REGISTRY } from 'forthic-tokenizer';

/**
 * Render the registry entry for an error ID.
 *
 * @returns Formatted documentation, or null if the ID is malformed or unknown
 *
 * @example
 * explainError('FORTHIC-L001')
 * // 'FORTHIC-L001: Unterminated string literal\n\nCause:\n  ...'
 */
export function explainError(errorId: string): string | null {
  if (!/^FORTHIC-[LC]\d{3}$/.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    '',
  ];

  if (definition.cause) {
    sections.push('Cause:', `  ${definition.cause}`, '');
  }

  if (definition.resolution) {
    sections.push('Resolution:', `  ${definition.resolution}`, '');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`, '');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
