/**
 * CLI Error Explanation
 * Renders the full documentation of a diagnostic for --explain
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from './error-registry.js';

/**
 * Render the registry entry for an error ID.
 *
 * @param errorId - Error identifier (format: C89-L{3-digit})
 * @returns Formatted documentation, or null if the ID is malformed or unknown
 *
 * @example
 * explainError('C89-L001')
 * // C89-L001: Unterminated block comment
 * //
 * // Severity: fatal
 * // ...
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];
  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');
  sections.push(`Severity: ${definition.severity}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
