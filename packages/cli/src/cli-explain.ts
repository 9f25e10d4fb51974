/**
 * CLI Explain
 * Render registry documentation for `--explain <errorId>`
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from 'eightfold';

/**
 * Render documentation for an error ID.
 *
 * @returns Documentation text, or null when the ID is malformed or unknown
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const lines: string[] = [`${definition.errorId}: ${definition.description}`];

  if (definition.cause) {
    lines.push('', 'Cause:', `  ${definition.cause}`);
  }

  if (definition.resolution) {
    lines.push('', 'Resolution:', `  ${definition.resolution}`);
  }

  if (definition.examples && definition.examples.length > 0) {
    lines.push('', 'Examples:');
    for (const example of definition.examples) {
      lines.push(`  ${example.description}:`, `    ${example.code}`);
    }
  }

  return lines.join('\n');
}
