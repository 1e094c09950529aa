/**
 * CLI Error Explanation
 * Renders registry documentation for `tern --explain <id>`
 */

import { ERROR_REGISTRY } from './error-registry.js';

const ERROR_ID_PATTERN = /^TERN-[LPRI]\d{3}$/;

function pushSection(sections: string[], title: string, body: string): void {
  sections.push(`${title}:`, `  ${body}`, '');
}

/**
 * Render documentation for an error id.
 *
 * @returns Formatted text, or null when the id is malformed or unknown
 *
 * @example
 * explainError('TERN-P002')
 * // 'TERN-P002: Unclosed grouping\n\nCause:\n  ...'
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (definition === undefined) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    '',
    `Message: ${definition.messageTemplate}`,
    '',
  ];

  if (definition.cause !== undefined) {
    pushSection(sections, 'Cause', definition.cause);
  }
  if (definition.resolution !== undefined) {
    pushSection(sections, 'Resolution', definition.resolution);
  }

  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    sections.push('Examples:');
    for (const example of examples) {
      sections.push(`  ${example.description}`, '');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
