/**
 * Error Documentation
 * Renders registry entries for `--explain TAPE-XXXX`
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from '@tapewright/core';

/**
 * Render documentation for an error ID.
 * Returns null when the ID is malformed; a well-formed ID that is not
 * registered renders a one-line notice.
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return `${errorId}: no such error`;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.name}`,
    section('Description', definition.description),
  ];

  if (definition.cause) {
    sections.push(section('Cause', definition.cause));
  }
  if (definition.resolution) {
    sections.push(section('Resolution', definition.resolution));
  }
  if (definition.examples && definition.examples.length > 0) {
    const examples = definition.examples.map(
      (example) => `  ${example.description}:\n${indent(example.code, 4)}`
    );
    sections.push(`Examples:\n${examples.join('\n\n')}`);
  }

  return sections.join('\n\n');
}

function section(title: string, body: string): string {
  return `${title}:\n${indent(body, 2)}`;
}

function indent(text: string, width: number): string {
  const pad = ' '.repeat(width);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}
