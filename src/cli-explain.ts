/**
 * CLI Error Explanation
 * Renders registry documentation for `tessel --explain TSL-xxxx`
 */

import {
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

/** The letter after `TSL-` names the stage that raises the error */
const STAGES: Record<ErrorCategory, string> = {
  lexer: 'lexing',
  parse: 'parsing',
  runtime: 'evaluation',
};

const ERROR_ID = /^TSL-[LPR]\d{3}$/;
const PLACEHOLDER = /\{\w+\}/g;

type Section = readonly [heading: string, body: string | undefined];

/** Template shown only when it says more than its placeholders */
function messageShape(template: string): string | undefined {
  return template.replace(PLACEHOLDER, '').trim() === '' ? undefined : template;
}

function sectionsOf(definition: ErrorDefinition): Section[] {
  return [
    ['Message', messageShape(definition.messageTemplate)],
    ['Cause', definition.cause],
    ['Resolution', definition.resolution],
  ];
}

/**
 * Documentation for an error id, or null when the id is malformed or
 * unknown.
 *
 * @example
 * explainError('TSL-R003')
 * // TSL-R003 (evaluation): Unresolved name
 * //
 * // Message:
 * //   '{name}' is not defined.
 * // ...
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID.test(errorId)) return null;
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) return null;

  const lines = [
    `${definition.errorId} (${STAGES[definition.category]}): ${definition.description}`,
  ];
  for (const [heading, body] of sectionsOf(definition)) {
    if (body === undefined) continue;
    lines.push('', `${heading}:`, `  ${body}`);
  }
  if (definition.example !== undefined) {
    lines.push('', 'Example:');
    lines.push(...definition.example.split('\n').map((line) => `    ${line}`));
  }
  return lines.join('\n');
}
