/**
 * Tessel Parser
 * Main entry point and re-exports
 */

import type { DocumentNode, TermNode } from '../ast-nodes.js';
import { encodeSource, lex } from '../lexer/index.js';
import { Parser } from './parser.js';
import { isAtEnd, unexpected } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';

function toBytes(source: string | Uint8Array): Uint8Array {
  return typeof source === 'string' ? encodeSource(source) : source;
}

/**
 * Parse a document.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('{ put t("Hello") at (0.1w, 0.1h) }');
 * ```
 */
export function parse(source: string | Uint8Array): DocumentNode {
  const input = toBytes(source);
  return new Parser(input, lex(input)).parse();
}

/** Parse input that must consist of exactly one term */
export function parseTerm(source: string | Uint8Array): TermNode {
  const input = toBytes(source);
  const parser = new Parser(input, lex(input));
  const term = parser.parseTerm();
  if (!isAtEnd(parser.state)) {
    throw unexpected(parser.state, 'end of input');
  }
  return term;
}

export { Parser } from './parser.js';
