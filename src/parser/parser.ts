/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 *
 * Methods are organized across files:
 * - parser-script.ts: Document, statements, blocks
 * - parser-expr.ts: Terms and the operator precedence chain
 * - parser-literals.ts: Literals, identifier paths, function literals
 */

import type { DocumentNode } from '../ast-nodes.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that turns tokens into an AST.
 *
 * @example
 * ```typescript
 * const parser = new Parser(input, lex(input));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(input: Uint8Array, tokens: readonly Token[]) {
    this.state = createParserState(input, tokens);
  }

  /** Parse the tokens as a complete document */
  parse(): DocumentNode {
    return this.parseDocument();
  }
}
