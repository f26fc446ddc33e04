/**
 * Parser Helpers
 * Operator tables for the precedence chain
 * @internal
 */

import type { BinaryOp } from '../ast-nodes.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';

/** @internal */
export const ADJOIN_OPERATORS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.TILDE, '~'],
]);

/** @internal */
export const ADDITIVE_OPERATORS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.PLUS, '+'],
  [TOKEN_TYPES.MINUS, '-'],
]);

/** @internal */
export const MULTIPLICATIVE_OPERATORS: ReadonlyMap<TokenType, BinaryOp> =
  new Map([
    [TOKEN_TYPES.STAR, '*'],
    [TOKEN_TYPES.SLASH, '/'],
  ]);
