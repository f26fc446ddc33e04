/**
 * Token Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Punctuation emitted as a single-byte token straight from the base state */
export const SINGLE_BYTE_TOKENS: ReadonlyMap<number, TokenType> = new Map(
  Object.entries({
    ',': TOKEN_TYPES.COMMA,
    '.': TOKEN_TYPES.DOT,
    '=': TOKEN_TYPES.EQUALS,
    '^': TOKEN_TYPES.HAT,
    '-': TOKEN_TYPES.MINUS,
    '+': TOKEN_TYPES.PLUS,
    '/': TOKEN_TYPES.SLASH,
    '*': TOKEN_TYPES.STAR,
    '~': TOKEN_TYPES.TILDE,
    '(': TOKEN_TYPES.LPAREN,
    ')': TOKEN_TYPES.RPAREN,
    '{': TOKEN_TYPES.LBRACE,
    '}': TOKEN_TYPES.RBRACE,
  }).map(([ch, type]) => [ch.charCodeAt(0), type] as const)
);

/** Keyword lookup table */
export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  at: TOKEN_TYPES.KW_AT,
  function: TOKEN_TYPES.KW_FUNCTION,
  import: TOKEN_TYPES.KW_IMPORT,
  put: TOKEN_TYPES.KW_PUT,
  return: TOKEN_TYPES.KW_RETURN,
};

/** Unit suffixes recognized directly after a number, longest first */
export const UNIT_SUFFIXES: readonly { suffix: string; type: TokenType }[] = [
  { suffix: 'em', type: TOKEN_TYPES.UNIT_EM },
  { suffix: 'pt', type: TOKEN_TYPES.UNIT_PT },
  { suffix: 'h', type: TOKEN_TYPES.UNIT_H },
  { suffix: 'w', type: TOKEN_TYPES.UNIT_W },
];
