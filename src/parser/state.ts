/**
 * Parser State
 * Token cursor and error construction
 */

import type { SourceRange } from '../source-location.js';
import { ParseError } from '../error-classes.js';
import {
  TOKEN_DESCRIPTIONS,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from '../token-types.js';

const decoder = new TextDecoder('utf-8');

export interface ParserState {
  /** Source bytes the token ranges index into */
  readonly input: Uint8Array;
  readonly tokens: readonly Token[];
  pos: number;
}

export function createParserState(
  input: Uint8Array,
  tokens: readonly Token[]
): ParserState {
  return { input, tokens, pos: 0 };
}

// ============================================================
// CURSOR
// ============================================================

export function isAtEnd(state: ParserState): boolean {
  return state.pos >= state.tokens.length;
}

export function current(state: ParserState): Token | undefined {
  return state.tokens[state.pos];
}

export function check(state: ParserState, ...types: TokenType[]): boolean {
  const token = current(state);
  return token !== undefined && types.includes(token.type);
}

/** Consume the current token; `expected` describes it if input ran out */
export function advance(state: ParserState, expected: string): Token {
  const token = current(state);
  if (token === undefined) throw unexpected(state, expected);
  state.pos++;
  return token;
}

/** Consume a token of the given type, or fail */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string = TOKEN_DESCRIPTIONS[type]
): Token {
  const token = current(state);
  if (token === undefined || token.type !== type) {
    throw unexpected(state, expected);
  }
  state.pos++;
  return token;
}

export function textOf(state: ParserState, range: SourceRange): string {
  return decoder.decode(state.input.subarray(range.start, range.end));
}

export function makeSpan(start: SourceRange, end: SourceRange): SourceRange {
  return { start: start.start, end: end.end };
}

// ============================================================
// ERRORS
// ============================================================

function describeToken(state: ParserState, token: Token): string {
  const description = TOKEN_DESCRIPTIONS[token.type];
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.NUMBER:
      return `${description} '${textOf(state, token)}'`;
    default:
      return description;
  }
}

/** Error for the current token not matching what the grammar expects */
export function unexpected(state: ParserState, expected: string): ParseError {
  const token = current(state);
  if (token === undefined) {
    const end = state.input.length;
    return new ParseError(
      'TSL-P002',
      `Unexpected end of input, expected ${expected}.`,
      { start: end, end },
      { expected }
    );
  }
  const found = describeToken(state, token);
  return new ParseError(
    'TSL-P001',
    `Unexpected ${found}, expected ${expected}.`,
    { start: token.start, end: token.end },
    { found, expected }
  );
}
