/**
 * Tokenizer
 * Drives the state machine over the whole input
 */

import type { Token } from '../token-types.js';
import {
  lexBase,
  lexColor,
  lexComment,
  lexIdent,
  lexNumber,
  lexRawString,
  lexSpace,
  lexString,
} from './readers.js';
import {
  LEXER_STATES,
  createLexerState,
  type LexerStateName,
  type StepFn,
} from './state.js';

const STEPS: Record<Exclude<LexerStateName, 'Done'>, StepFn> = {
  Base: lexBase,
  Space: lexSpace,
  InIdent: lexIdent,
  InNumber: lexNumber,
  InString: lexString,
  InRawString: lexRawString,
  InColor: lexColor,
  InComment: lexComment,
};

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/**
 * Lex UTF-8 source bytes into tokens.
 * @throws LexerError at the first byte that cannot be lexed
 */
export function lex(input: Uint8Array): Token[] {
  const state = createLexerState(input);

  while (state.state !== LEXER_STATES.DONE) {
    const transition = STEPS[state.state](input, state.pos);
    for (const token of transition.tokens) {
      state.tokens.push(token);
    }
    state.pos = transition.pos;
    state.state = transition.state;
  }

  return state.tokens;
}

/** Encode source text as the bytes that token ranges index into */
export function encodeSource(source: string): Uint8Array {
  return encoder.encode(source);
}

/** Lex source text */
export function tokenize(source: string): Token[] {
  return lex(encodeSource(source));
}

/** Source text covered by a token */
export function tokenText(input: Uint8Array, token: Token): string {
  return decoder.decode(input.subarray(token.start, token.end));
}
