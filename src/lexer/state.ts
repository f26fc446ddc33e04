/**
 * Lexer State
 * Explicit state tags and the transitions between them
 */

import type { Token } from '../token-types.js';

export const LEXER_STATES = {
  BASE: 'Base',
  SPACE: 'Space',
  IN_IDENT: 'InIdent',
  IN_NUMBER: 'InNumber',
  IN_STRING: 'InString',
  IN_RAW_STRING: 'InRawString',
  IN_COLOR: 'InColor',
  IN_COMMENT: 'InComment',
  DONE: 'Done',
} as const;

export type LexerStateName = (typeof LEXER_STATES)[keyof typeof LEXER_STATES];

/** Result of running one state until it hands over to the next */
export interface Transition {
  readonly state: LexerStateName;
  /** Byte at which the next state starts */
  readonly pos: number;
  /** Tokens emitted while in the previous state */
  readonly tokens: readonly Token[];
}

/** A state step: pure function of the input and the start of the state */
export type StepFn = (input: Uint8Array, start: number) => Transition;

export interface LexerState {
  readonly input: Uint8Array;
  state: LexerStateName;
  pos: number;
  readonly tokens: Token[];
}

export function createLexerState(input: Uint8Array): LexerState {
  return {
    input,
    state: LEXER_STATES.BASE,
    pos: 0,
    tokens: [],
  };
}

export function changeState(
  pos: number,
  state: LexerStateName,
  tokens: readonly Token[] = []
): Transition {
  return { state, pos, tokens };
}

export function doneAtEndOfInput(
  input: Uint8Array,
  tokens: readonly Token[] = []
): Transition {
  return { state: LEXER_STATES.DONE, pos: input.length, tokens };
}
