/**
 * State Readers
 * One step function per lexer state. Each runs until it hands over to the
 * next state and returns the tokens it emitted.
 */

import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError, makeEncodingError, makeUnexpectedByteError } from './errors.js';
import {
  byteAt,
  describeByte,
  hasAt,
  isDigit,
  isHexadecimal,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { KEYWORDS, SINGLE_BYTE_TOKENS, UNIT_SUFFIXES } from './operators.js';
import {
  LEXER_STATES,
  changeState,
  doneAtEndOfInput,
  type Transition,
} from './state.js';

const NEWLINE = 0x0a;
const SPACE = 0x20;
const QUOTE = 0x22;
const HASH = 0x23;
const MINUS = 0x2d;
const SLASH = 0x2f;
const BACKSLASH = 0x5c;

/** Bytes that can only start an encoding problem */
const ENCODING_BYTES: ReadonlySet<number> = new Set([0xef, 0xfe, 0xff, 0x00]);

// ============================================================
// BASE
// ============================================================

export function lexBase(input: Uint8Array, start: number): Transition {
  const tokens: Token[] = [];

  for (let i = start; i < input.length; i++) {
    const byte = byteAt(input, i);

    if (byte === MINUS && hasAt(input, i, '---')) {
      return changeState(i, LEXER_STATES.IN_RAW_STRING, tokens);
    }
    if (byte === SLASH && hasAt(input, i, '//')) {
      return changeState(i, LEXER_STATES.IN_COMMENT, tokens);
    }

    const single = SINGLE_BYTE_TOKENS.get(byte);
    if (single !== undefined) {
      tokens.push(makeToken(i, single, i + 1));
      continue;
    }

    if (byte === QUOTE) return changeState(i, LEXER_STATES.IN_STRING, tokens);
    if (byte === HASH) return changeState(i, LEXER_STATES.IN_COLOR, tokens);
    if (byte === SPACE || byte === NEWLINE) {
      return changeState(i, LEXER_STATES.SPACE, tokens);
    }
    if (isDigit(byte)) return changeState(i, LEXER_STATES.IN_NUMBER, tokens);
    if (isIdentifierStart(byte)) {
      return changeState(i, LEXER_STATES.IN_IDENT, tokens);
    }

    if (ENCODING_BYTES.has(byte)) throw makeEncodingError(input, i);
    throw makeUnexpectedByteError(input, i);
  }

  return doneAtEndOfInput(input, tokens);
}

// ============================================================
// WHITESPACE AND COMMENTS
// ============================================================

export function lexSpace(input: Uint8Array, start: number): Transition {
  for (let i = start; i < input.length; i++) {
    const byte = byteAt(input, i);
    if (byte === SPACE || byte === NEWLINE) continue;
    // Tabs and carriage returns are errors, not the end of the run.
    if (byte === 0x09 || byte === 0x0d) throw makeUnexpectedByteError(input, i);
    return changeState(i, LEXER_STATES.BASE);
  }
  return doneAtEndOfInput(input);
}

export function lexComment(input: Uint8Array, start: number): Transition {
  const newline = input.indexOf(NEWLINE, start);
  if (newline === -1) return doneAtEndOfInput(input);
  return changeState(newline + 1, LEXER_STATES.SPACE);
}

// ============================================================
// IDENTIFIERS AND NUMBERS
// ============================================================

export function lexIdent(input: Uint8Array, start: number): Transition {
  let end = start + 1;
  while (end < input.length && isIdentifierChar(byteAt(input, end))) {
    end++;
  }

  const text = String.fromCharCode(...input.subarray(start, end));
  const type = Object.hasOwn(KEYWORDS, text)
    ? (KEYWORDS[text] ?? TOKEN_TYPES.IDENTIFIER)
    : TOKEN_TYPES.IDENTIFIER;
  const token = makeToken(start, type, end);

  if (end === input.length) return doneAtEndOfInput(input, [token]);
  return changeState(end, LEXER_STATES.BASE, [token]);
}

export function lexNumber(input: Uint8Array, start: number): Transition {
  let periodSeen = false;

  for (let i = start + 1; i < input.length; i++) {
    const byte = byteAt(input, i);
    if (isDigit(byte)) continue;
    if (byte === 0x2e && !periodSeen) {
      periodSeen = true;
      continue;
    }

    const number = makeToken(start, TOKEN_TYPES.NUMBER, i);
    const unit = UNIT_SUFFIXES.find(({ suffix }) => hasAt(input, i, suffix));
    if (unit !== undefined) {
      const end = i + unit.suffix.length;
      return changeState(end, LEXER_STATES.BASE, [
        number,
        makeToken(i, unit.type, end),
      ]);
    }
    return changeState(i, LEXER_STATES.BASE, [number]);
  }

  return doneAtEndOfInput(input, [
    makeToken(start, TOKEN_TYPES.NUMBER, input.length),
  ]);
}

// ============================================================
// LITERALS
// ============================================================

export function lexString(input: Uint8Array, start: number): Transition {
  for (let i = start + 1; i < input.length; i++) {
    const byte = byteAt(input, i);
    if (byte === BACKSLASH) {
      // Whatever follows is kept; the parser validates escapes.
      i++;
      continue;
    }
    if (byte === QUOTE) {
      return changeState(i + 1, LEXER_STATES.BASE, [
        makeToken(start, TOKEN_TYPES.STRING, i + 1),
      ]);
    }
  }

  throw new LexerError(
    'TSL-L001',
    'String was not closed with \'"\' before end of input.',
    { start, end: start + 1 }
  );
}

export function lexRawString(input: Uint8Array, start: number): Transition {
  for (let i = start + 3; i < input.length; i++) {
    if (hasAt(input, i, '---')) {
      return changeState(i + 3, LEXER_STATES.BASE, [
        makeToken(start, TOKEN_TYPES.RAW_STRING, i + 3),
      ]);
    }
  }

  throw new LexerError(
    'TSL-L002',
    "Raw string was not closed with '---' before end of input.",
    { start, end: start + 3 }
  );
}

export function lexColor(input: Uint8Array, start: number): Transition {
  const end = start + 7;

  for (let i = start + 1; i < end; i++) {
    const byte = byteAt(input, i);
    if (isHexadecimal(byte)) continue;
    if (byte === -1) {
      throw new LexerError(
        'TSL-L005',
        'Expected six hexadecimal digits in color, found end of input.',
        { start, end: i }
      );
    }
    throw new LexerError(
      'TSL-L005',
      `Expected six hexadecimal digits in color, found ${describeByte(byte)}.`,
      { start: i, end: i + 1 }
    );
  }

  const token = makeToken(start, TOKEN_TYPES.COLOR, end);
  const next = byteAt(input, end);
  if (next === -1) return doneAtEndOfInput(input, [token]);

  if (isIdentifierChar(next)) {
    const detail = isHexadecimal(next)
      ? 'found a seventh hexadecimal digit'
      : `found ${describeByte(next)}`;
    throw new LexerError(
      'TSL-L005',
      `Expected six hexadecimal digits in color, ${detail}.`,
      { start, end: end + 1 }
    );
  }
  return changeState(end, LEXER_STATES.BASE, [token]);
}
