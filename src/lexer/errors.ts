/**
 * Lexer Errors
 * Located errors for bytes the lexer does not accept
 */

import { LexerError } from '../error-classes.js';
import { hasAt, hexByte, isPrintable } from './helpers.js';

export { LexerError };

const decoder = new TextDecoder('utf-8');

const REPLACEMENT_CHARACTER = 0xfffd;

const BYTE_ORDER_MARKS: readonly { encoding: string; bytes: number[] }[] = [
  // UTF-32 before UTF-16: the little-endian marks share a prefix.
  { encoding: 'UTF-32 (big endian)', bytes: [0x00, 0x00, 0xfe, 0xff] },
  { encoding: 'UTF-32 (little endian)', bytes: [0xff, 0xfe, 0x00, 0x00] },
  { encoding: 'UTF-8', bytes: [0xef, 0xbb, 0xbf] },
  { encoding: 'UTF-16 (big endian)', bytes: [0xfe, 0xff] },
  { encoding: 'UTF-16 (little endian)', bytes: [0xff, 0xfe] },
];

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Error for a byte that cannot start any token.
 * A well-formed non-ASCII character is reported over its full encoding;
 * anything else over the single byte.
 */
export function makeUnexpectedByteError(
  input: Uint8Array,
  at: number
): LexerError {
  const byte = input[at] ?? 0;
  const single = { start: at, end: at + 1 };

  if (byte === 0x09) {
    return new LexerError(
      'TSL-L003',
      'Found tab character. Please use spaces instead.',
      single,
      { what: 'tab character' }
    );
  }
  if (byte === 0x0d) {
    return new LexerError(
      'TSL-L003',
      'Found carriage return. Please use Unix line endings instead.',
      single,
      { what: 'carriage return' }
    );
  }
  if (byte < 0x20 || byte === 0x7f) {
    return new LexerError(
      'TSL-L003',
      `Found unexpected control character ${hexByte(byte)}. Note that source files must be UTF-8 encoded.`,
      single,
      { what: 'control character' }
    );
  }
  if (byte < 0x80) {
    const ch = isPrintable(byte) ? String.fromCharCode(byte) : hexByte(byte);
    return new LexerError(
      'TSL-L003',
      `Found unexpected character '${ch}'.`,
      single,
      { what: 'character' }
    );
  }

  const codePoint =
    decoder.decode(input.subarray(at, at + 4)).codePointAt(0) ??
    REPLACEMENT_CHARACTER;
  const isRealReplacement = hasAt(input, at, [0xef, 0xbf, 0xbd]);
  if (codePoint === REPLACEMENT_CHARACTER && !isRealReplacement) {
    return new LexerError(
      'TSL-L003',
      `Found unexpected byte ${hexByte(byte)}. Note that source files must be UTF-8 encoded.`,
      single,
      { what: 'byte' }
    );
  }

  return new LexerError(
    'TSL-L003',
    `Found unexpected character '${String.fromCodePoint(codePoint)}'. Note that identifiers must be ASCII.`,
    { start: at, end: at + utf8Length(codePoint) },
    { what: 'non-ASCII character' }
  );
}

/** Error for a byte that may start a byte order mark */
export function makeEncodingError(input: Uint8Array, at: number): LexerError {
  for (const mark of BYTE_ORDER_MARKS) {
    if (hasAt(input, at, mark.bytes)) {
      return new LexerError(
        'TSL-L004',
        `Found ${mark.encoding} byte order mark. Please save the file as UTF-8 without byte order mark.`,
        { start: at, end: at + mark.bytes.length },
        { encoding: mark.encoding }
      );
    }
  }
  return makeUnexpectedByteError(input, at);
}
