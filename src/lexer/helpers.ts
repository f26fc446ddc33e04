/**
 * Lexer Helper Functions
 * Byte classification and token construction
 */

import type { Token, TokenType } from '../token-types.js';

/** Byte at an index, or -1 past the end of the input */
export function byteAt(input: Uint8Array, at: number): number {
  return input[at] ?? -1;
}

/** Check whether the given bytes occur at an index */
export function hasAt(
  input: Uint8Array,
  at: number,
  expected: string | readonly number[]
): boolean {
  const bytes =
    typeof expected === 'string'
      ? Array.from(expected, (ch) => ch.charCodeAt(0))
      : expected;
  if (at + bytes.length > input.length) {
    return false;
  }
  return bytes.every((byte, i) => input[at + i] === byte);
}

export function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function isAlphabetic(byte: number): boolean {
  return (byte >= 0x61 && byte <= 0x7a) || (byte >= 0x41 && byte <= 0x5a);
}

export function isIdentifierStart(byte: number): boolean {
  return isAlphabetic(byte) || byte === 0x5f;
}

export function isIdentifierChar(byte: number): boolean {
  return isIdentifierStart(byte) || isDigit(byte);
}

export function isHexadecimal(byte: number): boolean {
  return (
    isDigit(byte) ||
    (byte >= 0x61 && byte <= 0x66) ||
    (byte >= 0x41 && byte <= 0x46)
  );
}

/** Printable ASCII, excluding space */
export function isPrintable(byte: number): boolean {
  return byte > 0x20 && byte < 0x7f;
}

export function hexByte(byte: number): string {
  return `0x${byte.toString(16)}`;
}

/** Quote a byte for an error message */
export function describeByte(byte: number): string {
  if (byte < 0) return 'end of input';
  if (isPrintable(byte)) return `'${String.fromCharCode(byte)}'`;
  return `byte ${hexByte(byte)}`;
}

export function makeToken(start: number, type: TokenType, end: number): Token {
  return { start, type, end };
}
