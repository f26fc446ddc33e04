/**
 * Value Tests
 * Types, display names and formatting
 */

import { describe, expect, it } from 'vitest';
import {
  Frame,
  TYPES,
  color,
  coord,
  formatType,
  formatValue,
  frameValue,
  len,
  num,
  str,
  typeEquals,
  typeOf,
} from '../../src/index.js';

describe('Values: types', () => {
  it('tracks the dimension of numbers and coordinates', () => {
    expect(typeOf(num(1))).toEqual(TYPES.num);
    expect(typeOf(len(1))).toEqual(TYPES.len);
    expect(typeOf(coord(1, 2))).toEqual(TYPES.coordLen);
    expect(typeOf(coord(1, 2, 0))).toEqual(TYPES.coordNum);
  });

  it('compares dimensions', () => {
    expect(typeEquals(TYPES.len, { tag: 'num', dim: 1 })).toBe(true);
    expect(typeEquals(TYPES.len, TYPES.num)).toBe(false);
    expect(typeEquals(TYPES.len, TYPES.coordLen)).toBe(false);
    expect(typeEquals(TYPES.str, TYPES.str)).toBe(true);
  });

  it('names types', () => {
    expect(formatType(TYPES.num)).toBe('num');
    expect(formatType(TYPES.len)).toBe('len');
    expect(formatType({ tag: 'num', dim: 2 })).toBe('len^2');
    expect(formatType({ tag: 'num', dim: -1 })).toBe('len^-1');
    expect(formatType(TYPES.coordLen)).toBe('coord of len');
    expect(formatType(TYPES.frame)).toBe('frame');
  });
});

describe('Values: formatting', () => {
  it('formats numbers with their unit', () => {
    expect(formatValue(num(1.5))).toBe('1.5');
    expect(formatValue(len(4))).toBe('4pt');
    expect(formatValue(num(9, 2))).toBe('9pt^2');
    expect(formatValue(coord(1, 2))).toBe('(1pt, 2pt)');
  });

  it('formats colors as hex', () => {
    expect(formatValue(color({ r: 1, g: 0.5, b: 0 }))).toBe('#ff8000');
  });

  it('quotes strings', () => {
    expect(formatValue(str('a "b"'))).toBe('"a \\"b\\""');
  });

  it('summarizes frames', () => {
    expect(formatValue(frameValue(new Frame().seal()))).toBe(
      'frame(0 elements, 0x0)'
    );
  });
});
