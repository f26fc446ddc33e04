/**
 * Arithmetic Tests
 * Dimension algebra on numbers, coordinates and strings
 */

import { describe, expect, it } from 'vitest';
import {
  applyArithmetic,
  coord,
  len,
  num,
  str,
} from '../../src/index.js';
import { catchRuntimeError } from '../helpers/runtime.js';

describe('Arithmetic: addition', () => {
  it('adds numbers of equal dimension', () => {
    expect(applyArithmetic('+', num(2), num(3))).toEqual(num(5));
    expect(applyArithmetic('-', len(2), len(3))).toEqual(len(-1));
  });

  it('adds coordinates componentwise', () => {
    expect(applyArithmetic('+', coord(1, 2), coord(10, 20))).toEqual(
      coord(11, 22)
    );
  });

  it('concatenates strings', () => {
    expect(applyArithmetic('+', str('foo'), str('bar'))).toEqual(str('foobar'));
  });

  it('rejects mixed dimensions', () => {
    const err = catchRuntimeError(() => applyArithmetic('+', len(2), num(3)));
    expect(err.errorId).toBe('TSL-R010');
    expect(err.message).toBe("Operator '+' cannot be applied to len and num.");
  });

  it('rejects coordinates of different dimension', () => {
    const err = catchRuntimeError(() =>
      applyArithmetic('-', coord(1, 1), coord(1, 1, 0))
    );
    expect(err.message).toBe(
      "Operator '-' cannot be applied to coord of len and coord of num."
    );
  });

  it('does not subtract strings', () => {
    const err = catchRuntimeError(() =>
      applyArithmetic('-', str('a'), str('b'))
    );
    expect(err.message).toBe("Operator '-' cannot be applied to str and str.");
  });
});

describe('Arithmetic: multiplication and division', () => {
  it('adds dimensions when multiplying', () => {
    expect(applyArithmetic('*', len(2), len(3))).toEqual(num(6, 2));
    expect(applyArithmetic('*', num(2), len(3))).toEqual(len(6));
  });

  it('scales coordinates', () => {
    expect(applyArithmetic('*', coord(1, 2), num(3))).toEqual(coord(3, 6));
    expect(applyArithmetic('*', num(3), coord(1, 2))).toEqual(coord(3, 6));
    expect(applyArithmetic('/', coord(4, 2), num(2))).toEqual(coord(2, 1));
  });

  it('subtracts dimensions when dividing', () => {
    expect(applyArithmetic('/', len(6), len(3))).toEqual(num(2));
    expect(applyArithmetic('/', num(6), len(3))).toEqual(num(2, -1));
  });

  it('rejects division by zero', () => {
    const err = catchRuntimeError(() => applyArithmetic('/', len(1), num(0)));
    expect(err.errorId).toBe('TSL-R008');
    expect(err.message).toBe('Division by zero.');
  });

  it('does not multiply coordinates together', () => {
    const err = catchRuntimeError(() =>
      applyArithmetic('*', coord(1, 1), coord(1, 1))
    );
    expect(err.errorId).toBe('TSL-R010');
  });
});

describe('Arithmetic: powers', () => {
  it('multiplies the dimension by the exponent', () => {
    expect(applyArithmetic('^', len(3), num(2))).toEqual(num(9, 2));
  });

  it('raises plain numbers to any power', () => {
    expect(applyArithmetic('^', num(4), num(0.5))).toEqual(num(2));
  });

  it('requires integer powers of lengths', () => {
    const err = catchRuntimeError(() =>
      applyArithmetic('^', len(4), num(0.5))
    );
    expect(err.errorId).toBe('TSL-R005');
    expect(err.message).toBe(
      'A len can only be raised to an integer power, not 0.5.'
    );
  });

  it('requires a plain exponent', () => {
    const err = catchRuntimeError(() => applyArithmetic('^', num(2), len(2)));
    expect(err.message).toBe("Operator '^' cannot be applied to num and len.");
  });
});
