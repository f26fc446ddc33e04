/**
 * Parser Error Tests
 */

import { describe, expect, it } from 'vitest';
import { ParseError, parse, parseTerm } from '../../src/index.js';

function parseError(run: () => unknown): ParseError {
  try {
    run();
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('Expected a ParseError');
}

describe('Parser: errors', () => {
  it('rejects put at the top level', () => {
    const err = parseError(() => parse('put x'));
    expect(err.errorId).toBe('TSL-P004');
    expect(err.message).toBe("'put' is not allowed at the top level.");
    expect(err.range).toEqual({ start: 0, end: 3 });
  });

  it('rejects return at the top level', () => {
    const err = parseError(() => parse('return x'));
    expect(err.message).toBe("'return' is not allowed at the top level.");
  });

  it('rejects nested bare blocks', () => {
    const err = parseError(() => parse('{ { } }'));
    expect(err.message).toBe(
      "'{' is not allowed as a statement inside a block."
    );
    expect(err.range).toEqual({ start: 2, end: 3 });
  });

  it('reports an unclosed block at end of input', () => {
    const err = parseError(() => parse('{ put t("x")'));
    expect(err.errorId).toBe('TSL-P002');
    expect(err.message).toBe(
      "Unexpected end of input, expected statement or '}'."
    );
    expect(err.range).toEqual({ start: 12, end: 12 });
  });

  it('names the unexpected token', () => {
    const err = parseError(() => parse('x = (1w 2h)'));
    expect(err.errorId).toBe('TSL-P001');
    expect(err.message).toBe("Unexpected number '2', expected ',' or ')'.");
    expect(err.range).toEqual({ start: 8, end: 9 });
  });

  it('reports a missing term', () => {
    const err = parseError(() => parse('x = '));
    expect(err.message).toBe('Unexpected end of input, expected term.');
    expect(err.range).toEqual({ start: 4, end: 4 });
  });

  it('reports a statement that starts with an operator', () => {
    const err = parseError(() => parse('= 1'));
    expect(err.message).toBe("Unexpected '=', expected statement.");
  });

  it('rejects dotted assignment targets', () => {
    const err = parseError(() => parse('a.b = 1'));
    expect(err.message).toBe("Unexpected '.', expected '='.");
  });

  it('rejects invalid escapes', () => {
    const err = parseError(() => parse('x = "a\\tb"'));
    expect(err.errorId).toBe('TSL-P003');
    expect(err.message).toBe("Invalid escape sequence '\\t' in string.");
    expect(err.range).toEqual({ start: 6, end: 8 });
  });

  it('rejects trailing tokens after a term', () => {
    const err = parseError(() => parseTerm('1 2'));
    expect(err.message).toBe("Unexpected number '2', expected end of input.");
  });

  it('names identifiers in parameter lists', () => {
    const err = parseError(() => parse('f = function(1) {}'));
    expect(err.message).toBe(
      "Unexpected number '1', expected parameter name."
    );
  });
});
