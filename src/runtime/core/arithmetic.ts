/**
 * Dimension Algebra
 *
 * Arithmetic on numbers and coordinates. A value's dimension behaves like
 * the power of a physical unit: sums need equal dimensions, products add
 * them, powers multiply them.
 */

import type { ArithmeticOp } from '../../ast-nodes.js';
import { runtimeError, type RuntimeError } from '../../error-classes.js';
import {
  coord,
  formatType,
  num,
  str,
  typeOf,
  type NumberValue,
  type Value,
} from './values.js';

function invalidOperands(op: ArithmeticOp, left: Value, right: Value): RuntimeError {
  return runtimeError('TSL-R010', {
    op,
    left: formatType(typeOf(left)),
    right: formatType(typeOf(right)),
  });
}

function checkDivisor(divisor: NumberValue): void {
  if (divisor.value === 0) {
    throw runtimeError('TSL-R008', { detail: 'Division by zero.' });
  }
}

function add(op: '+' | '-', left: Value, right: Value): Value {
  const sign = op === '+' ? 1 : -1;

  if (left.kind === 'number' && right.kind === 'number' && left.dim === right.dim) {
    return num(left.value + sign * right.value, left.dim);
  }
  if (left.kind === 'coord' && right.kind === 'coord' && left.dim === right.dim) {
    return coord(left.x + sign * right.x, left.y + sign * right.y, left.dim);
  }
  if (op === '+' && left.kind === 'string' && right.kind === 'string') {
    return str(left.value + right.value);
  }
  throw invalidOperands(op, left, right);
}

function multiply(left: Value, right: Value): Value {
  if (left.kind === 'number' && right.kind === 'number') {
    return num(left.value * right.value, left.dim + right.dim);
  }
  if (left.kind === 'coord' && right.kind === 'number') {
    return coord(left.x * right.value, left.y * right.value, left.dim + right.dim);
  }
  if (left.kind === 'number' && right.kind === 'coord') {
    return coord(left.value * right.x, left.value * right.y, left.dim + right.dim);
  }
  throw invalidOperands('*', left, right);
}

function divide(left: Value, right: Value): Value {
  if (left.kind === 'number' && right.kind === 'number') {
    checkDivisor(right);
    return num(left.value / right.value, left.dim - right.dim);
  }
  if (left.kind === 'coord' && right.kind === 'number') {
    checkDivisor(right);
    return coord(left.x / right.value, left.y / right.value, left.dim - right.dim);
  }
  throw invalidOperands('/', left, right);
}

function power(left: Value, right: Value): Value {
  if (left.kind !== 'number' || right.kind !== 'number' || right.dim !== 0) {
    throw invalidOperands('^', left, right);
  }
  if (left.dim !== 0 && !Number.isInteger(right.value)) {
    throw runtimeError('TSL-R005', {
      detail: `A ${formatType(typeOf(left))} can only be raised to an integer power, not ${right.value}.`,
    });
  }
  return num(left.value ** right.value, left.dim * right.value);
}

/**
 * Apply an arithmetic operator.
 * @throws RuntimeError TSL-R010 when the operand types do not combine
 */
export function applyArithmetic(op: ArithmeticOp, left: Value, right: Value): Value {
  switch (op) {
    case '+':
    case '-':
      return add(op, left, right);
    case '*':
      return multiply(left, right);
    case '/':
      return divide(left, right);
    case '^':
      return power(left, right);
  }
}
