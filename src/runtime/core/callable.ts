/**
 * Callable Types
 *
 * Builtin function signature and argument validation. Closures defined in
 * source are plain values (see values.ts) and are applied by the evaluator.
 */

import { runtimeError } from '../../error-classes.js';
import type { Resources } from '../ext/resources.js';
import type { Environment } from './environment.js';
import type { Frame } from './frame.js';
import { Vec2 } from './geometry.js';
import type { CanvasSize } from './types.js';
import {
  formatType,
  typeEquals,
  typeOf,
  type Value,
  type ValueType,
} from './values.js';

/** What a builtin sees of the caller */
export interface CallContext {
  /** Scope of the call site, for style lookups such as `font_size` */
  readonly env: Environment;
  readonly resources: Resources;
  readonly canvas: CanvasSize;
}

/**
 * Builtin function signature.
 * Builtins are synchronous and return a fresh value; frames they return
 * are sealed.
 */
export type BuiltinFn = (args: Value[], ctx: CallContext) => Value;

/**
 * Check arity, then each argument's type, before a builtin does any work.
 *
 * @throws RuntimeError TSL-R001 on a wrong argument count
 * @throws RuntimeError TSL-R002 on the first argument of the wrong type
 */
export function validateArgs(
  functionName: string,
  expected: readonly ValueType[],
  args: readonly Value[]
): void {
  if (args.length !== expected.length) {
    throw runtimeError('TSL-R001', {
      functionName,
      expected: expected.length,
      actual: args.length,
    });
  }

  expected.forEach((type, i) => {
    const arg = args[i];
    if (arg === undefined) return;
    const actual = typeOf(arg);
    if (!typeEquals(type, actual)) {
      throw runtimeError('TSL-R002', {
        functionName,
        position: i,
        expected: formatType(type),
        actual: formatType(actual),
      });
    }
  });
}

// ============================================================
// ARGUMENT ACCESSORS
// ============================================================
// Valid only after validateArgs has checked the signature.

function unexpectedArg(i: number, expected: string): Error {
  return new Error(`Argument ${i + 1} is not ${expected}`);
}

export function stringArg(args: readonly Value[], i: number): string {
  const arg = args[i];
  if (arg?.kind !== 'string') throw unexpectedArg(i, 'a string');
  return arg.value;
}

export function numberArg(args: readonly Value[], i: number): number {
  const arg = args[i];
  if (arg?.kind !== 'number') throw unexpectedArg(i, 'a number');
  return arg.value;
}

export function coordArg(args: readonly Value[], i: number): Vec2 {
  const arg = args[i];
  if (arg?.kind !== 'coord') throw unexpectedArg(i, 'a coordinate');
  return new Vec2(arg.x, arg.y);
}

export function frameArg(args: readonly Value[], i: number): Frame {
  const arg = args[i];
  if (arg?.kind !== 'frame') throw unexpectedArg(i, 'a frame');
  return arg.frame;
}
