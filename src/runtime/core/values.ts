/**
 * Tessel Values
 * Runtime values and their types
 */

import type { BlockNode } from '../../ast-nodes.js';
import type { BuiltinFn } from './callable.js';
import type { Color } from './elements.js';
import type { Environment } from './environment.js';
import type { Frame } from './frame.js';

// ============================================================
// VALUES
// ============================================================

/**
 * Number with a unit dimension: 0 is a plain number, 1 a length, 2 an
 * area, and so on. Lengths are stored in points.
 */
export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
  readonly dim: number;
}

export interface CoordValue {
  readonly kind: 'coord';
  readonly x: number;
  readonly y: number;
  readonly dim: number;
}

export interface ColorValue {
  readonly kind: 'color';
  readonly color: Color;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface FrameValue {
  readonly kind: 'frame';
  readonly frame: Frame;
}

/** Function defined in source, closed over its defining scope */
export interface ClosureValue {
  readonly kind: 'closure';
  readonly params: readonly string[];
  readonly body: BlockNode;
  readonly scope: Environment;
}

export interface BuiltinValue {
  readonly kind: 'builtin';
  readonly name: string;
  readonly fn: BuiltinFn;
}

export type Value =
  | NumberValue
  | CoordValue
  | ColorValue
  | StringValue
  | FrameValue
  | ClosureValue
  | BuiltinValue;

export function num(value: number, dim = 0): NumberValue {
  return { kind: 'number', value, dim };
}

export function len(value: number): NumberValue {
  return { kind: 'number', value, dim: 1 };
}

export function coord(x: number, y: number, dim = 1): CoordValue {
  return { kind: 'coord', x, y, dim };
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function color(value: Color): ColorValue {
  return { kind: 'color', color: value };
}

export function frameValue(frame: Frame): FrameValue {
  return { kind: 'frame', frame };
}

// ============================================================
// TYPES
// ============================================================

export type ValueType =
  | { readonly tag: 'num'; readonly dim: number }
  | { readonly tag: 'coord'; readonly dim: number }
  | { readonly tag: 'color' }
  | { readonly tag: 'str' }
  | { readonly tag: 'frame' }
  | { readonly tag: 'fn' };

/** Type constants for builtin signatures */
export const TYPES = {
  num: { tag: 'num', dim: 0 },
  len: { tag: 'num', dim: 1 },
  coordNum: { tag: 'coord', dim: 0 },
  coordLen: { tag: 'coord', dim: 1 },
  color: { tag: 'color' },
  str: { tag: 'str' },
  frame: { tag: 'frame' },
  fn: { tag: 'fn' },
} as const satisfies Record<string, ValueType>;

export function typeOf(value: Value): ValueType {
  switch (value.kind) {
    case 'number':
      return { tag: 'num', dim: value.dim };
    case 'coord':
      return { tag: 'coord', dim: value.dim };
    case 'color':
      return TYPES.color;
    case 'string':
      return TYPES.str;
    case 'frame':
      return TYPES.frame;
    case 'closure':
    case 'builtin':
      return TYPES.fn;
  }
}

export function typeEquals(a: ValueType, b: ValueType): boolean {
  if (a.tag !== b.tag) return false;
  if ((a.tag === 'num' || a.tag === 'coord') && (b.tag === 'num' || b.tag === 'coord')) {
    return a.dim === b.dim;
  }
  return true;
}

function formatDim(dim: number): string {
  if (dim === 0) return 'num';
  if (dim === 1) return 'len';
  return `len^${dim}`;
}

/** Display name of a type, e.g. `len`, `coord of num`, `len^2` */
export function formatType(type: ValueType): string {
  switch (type.tag) {
    case 'num':
      return formatDim(type.dim);
    case 'coord':
      return `coord of ${formatDim(type.dim)}`;
    default:
      return type.tag;
  }
}

/** Short human-readable rendering of a value */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'number':
      return value.dim === 0
        ? String(value.value)
        : `${value.value}pt${value.dim === 1 ? '' : `^${value.dim}`}`;
    case 'coord': {
      const unit =
        value.dim === 0 ? '' : `pt${value.dim === 1 ? '' : `^${value.dim}`}`;
      return `(${value.x}${unit}, ${value.y}${unit})`;
    }
    case 'color': {
      const channel = (c: number): string =>
        Math.round(c * 255)
          .toString(16)
          .padStart(2, '0');
      const { r, g, b } = value.color;
      return `#${channel(r)}${channel(g)}${channel(b)}`;
    }
    case 'string':
      return JSON.stringify(value.value);
    case 'frame': {
      const { width, height } = value.frame.boundingBox;
      return `frame(${value.frame.elements.length} elements, ${width}x${height})`;
    }
    case 'closure':
      return `function(${value.params.join(', ')})`;
    case 'builtin':
      return `builtin ${value.name}`;
  }
}
