/**
 * Environment
 * Chain of scopes binding names to values
 */

import type { SourceRange } from '../../source-location.js';
import { runtimeError, type RuntimeError } from '../../error-classes.js';
import type { Color } from './elements.js';
import type { Frame } from './frame.js';
import { formatType, typeOf, type Value } from './values.js';

/**
 * One scope of bindings. Lookups walk outward through the parent chain.
 * A binding cannot be replaced in the scope that made it; child scopes
 * may shadow it.
 */
export class Environment {
  private readonly bindings = new Map<string, Value>();

  constructor(readonly parent?: Environment) {}

  /** @throws RuntimeError TSL-R009 if the name is already bound here */
  bind(name: string, value: Value, range?: SourceRange): void {
    if (this.bindings.has(name)) {
      throw runtimeError('TSL-R009', { name }, range);
    }
    this.bindings.set(name, value);
  }

  /** Binding made in this scope itself */
  getOwn(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  /** Binding in this scope or the nearest enclosing one */
  get(name: string): Value | undefined {
    for (let env: Environment | undefined = this; env; env = env.parent) {
      const value = env.bindings.get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  /** Names bound in this scope, in binding order */
  ownEntries(): IterableIterator<[string, Value]> {
    return this.bindings.entries();
  }

  /** Every visible name, nearest scope first */
  visibleNames(): string[] {
    const names = new Set<string>();
    for (let env: Environment | undefined = this; env; env = env.parent) {
      for (const name of env.bindings.keys()) names.add(name);
    }
    return [...names];
  }

  /**
   * Resolve a dotted path. The first segment resolves through the scope
   * chain; each further segment names a binding made inside the frame the
   * path has reached so far.
   */
  lookup(path: string | readonly string[], range?: SourceRange): Value {
    const parts = typeof path === 'string' ? path.split('.') : path;
    const [head = '', ...rest] = parts;

    let value = this.get(head);
    if (value === undefined) {
      throw runtimeError(
        'TSL-R003',
        { name: head, candidates: this.visibleNames() },
        range
      );
    }

    let resolved = head;
    for (const part of rest) {
      if (value.kind !== 'frame') {
        throw runtimeError(
          'TSL-R004',
          {
            what: `'${resolved}'`,
            expected: 'frame',
            actual: formatType(typeOf(value)),
          },
          range
        );
      }
      const scope: Environment | undefined = value.frame.scope;
      resolved = `${resolved}.${part}`;
      const member: Value | undefined = scope?.getOwn(part);
      if (member === undefined) {
        throw runtimeError(
          'TSL-R003',
          {
            name: resolved,
            candidates: scope ? [...scope.bindings.keys()] : [],
          },
          range
        );
      }
      value = member;
    }

    return value;
  }

  lookupNum(name: string, dim = 0): number {
    const value = this.lookup(name);
    if (value.kind !== 'number' || value.dim !== dim) {
      throw mismatch(name, formatType({ tag: 'num', dim }), value);
    }
    return value.value;
  }

  /** Length in points */
  lookupLen(name: string): number {
    return this.lookupNum(name, 1);
  }

  lookupStr(name: string): string {
    const value = this.lookup(name);
    if (value.kind !== 'string') throw mismatch(name, 'str', value);
    return value.value;
  }

  lookupColor(name: string): Color {
    const value = this.lookup(name);
    if (value.kind !== 'color') throw mismatch(name, 'color', value);
    return value.color;
  }

  lookupFrame(name: string): Frame {
    const value = this.lookup(name);
    if (value.kind !== 'frame') throw mismatch(name, 'frame', value);
    return value.frame;
  }
}

function mismatch(name: string, expected: string, value: Value): RuntimeError {
  return runtimeError('TSL-R004', {
    what: `'${name}'`,
    expected,
    actual: formatType(typeOf(value)),
  });
}
