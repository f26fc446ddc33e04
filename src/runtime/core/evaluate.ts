/**
 * Evaluator
 *
 * Tree-walking evaluation of terms, blocks and documents. Evaluation is
 * synchronous; the first error aborts and propagates to the caller.
 *
 * @internal
 */

import type {
  BlockNode,
  BlockStatementNode,
  CallNode,
  DocumentNode,
  ImportNode,
  NumberLiteralNode,
  TermNode,
} from '../../ast-nodes.js';
import { RuntimeError, runtimeError } from '../../error-classes.js';
import type { SourceRange } from '../../source-location.js';
import { applyArithmetic } from './arithmetic.js';
import type { CallContext } from './callable.js';
import { Environment } from './environment.js';
import { Frame } from './frame.js';
import { Vec2 } from './geometry.js';
import type { ExecutionResult, RuntimeContext } from './types.js';
import {
  coord,
  formatType,
  frameValue,
  num,
  str,
  typeOf,
  type BuiltinValue,
  type ClosureValue,
  type Value,
} from './values.js';

/** Run a step, locating any runtime error it raises without a range */
function locate<T>(range: SourceRange, step: () => T): T {
  try {
    return step();
  } catch (error) {
    if (error instanceof RuntimeError) throw error.withRange(range);
    throw error;
  }
}

export class Evaluator {
  constructor(protected readonly ctx: RuntimeContext) {}

  // ============================================================
  // DOCUMENTS
  // ============================================================

  /** Evaluate a document in a fresh scope below the prelude */
  evaluateDocument(node: DocumentNode): ExecutionResult {
    const scope = new Environment(this.ctx.prelude);
    const slides: Frame[] = [];

    for (const stmt of node.statements) {
      this.ctx.observability.onStatement?.({ kind: stmt.type, range: stmt.span });

      switch (stmt.type) {
        case 'Import':
          this.evaluateImport(stmt, scope);
          break;
        case 'Assign':
          scope.bind(stmt.name, this.evaluateTerm(stmt.value, scope), stmt.span);
          break;
        case 'Block': {
          const slide = this.evaluateBlock(stmt, scope);
          if (slide.kind !== 'frame') {
            throw runtimeError(
              'TSL-R004',
              {
                what: 'a slide',
                expected: 'frame',
                actual: formatType(typeOf(slide)),
              },
              stmt.span
            );
          }
          slides.push(slide.frame);
          break;
        }
      }
    }

    return { slides, scope };
  }

  private evaluateImport(node: ImportNode, scope: Environment): void {
    const path = node.path.parts.join('.');
    const importer = this.ctx.importer;
    if (importer === undefined) {
      throw runtimeError(
        'TSL-R012',
        { path, reason: 'no module loader is configured.' },
        node.span
      );
    }

    const imported = locate(node.span, () => importer(node.path.parts, this.ctx));
    for (const [name, value] of imported.ownEntries()) {
      scope.bind(name, value, node.span);
    }
  }

  // ============================================================
  // BLOCKS
  // ============================================================

  /**
   * Evaluate a block in a child scope. The result is the returned value,
   * or the sealed frame built by its `put` statements.
   */
  evaluateBlock(node: BlockNode, parent: Environment): Value {
    const scope = new Environment(parent);
    const frame = new Frame(scope);

    for (const stmt of node.statements) {
      this.ctx.observability.onStatement?.({ kind: stmt.type, range: stmt.span });
      const returned = this.evaluateBlockStatement(stmt, scope, frame);
      if (returned !== undefined) return returned;
    }

    return frameValue(frame.seal());
  }

  private evaluateBlockStatement(
    stmt: BlockStatementNode,
    scope: Environment,
    frame: Frame
  ): Value | undefined {
    switch (stmt.type) {
      case 'Import':
        this.evaluateImport(stmt, scope);
        return undefined;
      case 'Assign':
        scope.bind(stmt.name, this.evaluateTerm(stmt.value, scope), stmt.span);
        return undefined;
      case 'Return':
        return this.evaluateTerm(stmt.value, scope);
      case 'Put': {
        const placed = this.evaluateTerm(stmt.frame, scope);
        if (placed.kind !== 'frame') {
          throw runtimeError(
            'TSL-R004',
            {
              what: "the operand of 'put'",
              expected: 'frame',
              actual: formatType(typeOf(placed)),
            },
            stmt.frame.span
          );
        }

        let offset = Vec2.zero();
        if (stmt.at !== null) {
          const at = this.evaluateTerm(stmt.at, scope);
          if (at.kind !== 'coord' || at.dim !== 1) {
            throw runtimeError(
              'TSL-R004',
              {
                what: "the position of 'put'",
                expected: 'coord of len',
                actual: formatType(typeOf(at)),
              },
              stmt.at.span
            );
          }
          offset = new Vec2(at.x, at.y);
        }

        frame.placeFrame(offset, placed.frame);
        frame.setAnchor(offset.add(placed.frame.anchor));
        return undefined;
      }
    }
  }

  // ============================================================
  // TERMS
  // ============================================================

  evaluateTerm(node: TermNode, env: Environment): Value {
    switch (node.type) {
      case 'StringLiteral':
        return str(node.value);
      case 'NumberLiteral':
        return this.evaluateNumber(node, env);
      case 'ColorLiteral':
        return {
          kind: 'color',
          color: { r: node.r / 255, g: node.g / 255, b: node.b / 255 },
        };
      case 'Idents':
        return env.lookup(node.parts, node.span);
      case 'Coord': {
        const x = this.evaluateTerm(node.x, env);
        const y = this.evaluateTerm(node.y, env);
        if (x.kind !== 'number') {
          throw coordinateMismatch('x', x, 'num or len', node.x.span);
        }
        if (y.kind !== 'number' || y.dim !== x.dim) {
          throw coordinateMismatch('y', y, formatType(typeOf(x)), node.y.span);
        }
        return coord(x.value, y.value, x.dim);
      }
      case 'BinaryExpr': {
        const left = this.evaluateTerm(node.left, env);
        const right = this.evaluateTerm(node.right, env);
        if (node.op === '~') return this.adjoin(left, right, node.span);
        const op = node.op;
        return locate(node.span, () => applyArithmetic(op, left, right));
      }
      case 'Call':
        return this.evaluateCall(node, env);
      case 'Function': {
        const closure: ClosureValue = {
          kind: 'closure',
          params: node.params,
          body: node.body,
          scope: env,
        };
        return closure;
      }
      case 'Block':
        return this.evaluateBlock(node, env);
    }
  }

  /** Convert a literal to points: `w` and `h` relative to the canvas, `em` to `font_size` */
  private evaluateNumber(node: NumberLiteralNode, env: Environment): Value {
    switch (node.unit) {
      case null:
        return num(node.value);
      case 'pt':
        return num(node.value, 1);
      case 'w':
        return num(node.value * this.ctx.canvas.width, 1);
      case 'h':
        return num(node.value * this.ctx.canvas.height, 1);
      case 'em': {
        const fontSize = locate(node.span, () => env.lookupLen('font_size'));
        return num(node.value * fontSize, 1);
      }
    }
  }

  /** `a ~ b`: b placed at a's anchor */
  private adjoin(left: Value, right: Value, range: SourceRange): Value {
    if (left.kind !== 'frame' || right.kind !== 'frame') {
      throw runtimeError(
        'TSL-R010',
        {
          op: '~',
          left: formatType(typeOf(left)),
          right: formatType(typeOf(right)),
        },
        range
      );
    }

    const a = left.frame;
    const b = right.frame;
    const frame = new Frame();
    frame.placeFrame(Vec2.zero(), a);
    frame.placeFrame(a.anchor, b);
    frame.setAnchor(a.anchor.add(b.anchor));
    return frameValue(frame.seal());
  }

  // ============================================================
  // CALLS
  // ============================================================

  private evaluateCall(node: CallNode, env: Environment): Value {
    const name = node.callee.parts.join('.');
    const callee = env.lookup(node.callee.parts, node.callee.span);
    const args = node.args.map((arg) => this.evaluateTerm(arg, env));

    switch (callee.kind) {
      case 'builtin':
        return locate(node.span, () => this.callBuiltin(callee, args, env));
      case 'closure':
        return locate(node.span, () => this.callClosure(name, callee, args));
      default:
        throw runtimeError(
          'TSL-R011',
          { name, actual: formatType(typeOf(callee)) },
          node.span
        );
    }
  }

  private callBuiltin(callee: BuiltinValue, args: Value[], env: Environment): Value {
    const { observability } = this.ctx;
    const callContext: CallContext = {
      env,
      resources: this.ctx.resources,
      canvas: this.ctx.canvas,
    };

    observability.onBuiltinCall?.({ name: callee.name, args });
    const startedAt = performance.now();
    const value = callee.fn(args, callContext);
    observability.onBuiltinReturn?.({
      name: callee.name,
      value,
      durationMs: performance.now() - startedAt,
    });
    return value;
  }

  private callClosure(name: string, closure: ClosureValue, args: Value[]): Value {
    if (args.length !== closure.params.length) {
      throw runtimeError('TSL-R001', {
        functionName: name,
        expected: closure.params.length,
        actual: args.length,
      });
    }

    const scope = new Environment(closure.scope);
    closure.params.forEach((param, i) => {
      const arg = args[i];
      if (arg !== undefined) scope.bind(param, arg);
    });
    return this.evaluateBlock(closure.body, scope);
  }
}

function coordinateMismatch(
  axis: 'x' | 'y',
  value: Value,
  expected: string,
  range: SourceRange
): RuntimeError {
  return runtimeError(
    'TSL-R004',
    {
      what: `the ${axis} coordinate`,
      expected,
      actual: formatType(typeOf(value)),
    },
    range
  );
}
