/**
 * Tessel Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceRange } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TesselErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly range?: SourceRange | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tessel errors.
 * Carries the byte range of the offending source; hosts turn it into a
 * line and column for display.
 */
export class TesselError extends Error {
  readonly errorId: string;
  readonly range?: SourceRange | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TesselErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'TesselError';
    this.errorId = data.errorId;
    this.range = data.range;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TesselErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      range: this.range,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TesselErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function checkCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Lexical errors. Always located: lexing stops at the first one. */
export class LexerError extends TesselError {
  override readonly range: SourceRange;

  constructor(
    errorId: string,
    message: string,
    range: SourceRange,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'lexer');
    super({ errorId, message, range, context });
    this.name = 'LexerError';
    this.range = range;
  }
}

/** Parse-time errors */
export class ParseError extends TesselError {
  override readonly range: SourceRange;

  constructor(
    errorId: string,
    message: string,
    range: SourceRange,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'parse');
    super({ errorId, message, range, context });
    this.name = 'ParseError';
    this.range = range;
  }
}

/** Evaluation errors */
export class RuntimeError extends TesselError {
  constructor(
    errorId: string,
    message: string,
    range?: SourceRange,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'runtime');
    super({ errorId, message, range, context });
    this.name = 'RuntimeError';
  }

  /**
   * Attach a source range to an error raised without one.
   * Builtins and lookups do not know where they were called from; the
   * evaluator locates their errors at the call site.
   */
  withRange(range: SourceRange): RuntimeError {
    if (this.range !== undefined) return this;
    return new RuntimeError(this.errorId, this.message, range, this.context);
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template with
 * the given context.
 *
 * @example
 * createError('TSL-R003', { name: 'foo' }, { start: 4, end: 7 })
 * // RuntimeError: "'foo' is not defined."
 *
 * @throws TypeError if errorId is not found in the registry
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  range?: SourceRange
): TesselError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
    case 'parse': {
      const located = range ?? { start: 0, end: 0 };
      return definition.category === 'lexer'
        ? new LexerError(errorId, message, located, context)
        : new ParseError(errorId, message, located, context);
    }
    case 'runtime':
      return new RuntimeError(errorId, message, range, context);
  }
}

/** Create a runtime error from the registry */
export function runtimeError(
  errorId: string,
  context: Record<string, unknown>,
  range?: SourceRange
): RuntimeError {
  checkCategory(errorId, 'runtime');
  const definition = ERROR_REGISTRY.get(errorId);
  const template = definition?.messageTemplate ?? '';
  return new RuntimeError(
    errorId,
    renderMessage(template, context),
    range,
    context
  );
}
