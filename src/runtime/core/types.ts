/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { SourceRange } from '../../source-location.js';
import type { Resources } from '../ext/resources.js';
import type { BuiltinFn } from './callable.js';
import type { Environment } from './environment.js';
import type { Frame } from './frame.js';
import type { Value } from './values.js';

/** Size of a slide in points; `w` and `h` are fractions of it */
export interface CanvasSize {
  readonly width: number;
  readonly height: number;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level or block statement executes */
  onStatement?: (event: StatementEvent) => void;
  /** Called before a builtin is invoked */
  onBuiltinCall?: (event: BuiltinCallEvent) => void;
  /** Called after a builtin returns */
  onBuiltinReturn?: (event: BuiltinReturnEvent) => void;
  /** Called when an error escapes a document */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StatementEvent {
  /** Statement kind: Import, Assign, Put, Return or Block */
  kind: string;
  range: SourceRange;
}

/** Event emitted before a builtin call */
export interface BuiltinCallEvent {
  name: string;
  args: Value[];
}

/** Event emitted after a builtin returns */
export interface BuiltinReturnEvent {
  name: string;
  value: Value;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
}

/**
 * Resolves `import a.b` to the scope of the imported module.
 * Throwing a RuntimeError aborts the import with that error.
 */
export type ModuleImporter = (
  path: readonly string[],
  ctx: RuntimeContext
) => Environment;

/** Runtime context shared by every evaluation in a document */
export interface RuntimeContext {
  readonly resources: Resources;
  readonly canvas: CanvasSize;
  /** Builtin functions */
  readonly root: Environment;
  /** Style defaults, such as `font_size`; documents shadow them */
  readonly prelude: Environment;
  readonly observability: ObservabilityCallbacks;
  readonly importer: ModuleImporter | undefined;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Font and image access; defaults resolve no fonts and read SVG files */
  resources?: Partial<Resources>;
  /** Slide size in points (default 1920 x 1080) */
  canvas?: CanvasSize;
  /** Style defaults as source expressions, overriding the built-in ones */
  defaults?: Record<string, string>;
  /** Host functions; may override builtins */
  functions?: Record<string, BuiltinFn>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Loader for `import` statements; imports fail without one */
  importer?: ModuleImporter;
}

/** Result of document execution */
export interface ExecutionResult {
  /** One sealed frame per top-level block, in source order */
  slides: Frame[];
  /** Top-level bindings */
  scope: Environment;
}
