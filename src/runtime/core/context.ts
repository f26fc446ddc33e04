/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for document evaluation.
 * Public API for host applications.
 */

import { parseTerm } from '../../parser/index.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import { OpentypeFontMap } from '../ext/opentype-fonts.js';
import type { Resources } from '../ext/resources.js';
import { SvgImageLoader } from '../ext/svg-images.js';
import { Environment } from './environment.js';
import { Evaluator } from './evaluate.js';
import type { CanvasSize, RuntimeContext, RuntimeOptions } from './types.js';

/** Full HD in points */
export const DEFAULT_CANVAS: CanvasSize = { width: 1920, height: 1080 };

/**
 * Ambient style defaults, as source expressions evaluated in order.
 * Later entries may refer to earlier ones.
 */
export const DEFAULT_STYLE: ReadonlyArray<readonly [string, string]> = [
  ['color', '#000000'],
  ['line_width', '2pt'],
  ['font_family', '"Sans"'],
  ['font_style', '"Regular"'],
  ['font_size', '40pt'],
  ['line_height', '1.2em'],
  ['text_align', '"left"'],
];

function mergeDefaults(
  overrides: Record<string, string> | undefined
): [string, string][] {
  const merged = new Map<string, string>(DEFAULT_STYLE);
  for (const [name, source] of Object.entries(overrides ?? {})) {
    merged.set(name, source);
  }
  return [...merged];
}

/**
 * Create a runtime context for document evaluation.
 * This is the main entry point for configuring the Tessel runtime.
 *
 * @throws LexerError, ParseError or RuntimeError if a style default does
 * not evaluate
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const resources: Resources = {
    fonts: options.resources?.fonts ?? new OpentypeFontMap(),
    images: options.resources?.images ?? new SvgImageLoader(),
  };

  const root = new Environment();
  const functions = { ...BUILTIN_FUNCTIONS, ...options.functions };
  for (const [name, fn] of Object.entries(functions)) {
    root.bind(name, { kind: 'builtin', name, fn });
  }

  const prelude = new Environment(root);
  const ctx: RuntimeContext = {
    resources,
    canvas: options.canvas ?? DEFAULT_CANVAS,
    root,
    prelude,
    observability: options.observability ?? {},
    importer: options.importer,
  };

  const evaluator = new Evaluator(ctx);
  for (const [name, source] of mergeDefaults(options.defaults)) {
    prelude.bind(name, evaluator.evaluateTerm(parseTerm(source), prelude));
  }

  return ctx;
}
