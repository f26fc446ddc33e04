/**
 * Test utilities for Tessel runtime tests
 */

import {
  Environment,
  RuntimeError,
  TesselError,
  createRuntimeContext,
  evaluateDocument,
  parse,
  type ExecutionResult,
  type FontHandle,
  type FontResolver,
  type ImageLoader,
  type LoadedImage,
  type RuntimeContext,
  type RuntimeOptions,
  type ShapedGlyph,
  type Value,
} from '../../src/index.js';

/** Canvas used by tests, so that `1w` is 1000pt and `1h` is 500pt */
export const TEST_CANVAS = { width: 1000, height: 500 };

/**
 * Monospaced font: every character is one glyph, numbered by its char
 * code, advancing half an em. Glyphs 0 to 255 exist.
 */
export class FakeFont implements FontHandle {
  shape(text: string): ShapedGlyph[] {
    return Array.from(text, (ch) => ({
      glyphId: ch.charCodeAt(0),
      xOffset: 0,
      yOffset: 0,
      xAdvance: 500,
      yAdvance: 0,
    }));
  }

  glyphAdvance(glyphId: number): number | undefined {
    return glyphId < 256 ? 500 : undefined;
  }
}

/** Knows only Sans Regular; records every lookup */
export class FakeFonts implements FontResolver {
  readonly requests: string[] = [];
  private readonly font = new FakeFont();

  get(family: string, style: string): FontHandle | undefined {
    this.requests.push(`${family} ${style}`);
    return family === 'Sans' && style === 'Regular' ? this.font : undefined;
  }
}

/** Every image is 100 x 50 points; records every load */
export class FakeImages implements ImageLoader {
  readonly loaded: string[] = [];

  load(path: string): LoadedImage {
    this.loaded.push(path);
    return {
      handle: { path: `/images/${path}`, mediaType: 'image/svg+xml' },
      width: 100,
      height: 50,
    };
  }
}

/** Runtime context on the test canvas with fake resources */
export function testContext(options: RuntimeOptions = {}): RuntimeContext {
  return createRuntimeContext({
    canvas: TEST_CANVAS,
    ...options,
    resources: {
      fonts: new FakeFonts(),
      images: new FakeImages(),
      ...options.resources,
    },
  });
}

/** Evaluate a document with fake resources */
export function run(
  source: string,
  options: RuntimeOptions = {}
): ExecutionResult {
  return evaluateDocument(parse(source), testContext(options));
}

/** Value bound to a top-level name after evaluating a document */
export function valueOf(
  source: string,
  name: string,
  options: RuntimeOptions = {}
): Value {
  return run(source, options).scope.lookup(name);
}

/** Evaluate a single term */
export function evalTerm(source: string, options: RuntimeOptions = {}): Value {
  return valueOf(`result = ${source}`, 'result', options);
}

/** The error a document fails with */
export function runError(
  source: string,
  options: RuntimeOptions = {}
): TesselError {
  try {
    run(source, options);
  } catch (err) {
    if (err instanceof TesselError) return err;
    throw err;
  }
  throw new Error('Expected evaluation to fail');
}

/** The runtime error a call fails with */
export function catchRuntimeError(fn: () => unknown): RuntimeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RuntimeError) return err;
    throw err;
  }
  throw new Error('Expected a RuntimeError');
}

/** Scope holding the given bindings */
export function scopeWith(bindings: Record<string, Value>): Environment {
  const env = new Environment();
  for (const [name, value] of Object.entries(bindings)) {
    env.bind(name, value);
  }
  return env;
}
