/**
 * Built-in Functions
 *
 * The functions every document can call. Each checks its signature with
 * validateArgs before doing any work, reads ambient styling from the
 * calling scope, and returns a sealed frame or a plain value.
 */

import { runtimeError } from '../../error-classes.js';
import {
  coordArg,
  frameArg,
  numberArg,
  stringArg,
  validateArgs,
  type BuiltinFn,
  type CallContext,
} from '../core/callable.js';
import type { Color, PositionedGlyph } from '../core/elements.js';
import { Frame } from '../core/frame.js';
import { BoundingBox, Vec2 } from '../core/geometry.js';
import {
  alignOffset,
  fitScale,
  parseTextAlign,
  splitLines,
  typesetLine,
} from '../core/layout.js';
import { TYPES, frameValue, str, type Value } from '../core/values.js';
import type { FontHandle } from './resources.js';

// ============================================================
// AMBIENT STYLE
// ============================================================

interface TextStyle {
  readonly fontFamily: string;
  readonly fontStyle: string;
  readonly fontSize: number;
  readonly lineHeight: number;
  readonly color: Color;
  readonly font: FontHandle;
}

/** Lengths that size a bounding box must be finite and non-negative */
function requireExtent(what: string, value: number): number {
  if (!(Number.isFinite(value) && value >= 0)) {
    throw runtimeError('TSL-R005', {
      detail: `Expected ${what} to be a finite, non-negative length, found ${value}pt.`,
    });
  }
  return value;
}

function resolveTextStyle(ctx: CallContext): TextStyle {
  const { env } = ctx;
  const fontFamily = env.lookupStr('font_family');
  const fontStyle = env.lookupStr('font_style');
  const fontSize = requireExtent('font_size', env.lookupLen('font_size'));
  const lineHeight = requireExtent('line_height', env.lookupLen('line_height'));
  const color = env.lookupColor('color');

  const font = ctx.resources.fonts.get(fontFamily, fontStyle);
  if (font === undefined) {
    throw runtimeError('TSL-R006', { family: fontFamily, style: fontStyle });
  }
  return { fontFamily, fontStyle, fontSize, lineHeight, color, font };
}

function textFrame(
  style: TextStyle,
  glyphs: PositionedGlyph[],
  anchor: Vec2,
  box: BoundingBox
): Value {
  const frame = new Frame();
  frame.placeElement(Vec2.zero(), {
    kind: 'text',
    glyphs,
    fontFamily: style.fontFamily,
    fontStyle: style.fontStyle,
    fontSize: style.fontSize,
    color: style.color,
  });
  frame.setAnchor(anchor);
  frame.unionBoundingBox(box);
  return frameValue(frame.seal());
}

// ============================================================
// FRAMES
// ============================================================

/** fit(frame, (w, h)): scale a frame uniformly to fit a box */
const fit: BuiltinFn = (args) => {
  validateArgs('fit', [TYPES.frame, TYPES.coordLen], args);
  const frame = frameArg(args, 0);
  const size = coordArg(args, 1);

  const scale = fitScale(frame.boundingBox, size.x, size.y);

  const scaled = new Frame(frame.scope);
  scaled.placeElement(Vec2.zero(), {
    kind: 'scaled',
    elements: frame.elements,
    scale,
  });
  scaled.setAnchor(frame.anchor.scale(scale));
  scaled.unionBoundingBox(frame.boundingBox.scale(scale));
  return frameValue(scaled.seal());
};

/** line((x, y)): stroke from the origin to a point */
const line: BuiltinFn = (args, ctx) => {
  validateArgs('line', [TYPES.coordLen], args);
  const end = coordArg(args, 0);

  const frame = new Frame();
  frame.placeElement(Vec2.zero(), {
    kind: 'stroke_polygon',
    vertices: [Vec2.zero(), end],
    color: ctx.env.lookupColor('color'),
    lineWidth: ctx.env.lookupLen('line_width'),
    close: false,
  });
  frame.setAnchor(end);
  frame.unionBoundingBox(BoundingBox.spanning(Vec2.zero(), end));
  return frameValue(frame.seal());
};

/** fill_rectangle((w, h)): filled rectangle with its top-left at the origin */
const fillRectangle: BuiltinFn = (args, ctx) => {
  validateArgs('fill_rectangle', [TYPES.coordLen], args);
  const { x: w, y: h } = coordArg(args, 0);

  const frame = new Frame();
  frame.placeElement(Vec2.zero(), {
    kind: 'fill_polygon',
    vertices: [Vec2.zero(), new Vec2(0, h), new Vec2(w, h), new Vec2(w, 0)],
    color: ctx.env.lookupColor('color'),
  });
  frame.setAnchor(new Vec2(w, h));
  frame.unionBoundingBox(BoundingBox.spanning(Vec2.zero(), new Vec2(w, h)));
  return frameValue(frame.seal());
};

/** image(path): embed an SVG file, anchored at its top right */
const image: BuiltinFn = (args, ctx) => {
  validateArgs('image', [TYPES.str], args);
  const path = stringArg(args, 0);

  if (!path.endsWith('.svg')) {
    throw runtimeError('TSL-R008', {
      detail: `Cannot load '${path}', only svg images are supported for now.`,
    });
  }

  const loaded = ctx.resources.images.load(path);
  requireExtent(`the width of '${path}'`, loaded.width);
  requireExtent(`the height of '${path}'`, loaded.height);
  const frame = new Frame();
  frame.placeElement(Vec2.zero(), {
    kind: 'image',
    path,
    width: loaded.width,
    height: loaded.height,
    handle: loaded.handle,
  });
  frame.setAnchor(new Vec2(loaded.width, 0));
  frame.unionBoundingBox(BoundingBox.sized(loaded.width, loaded.height));
  return frameValue(frame.seal());
};

// ============================================================
// TEXT
// ============================================================

/** t(text): lay out text with the ambient font, one run per call */
const t: BuiltinFn = (args, ctx) => {
  validateArgs('t', [TYPES.str], args);
  const text = stringArg(args, 0);
  const style = resolveTextStyle(ctx);
  const align = parseTextAlign(ctx.env.lookupStr('text_align'));

  const glyphs: PositionedGlyph[] = [];
  let maxWidth = 0;
  let minOffset = 0;
  let lineEnd = 0;
  let y = 0;

  for (const lineText of splitLines(text)) {
    const typeset = typesetLine(style.font, style.fontSize, lineText);
    const offset = alignOffset(align, typeset.width);

    for (const glyph of typeset.glyphs) {
      glyphs.push({ id: glyph.id, x: glyph.x + offset, y: glyph.y + y });
    }

    maxWidth = Math.max(maxWidth, typeset.width);
    minOffset = Math.min(minOffset, offset);
    lineEnd = offset + typeset.width;
    y += style.lineHeight;
  }

  return textFrame(
    style,
    glyphs,
    new Vec2(lineEnd, y - style.lineHeight),
    BoundingBox.fromCorner(
      new Vec2(minOffset, -style.lineHeight),
      new Vec2(requireExtent('the width of the text', maxWidth), y)
    )
  );
};

/** glyph(index): a single glyph by its index in the ambient font */
const glyph: BuiltinFn = (args, ctx) => {
  validateArgs('glyph', [TYPES.num], args);
  const index = numberArg(args, 0);

  if (!Number.isInteger(index) || index < 0) {
    throw runtimeError('TSL-R005', {
      detail: `Expected an unsigned integer glyph index, found ${index}.`,
    });
  }

  const style = resolveTextStyle(ctx);
  const advance = style.font.glyphAdvance(index);
  if (advance === undefined) {
    throw runtimeError('TSL-R005', {
      detail: `Font '${style.fontFamily}' with style '${style.fontStyle}' has no glyph ${index}.`,
    });
  }

  const width = requireExtent(
    `the advance of glyph ${index}`,
    (advance * style.fontSize) / 1000
  );
  return textFrame(
    style,
    [{ id: index, x: 0, y: 0 }],
    new Vec2(width, 0),
    BoundingBox.fromCorner(
      new Vec2(0, -style.lineHeight),
      new Vec2(width, style.lineHeight)
    )
  );
};

// ============================================================
// CONVERSIONS
// ============================================================

/** str(n): decimal representation of a plain number */
const toStr: BuiltinFn = (args) => {
  validateArgs('str', [TYPES.num], args);
  return str(String(numberArg(args, 0)));
};

/** Built-in functions by name */
export const BUILTIN_FUNCTIONS: Readonly<Record<string, BuiltinFn>> = {
  fit,
  line,
  fill_rectangle: fillRectangle,
  image,
  t,
  glyph,
  str: toStr,
};
