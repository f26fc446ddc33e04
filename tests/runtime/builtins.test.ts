/**
 * Builtin Function Tests
 * fit, line, fill_rectangle, image, t, glyph and str
 */

import { describe, expect, it } from 'vitest';
import {
  BoundingBox,
  Vec2,
  type Frame,
  type ImageLoader,
  type Value,
} from '../../src/index.js';
import {
  FakeFonts,
  FakeImages,
  evalTerm,
  runError,
} from '../helpers/runtime.js';

function asFrame(value: Value): Frame {
  if (value.kind !== 'frame') {
    throw new Error(`Expected a frame, got ${value.kind}`);
  }
  return value.frame;
}

function frameOf(source: string): Frame {
  return asFrame(evalTerm(source));
}

describe('Builtins: fit', () => {
  it('scales a wide frame by its width', () => {
    const frame = frameOf('fit(fill_rectangle((10pt, 5pt)), (20pt, 20pt))');
    expect(frame.boundingBox.equals(BoundingBox.sized(20, 10))).toBe(true);
    expect(frame.anchor).toEqual(new Vec2(20, 10));
    expect(frame.elements).toHaveLength(1);
    expect(frame.elements[0]?.element).toMatchObject({
      kind: 'scaled',
      scale: 2,
    });
  });

  it('keeps the scope of the fitted frame', () => {
    const frame = frameOf('fit({ n = 1  put line((1pt, 1pt)) }, (2pt, 2pt))');
    expect(frame.scope?.getOwn('n')).toEqual({ kind: 'number', value: 1, dim: 0 });
  });

  it('rejects a zero-size target', () => {
    const err = runError('x = fit(line((1pt, 1pt)), (0pt, 1pt))');
    expect(err.errorId).toBe('TSL-R008');
    expect(err.range).toEqual({ start: 4, end: 37 });
  });

  it('validates arguments before scaling', () => {
    const err = runError('x = fit(line((1pt, 1pt)), (1, 1))');
    expect(err.message).toBe(
      "Argument at index 1 of 'fit' must be coord of len, found coord of num."
    );
  });
});

describe('Builtins: line and fill_rectangle', () => {
  it('strokes a line to its end point', () => {
    const frame = frameOf('line((3pt, 4pt))');
    expect(frame.boundingBox.equals(BoundingBox.sized(3, 4))).toBe(true);
    expect(frame.anchor).toEqual(new Vec2(3, 4));
    expect(frame.elements[0]?.element).toEqual({
      kind: 'stroke_polygon',
      vertices: [new Vec2(0, 0), new Vec2(3, 4)],
      color: { r: 0, g: 0, b: 0 },
      lineWidth: 2,
      close: false,
    });
  });

  it('bounds lines pointing up and left', () => {
    const frame = frameOf('line((-3pt, 4pt))');
    expect(frame.boundingBox.topLeft).toEqual(new Vec2(-3, 0));
    expect(frame.boundingBox.size).toEqual(new Vec2(3, 4));
  });

  it('fills a rectangle in the ambient color', () => {
    const frame = frameOf('{ color = #ff0000  put fill_rectangle((1w, 1h)) }');
    expect(frame.elements[0]?.element).toEqual({
      kind: 'fill_polygon',
      vertices: [
        new Vec2(0, 0),
        new Vec2(0, 500),
        new Vec2(1000, 500),
        new Vec2(1000, 0),
      ],
      color: { r: 1, g: 0, b: 0 },
    });
    expect(frame.anchor).toEqual(new Vec2(1000, 500));
  });

  it('reads line_width from the calling scope', () => {
    const frame = frameOf('{ line_width = 0.5em  put line((1pt, 0pt)) }');
    expect(frame.elements[0]?.element).toMatchObject({ lineWidth: 20 });
  });
});

describe('Builtins: image', () => {
  it('embeds an image anchored at its top right', () => {
    const images = new FakeImages();
    const frame = asFrame(
      evalTerm('image("logo.svg")', { resources: { images } })
    );
    expect(images.loaded).toEqual(['logo.svg']);
    expect(frame.boundingBox.equals(BoundingBox.sized(100, 50))).toBe(true);
    expect(frame.anchor).toEqual(new Vec2(100, 0));
    expect(frame.elements[0]?.element).toEqual({
      kind: 'image',
      path: 'logo.svg',
      width: 100,
      height: 50,
      handle: { path: '/images/logo.svg', mediaType: 'image/svg+xml' },
    });
  });

  it('only loads svg files', () => {
    const err = runError('x = image("logo.png")');
    expect(err.errorId).toBe('TSL-R008');
    expect(err.message).toBe(
      "Cannot load 'logo.png', only svg images are supported for now."
    );
  });

  it('checks arity and types before loading', () => {
    const images = new FakeImages();
    expect(
      runError('x = image("a.svg", "b.svg")', { resources: { images } }).errorId
    ).toBe('TSL-R001');
    expect(
      runError('x = image(1)', { resources: { images } }).errorId
    ).toBe('TSL-R002');
    expect(images.loaded).toEqual([]);
  });

  it('rejects images with a negative size', () => {
    const images: ImageLoader = {
      load: (path) => ({
        handle: { path, mediaType: 'image/svg+xml' },
        width: -4,
        height: 3,
      }),
    };
    const err = runError('x = image("flipped.svg")', { resources: { images } });
    expect(err.errorId).toBe('TSL-R005');
    expect(err.message).toBe(
      "Expected the width of 'flipped.svg' to be a finite, non-negative length, found -4pt."
    );
    expect(err.range).toEqual({ start: 4, end: 24 });
  });
});

describe('Builtins: t', () => {
  it('lays out one line', () => {
    const frame = frameOf('t("ab")');
    expect(frame.elements[0]?.element).toEqual({
      kind: 'text',
      glyphs: [
        { id: 97, x: 0, y: 0 },
        { id: 98, x: 20, y: 0 },
      ],
      fontFamily: 'Sans',
      fontStyle: 'Regular',
      fontSize: 40,
      color: { r: 0, g: 0, b: 0 },
    });
    expect(frame.anchor).toEqual(new Vec2(40, 0));
    expect(frame.boundingBox.topLeft).toEqual(new Vec2(0, -48));
    expect(frame.boundingBox.size).toEqual(new Vec2(40, 48));
  });

  it('moves down one line height per line', () => {
    const frame = frameOf('t("ab\\nc")');
    expect(frame.elements[0]?.element).toMatchObject({
      glyphs: [
        { id: 97, x: 0, y: 0 },
        { id: 98, x: 20, y: 0 },
        { id: 99, x: 0, y: 48 },
      ],
    });
    expect(frame.anchor).toEqual(new Vec2(20, 48));
    expect(frame.boundingBox.size).toEqual(new Vec2(40, 96));
  });

  it('centers lines on the origin', () => {
    const frame = frameOf('{ text_align = "center"  return t("ab") }');
    expect(frame.elements[0]?.element).toMatchObject({
      glyphs: [
        { id: 97, x: -20, y: 0 },
        { id: 98, x: 0, y: 0 },
      ],
    });
    expect(frame.boundingBox.topLeft).toEqual(new Vec2(-20, -48));
    expect(frame.anchor).toEqual(new Vec2(20, 0));
  });

  it('uses the ambient font size', () => {
    const frame = frameOf('{ font_size = 10pt  line_height = 12pt  return t("a") }');
    expect(frame.elements[0]?.element).toMatchObject({ fontSize: 10 });
    expect(frame.anchor).toEqual(new Vec2(5, 0));
    expect(frame.boundingBox.size).toEqual(new Vec2(5, 12));
  });

  it('rejects unknown alignments', () => {
    const err = runError('{ text_align = "justify"  put t("a") }');
    expect(err.errorId).toBe('TSL-R005');
  });

  it('reports a missing font', () => {
    const err = runError('{ font_family = "Serif"  put t("a") }');
    expect(err.errorId).toBe('TSL-R006');
    expect(err.message).toBe(
      "Font 'Serif' with style 'Regular' could not be found."
    );
  });

  it('rejects a negative line height at the call', () => {
    const err = runError('x = { line_height = -10pt  return t("a") }');
    expect(err.errorId).toBe('TSL-R005');
    expect(err.message).toBe(
      'Expected line_height to be a finite, non-negative length, found -10pt.'
    );
    expect(err.range).toEqual({ start: 34, end: 40 });
  });

  it('rejects an infinite font size', () => {
    const err = runError('x = { font_size = 10^400 * 1pt  return t("a") }');
    expect(err.errorId).toBe('TSL-R005');
    expect(err.message).toBe(
      'Expected font_size to be a finite, non-negative length, found Infinitypt.'
    );
  });

  it('does not resolve fonts for invalid arguments', () => {
    const fonts = new FakeFonts();
    runError('x = t(1)', { resources: { fonts } });
    expect(fonts.requests).toEqual([]);
  });
});

describe('Builtins: glyph', () => {
  it('places a single glyph', () => {
    const frame = frameOf('glyph(3)');
    expect(frame.elements[0]?.element).toMatchObject({
      kind: 'text',
      glyphs: [{ id: 3, x: 0, y: 0 }],
    });
    expect(frame.anchor).toEqual(new Vec2(20, 0));
    expect(frame.boundingBox.topLeft).toEqual(new Vec2(0, -48));
    expect(frame.boundingBox.size).toEqual(new Vec2(20, 48));
  });

  it('rejects fractional indices', () => {
    const err = runError('x = glyph(1.5)');
    expect(err.message).toBe(
      'Expected an unsigned integer glyph index, found 1.5.'
    );
  });

  it('rejects a negative line height', () => {
    const err = runError('x = { line_height = -1pt  return glyph(3) }');
    expect(err.errorId).toBe('TSL-R005');
    expect(err.message).toBe(
      'Expected line_height to be a finite, non-negative length, found -1pt.'
    );
  });

  it('rejects glyphs the font does not have', () => {
    const err = runError('x = glyph(999)');
    expect(err.message).toBe(
      "Font 'Sans' with style 'Regular' has no glyph 999."
    );
  });
});

describe('Builtins: str', () => {
  it('formats plain numbers', () => {
    expect(evalTerm('str(1.5)')).toEqual({ kind: 'string', value: '1.5' });
  });

  it('concatenates with strings', () => {
    expect(evalTerm('"page " + str(3)')).toEqual({
      kind: 'string',
      value: 'page 3',
    });
  });

  it('rejects lengths', () => {
    const err = runError('x = str(1pt)');
    expect(err.message).toBe("Argument at index 0 of 'str' must be num, found len.");
  });
});
