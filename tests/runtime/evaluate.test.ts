/**
 * Evaluator Tests
 * Documents, blocks, units, closures and adjoining
 */

import { describe, expect, it } from 'vitest';
import { BoundingBox, Vec2, len, num, str } from '../../src/index.js';
import { evalTerm, run, runError, valueOf } from '../helpers/runtime.js';

describe('Evaluator: units', () => {
  it('converts canvas-relative units to points', () => {
    expect(evalTerm('0.5w')).toEqual(len(500));
    expect(evalTerm('0.5h')).toEqual(len(250));
    expect(evalTerm('3pt')).toEqual(len(3));
    expect(evalTerm('3')).toEqual(num(3));
  });

  it('converts em through the font size in scope', () => {
    expect(evalTerm('2em')).toEqual(len(80));
    expect(valueOf('font_size = 10pt\nx = 2em', 'x')).toEqual(len(20));
  });

  it('requires font_size to be a length for em', () => {
    const err = runError('font_size = 10\nx = 2em');
    expect(err.errorId).toBe('TSL-R004');
    expect(err.message).toBe("Expected 'font_size' to be len, found num.");
    expect(err.range).toEqual({ start: 19, end: 22 });
  });

  it('evaluates coordinates', () => {
    expect(evalTerm('(0.1w, 0.2h)')).toMatchObject({
      kind: 'coord',
      x: 100,
      y: 100,
      dim: 1,
    });
  });

  it('requires both coordinates to share a dimension', () => {
    const err = runError('x = (1pt, 2)');
    expect(err.message).toBe('Expected the y coordinate to be len, found num.');
    expect(err.range).toEqual({ start: 10, end: 11 });
  });

  it('requires numeric coordinates', () => {
    const err = runError('x = ("a", 1)');
    expect(err.message).toBe(
      'Expected the x coordinate to be num or len, found str.'
    );
  });

  it('locates arithmetic errors at the expression', () => {
    const err = runError('x = 1pt + 2');
    expect(err.errorId).toBe('TSL-R010');
    expect(err.range).toEqual({ start: 4, end: 11 });
  });
});

describe('Evaluator: documents', () => {
  it('produces one slide per top-level block', () => {
    const { slides } = run('{ put line((1pt, 1pt)) }\n{ }\n{ put line((2pt, 2pt)) }');
    expect(slides).toHaveLength(3);
    expect(slides[1]?.elements).toEqual([]);
    expect(slides.every((slide) => slide.isSealed)).toBe(true);
  });

  it('keeps top-level bindings in the result scope', () => {
    const { scope } = run('title = "Intro"\n{ }');
    expect(scope.lookup('title')).toEqual(str('Intro'));
  });

  it('shadows style defaults at the top level', () => {
    const { slides } = run('color = #00ff00\n{ put line((1pt, 0pt)) }');
    expect(slides[0]?.elements[0]?.element).toMatchObject({
      color: { r: 0, g: 1, b: 0 },
    });
  });

  it('requires slides to be frames', () => {
    const err = runError('{ return 1 }');
    expect(err.errorId).toBe('TSL-R004');
    expect(err.message).toBe('Expected a slide to be frame, found num.');
    expect(err.range).toEqual({ start: 0, end: 12 });
  });

  it('reports unresolved names', () => {
    const err = runError('x = y');
    expect(err.errorId).toBe('TSL-R003');
    expect(err.message).toBe("'y' is not defined.");
    expect(err.range).toEqual({ start: 4, end: 5 });
  });

  it('rejects rebinding a name', () => {
    const err = runError('x = 1\nx = 2');
    expect(err.errorId).toBe('TSL-R009');
    expect(err.range).toEqual({ start: 6, end: 11 });
  });
});

describe('Evaluator: blocks and put', () => {
  it('places a frame at an offset', () => {
    const { slides } = run('{ put fill_rectangle((10pt, 10pt)) at (5pt, 5pt) }');
    const slide = slides[0];
    expect(slide?.elements[0]?.offset).toEqual(new Vec2(5, 5));
    expect(slide?.boundingBox.topLeft).toEqual(new Vec2(5, 5));
    expect(slide?.boundingBox.size).toEqual(new Vec2(10, 10));
    expect(slide?.anchor).toEqual(new Vec2(15, 15));
  });

  it('moves the anchor with each put', () => {
    const { slides } = run(
      '{\n  put line((1pt, 2pt)) at (10pt, 0pt)\n  put line((3pt, 0pt))\n}'
    );
    expect(slides[0]?.anchor).toEqual(new Vec2(3, 0));
    expect(
      slides[0]?.boundingBox.equals(
        BoundingBox.spanning(new Vec2(0, 0), new Vec2(11, 2))
      )
    ).toBe(true);
  });

  it('returns early', () => {
    expect(evalTerm('{ return 1\n put x }')).toEqual(num(1));
  });

  it('scopes bindings to the block', () => {
    const err = runError('x = { inner = 1 }\ny = inner');
    expect(err.message).toBe("'inner' is not defined.");
  });

  it('exposes block bindings through the frame', () => {
    expect(valueOf('card = { title = "Hi" }\nx = card.title', 'x')).toEqual(
      str('Hi')
    );
    const err = runError('card = { title = "Hi" }\nx = card.subtitle');
    expect(err.message).toBe("'card.subtitle' is not defined.");
  });

  it('requires a frame operand', () => {
    const err = runError('{ put 1 }');
    expect(err.message).toBe("Expected the operand of 'put' to be frame, found num.");
    expect(err.range).toEqual({ start: 6, end: 7 });
  });

  it('requires a length position', () => {
    const err = runError('{ put line((1pt, 1pt)) at (1, 2) }');
    expect(err.message).toBe(
      "Expected the position of 'put' to be coord of len, found coord of num."
    );
  });
});

describe('Evaluator: adjoin', () => {
  it('places the right frame at the left anchor', () => {
    const frame = evalTerm(
      'fill_rectangle((10pt, 5pt)) ~ fill_rectangle((2pt, 3pt))'
    );
    if (frame.kind !== 'frame') throw new Error('Expected a frame');
    expect(frame.frame.elements.map((e) => e.offset)).toEqual([
      new Vec2(0, 0),
      new Vec2(10, 5),
    ]);
    expect(frame.frame.anchor).toEqual(new Vec2(12, 8));
    expect(frame.frame.boundingBox.bottomRight).toEqual(new Vec2(12, 8));
  });

  it('rejects non-frames', () => {
    const err = runError('x = 1 ~ 2');
    expect(err.message).toBe("Operator '~' cannot be applied to num and num.");
  });
});

describe('Evaluator: functions', () => {
  it('calls closures with their arguments', () => {
    expect(
      valueOf('double = function(x) { return x * 2 }\ny = double(3pt)', 'y')
    ).toEqual(len(6));
  });

  it('closes over the defining scope', () => {
    expect(valueOf('k = 3\nf = function() { return k }\ny = f()', 'y')).toEqual(
      num(3)
    );
  });

  it('builds frames from function bodies', () => {
    const { slides } = run(
      'square = function(s) { put fill_rectangle((s, s)) }\n{ put square(4pt) at (1pt, 1pt) }'
    );
    expect(slides[0]?.boundingBox.size).toEqual(new Vec2(4, 4));
    expect(slides[0]?.anchor).toEqual(new Vec2(5, 5));
  });

  it('checks closure arity', () => {
    const err = runError('f = function(x) { return x }\ny = f(1, 2)');
    expect(err.errorId).toBe('TSL-R001');
    expect(err.message).toBe("'f' takes 1 argument(s), but 2 were supplied.");
  });

  it('rejects calls of non-functions', () => {
    const err = runError('x = 1\ny = x(2)');
    expect(err.errorId).toBe('TSL-R011');
    expect(err.message).toBe("'x' is num, which cannot be called.");
    expect(err.range).toEqual({ start: 10, end: 14 });
  });

  it('locates builtin errors at the call', () => {
    const err = runError('{ put t(1) }');
    expect(err.errorId).toBe('TSL-R002');
    expect(err.range).toEqual({ start: 6, end: 10 });
  });
});
