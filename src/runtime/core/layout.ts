/**
 * Text Layout
 * Line splitting, shaping into positioned glyphs, and fit scaling
 */

import { runtimeError } from '../../error-classes.js';
import type { FontHandle } from '../ext/resources.js';
import type { PositionedGlyph } from './elements.js';
import type { BoundingBox } from './geometry.js';

export type TextAlign = 'left' | 'center' | 'right';

const TEXT_ALIGNS: readonly TextAlign[] = ['left', 'center', 'right'];

/** Split on newlines. A trailing newline yields a final empty line. */
export function splitLines(text: string): string[] {
  return text.split('\n');
}

export function parseTextAlign(value: string): TextAlign {
  const align = TEXT_ALIGNS.find((candidate) => candidate === value);
  if (align === undefined) {
    throw runtimeError('TSL-R005', {
      detail: `'${value}' is not a valid value for 'text_align'. Must be one of 'left', 'center', 'right'.`,
    });
  }
  return align;
}

/** Horizontal shift that aligns a line of the given width at x = 0 */
export function alignOffset(align: TextAlign, width: number): number {
  switch (align) {
    case 'left':
      return 0;
    case 'center':
      return width * -0.5;
    case 'right':
      return -width;
  }
}

export interface TypesetLine {
  readonly glyphs: PositionedGlyph[];
  /** Pen position after the last glyph */
  readonly width: number;
}

/**
 * Shape one line and position its glyphs. Each glyph sits at the pen
 * plus its offset; the pen then moves by the glyph's advance.
 */
export function typesetLine(
  font: FontHandle,
  fontSize: number,
  text: string
): TypesetLine {
  const sizeFactor = fontSize / 1000;
  const glyphs: PositionedGlyph[] = [];
  let penX = 0;
  let penY = 0;

  for (const shaped of font.shape(text)) {
    glyphs.push({
      id: shaped.glyphId,
      x: penX + shaped.xOffset * sizeFactor,
      y: penY + shaped.yOffset * sizeFactor,
    });
    penX += shaped.xAdvance * sizeFactor;
    penY += shaped.yAdvance * sizeFactor;
  }

  return { glyphs, width: penX };
}

/**
 * Largest uniform scale that fits a box into a target size, keeping its
 * aspect ratio.
 */
export function fitScale(box: BoundingBox, width: number, height: number): number {
  if (width === 0 || height === 0) {
    throw runtimeError('TSL-R008', {
      detail:
        'Cannot fit frame in a box with width or height equal to 0. Simply do not place the frame then.',
    });
  }

  if (box.height !== 0) {
    return box.width / box.height > width / height
      ? width / box.width
      : height / box.height;
  }
  if (box.width !== 0) {
    return box.height / box.width > height / width
      ? height / box.height
      : width / box.width;
  }
  throw runtimeError('TSL-R008', { detail: 'Cannot fit a frame of size (0w, 0h).' });
}
