/**
 * Drawable Elements
 */

import type { Vec2 } from './geometry.js';
import type { ImageHandle } from '../ext/resources.js';

/** RGB color, channels in [0, 1] */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export interface StrokePolygon {
  readonly kind: 'stroke_polygon';
  readonly vertices: readonly Vec2[];
  readonly color: Color;
  readonly lineWidth: number;
  readonly close: boolean;
}

export interface FillPolygon {
  readonly kind: 'fill_polygon';
  readonly vertices: readonly Vec2[];
  readonly color: Color;
}

/** Glyph of a text run, positioned relative to the run's origin */
export interface PositionedGlyph {
  readonly id: number;
  readonly x: number;
  readonly y: number;
}

export interface TextRun {
  readonly kind: 'text';
  readonly glyphs: readonly PositionedGlyph[];
  readonly fontFamily: string;
  readonly fontStyle: string;
  readonly fontSize: number;
  readonly color: Color;
}

export interface EmbeddedImage {
  readonly kind: 'image';
  readonly path: string;
  readonly width: number;
  readonly height: number;
  readonly handle: ImageHandle;
}

/** Elements drawn with a uniform scale about their origin */
export interface ScaledGroup {
  readonly kind: 'scaled';
  readonly elements: readonly PlacedElement[];
  readonly scale: number;
}

export type Element =
  | StrokePolygon
  | FillPolygon
  | TextRun
  | EmbeddedImage
  | ScaledGroup;

export interface PlacedElement {
  readonly offset: Vec2;
  readonly element: Element;
}
