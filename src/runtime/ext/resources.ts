/**
 * Resources
 *
 * Host-provided access to fonts and images. The runtime ships defaults
 * backed by opentype.js and SVG files (opentype-fonts.ts, svg-images.ts);
 * hosts and tests may supply their own.
 */

/** One shaped glyph. Offsets and advances are in 1/1000 em. */
export interface ShapedGlyph {
  readonly glyphId: number;
  readonly xOffset: number;
  readonly yOffset: number;
  readonly xAdvance: number;
  readonly yAdvance: number;
}

export interface FontHandle {
  /** Shape a single line of text, left to right */
  shape(text: string): ShapedGlyph[];
  /** Advance width of a glyph in 1/1000 em, or undefined if no such glyph */
  glyphAdvance(glyphId: number): number | undefined;
}

export interface FontResolver {
  /**
   * Font for a family and style, or undefined if none is known.
   * @throws RuntimeError TSL-R007 if a known font file cannot be loaded
   */
  get(family: string, style: string): FontHandle | undefined;
}

/** Opaque reference to a loaded image, kept on the element for renderers */
export interface ImageHandle {
  /** Resolved location of the image */
  readonly path: string;
  readonly mediaType: string;
}

export interface LoadedImage {
  readonly handle: ImageHandle;
  /** Intrinsic size in points */
  readonly width: number;
  readonly height: number;
}

export interface ImageLoader {
  /** @throws RuntimeError TSL-R007 if the image cannot be loaded */
  load(path: string): LoadedImage;
}

export interface Resources {
  readonly fonts: FontResolver;
  readonly images: ImageLoader;
}
