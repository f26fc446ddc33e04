/**
 * OpenType Font Map
 * FontResolver backed by font files loaded with opentype.js
 */

import { resolve } from 'node:path';
import opentype from 'opentype.js';
import type { Font, Glyph } from 'opentype.js';
import { runtimeError } from '../../error-classes.js';
import type { FontHandle, FontResolver, ShapedGlyph } from './resources.js';

/** A font file registered for a family and style */
export interface FontSource {
  readonly family: string;
  readonly style: string;
  readonly path: string;
}

function fontKey(family: string, style: string): string {
  return `${family}\u0000${style}`;
}

/** Shapes by the font's cmap with pairwise kerning; no ligatures */
class OpentypeFont implements FontHandle {
  private readonly scale: number;

  constructor(private readonly font: Font) {
    this.scale = 1000 / font.unitsPerEm;
  }

  shape(text: string): ShapedGlyph[] {
    const glyphs: Glyph[] = this.font.stringToGlyphs(text);
    return glyphs.map((glyph, i) => {
      const next = glyphs[i + 1];
      const kerning =
        next === undefined ? 0 : this.font.getKerningValue(glyph, next);
      return {
        glyphId: glyph.index,
        xOffset: 0,
        yOffset: 0,
        xAdvance: ((glyph.advanceWidth ?? 0) + kerning) * this.scale,
        yAdvance: 0,
      };
    });
  }

  glyphAdvance(glyphId: number): number | undefined {
    if (glyphId < 0 || glyphId >= this.font.numGlyphs) return undefined;
    return (this.font.glyphs.get(glyphId).advanceWidth ?? 0) * this.scale;
  }
}

/**
 * Fonts by family and style. Files load on first use and stay cached.
 *
 * @example
 * ```typescript
 * const fonts = new OpentypeFontMap([
 *   { family: 'Sans', style: 'Regular', path: 'fonts/Sans-Regular.otf' },
 * ]);
 * ```
 */
export class OpentypeFontMap implements FontResolver {
  private readonly sources = new Map<string, string>();
  private readonly cache = new Map<string, FontHandle>();

  constructor(
    sources: readonly FontSource[] = [],
    private readonly baseDir: string = process.cwd()
  ) {
    for (const source of sources) {
      this.sources.set(fontKey(source.family, source.style), source.path);
    }
  }

  get(family: string, style: string): FontHandle | undefined {
    const key = fontKey(family, style);
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const path = this.sources.get(key);
    if (path === undefined) return undefined;

    let font: Font;
    try {
      font = opentype.loadSync(resolve(this.baseDir, path));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw runtimeError('TSL-R007', { path, reason });
    }

    const handle = new OpentypeFont(font);
    this.cache.set(key, handle);
    return handle;
  }
}
