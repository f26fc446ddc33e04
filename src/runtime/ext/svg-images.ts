/**
 * SVG Image Loader
 * Reads the intrinsic size of SVG files from their root element
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { runtimeError } from '../../error-classes.js';
import type { ImageLoader, LoadedImage } from './resources.js';

const PX_TO_POINTS = 0.75;

/** Points per unit of each absolute CSS length unit */
const UNIT_TO_POINTS: Readonly<Record<string, number>> = {
  '': PX_TO_POINTS,
  px: PX_TO_POINTS,
  pt: 1,
  pc: 12,
  in: 72,
  cm: 72 / 2.54,
  mm: 72 / 25.4,
};

const SVG_TAG = /<svg\b([^>]*)>/i;
const ATTRIBUTE = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const LENGTH = /^\s*([0-9]*\.?[0-9]+)\s*([a-z]*)\s*$/i;

function readAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of tag.matchAll(ATTRIBUTE)) {
    const [, name, doubleQuoted, singleQuoted] = match;
    if (name !== undefined) {
      attributes.set(name, doubleQuoted ?? singleQuoted ?? '');
    }
  }
  return attributes;
}

/** Length in points, or undefined for relative or malformed lengths */
function parseLength(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const match = LENGTH.exec(value);
  if (!match) return undefined;
  const [, amount = '', unit = ''] = match;
  const factor = UNIT_TO_POINTS[unit.toLowerCase()];
  if (factor === undefined) return undefined;
  return Number.parseFloat(amount) * factor;
}

/**
 * Intrinsic size of an SVG document in points, from the root element's
 * width and height, each falling back to the viewBox.
 */
export function readSvgSize(
  source: string
): { width: number; height: number } | undefined {
  const tag = SVG_TAG.exec(source);
  if (!tag) return undefined;
  const attributes = readAttributes(tag[1] ?? '');

  const viewBox = (attributes.get('viewBox') ?? '')
    .trim()
    .split(/[\s,]+/)
    .map(Number);
  const [, , boxWidth, boxHeight] =
    viewBox.length === 4 && viewBox.every(Number.isFinite) ? viewBox : [];

  const width =
    parseLength(attributes.get('width')) ??
    (boxWidth === undefined ? undefined : boxWidth * PX_TO_POINTS);
  const height =
    parseLength(attributes.get('height')) ??
    (boxHeight === undefined ? undefined : boxHeight * PX_TO_POINTS);

  if (width === undefined || height === undefined) return undefined;
  if (width < 0 || height < 0) return undefined;
  return { width, height };
}

/** Loads SVG files relative to a base directory */
export class SvgImageLoader implements ImageLoader {
  constructor(private readonly baseDir: string = process.cwd()) {}

  load(path: string): LoadedImage {
    const resolved = resolve(this.baseDir, path);

    let source: string;
    try {
      source = readFileSync(resolved, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw runtimeError('TSL-R007', { path, reason });
    }

    const size = readSvgSize(source);
    if (size === undefined) {
      throw runtimeError('TSL-R008', {
        detail: `'${path}' is not an SVG image with a known width and height.`,
      });
    }

    return {
      handle: { path: resolved, mediaType: 'image/svg+xml' },
      width: size.width,
      height: size.height,
    };
  }
}
