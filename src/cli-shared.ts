/**
 * CLI Shared Utilities
 * Common formatting functions for the tessel command
 */

import { readFileSync } from 'node:fs';
import { TesselError } from './error-classes.js';
import { enrichError, type SourceSnippet } from './cli-error-enrichment.js';
import type {
  Element,
  ExecutionResult,
  Frame,
  ObservabilityCallbacks,
  PlacedElement,
  Vec2,
} from './runtime/index.js';
import { formatValue, type BoundingBox } from './runtime/index.js';

// ============================================================
// RESULT OUTPUT
// ============================================================

type Point = [number, number];

interface BoxJson {
  x: number;
  y: number;
  width: number;
  height: number;
}

function point(v: Vec2): Point {
  return [v.x, v.y];
}

function boxToJson(box: BoundingBox): BoxJson | null {
  if (box.isEmpty) return null;
  return {
    x: box.topLeft.x,
    y: box.topLeft.y,
    width: box.width,
    height: box.height,
  };
}

function elementToJson(element: Element): Record<string, unknown> {
  switch (element.kind) {
    case 'stroke_polygon':
      return {
        kind: element.kind,
        vertices: element.vertices.map(point),
        color: element.color,
        lineWidth: element.lineWidth,
        close: element.close,
      };
    case 'fill_polygon':
      return {
        kind: element.kind,
        vertices: element.vertices.map(point),
        color: element.color,
      };
    case 'text':
      return {
        kind: element.kind,
        fontFamily: element.fontFamily,
        fontStyle: element.fontStyle,
        fontSize: element.fontSize,
        color: element.color,
        glyphs: element.glyphs.map((g) => ({ id: g.id, x: g.x, y: g.y })),
      };
    case 'image':
      return {
        kind: element.kind,
        path: element.handle.path,
        mediaType: element.handle.mediaType,
        width: element.width,
        height: element.height,
      };
    case 'scaled':
      return {
        kind: element.kind,
        scale: element.scale,
        elements: element.elements.map(placedToJson),
      };
  }
}

function placedToJson(placed: PlacedElement): Record<string, unknown> {
  return { offset: point(placed.offset), ...elementToJson(placed.element) };
}

function frameToJson(frame: Frame): Record<string, unknown> {
  return {
    anchor: point(frame.anchor),
    boundingBox: boxToJson(frame.boundingBox),
    elements: frame.elements.map(placedToJson),
  };
}

/**
 * Convert execution result to JSON: one entry per slide, with element
 * offsets relative to the slide's top-left corner.
 */
export function formatOutput(result: ExecutionResult, pretty = false): string {
  const json = { slides: result.slides.map(frameToJson) };
  return pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);
}

// ============================================================
// ERROR OUTPUT
// ============================================================

function renderSnippet(snippet: SourceSnippet): string[] {
  const width = String(
    snippet.lines[snippet.lines.length - 1]?.lineNumber ?? 0
  ).length;
  const gutter = ' '.repeat(width);
  const out: string[] = [];
  for (const line of snippet.lines) {
    out.push(`${String(line.lineNumber).padStart(width)} | ${line.content}`);
    if (line.highlight) {
      const [from, to] = line.highlight;
      out.push(`${gutter} | ${' '.repeat(from)}${'^'.repeat(to - from)}`);
    }
  }
  return out;
}

/**
 * Format error for stderr output.
 *
 * Tessel errors render as `file:line:col: error TSL-xxxx: message`
 * followed by the offending source lines when the input is known.
 */
export function formatError(
  err: Error,
  input?: Uint8Array,
  fileName = '<input>'
): string {
  if (err instanceof TesselError) {
    if (input === undefined) {
      return `${fileName}: error ${err.errorId}: ${err.message}`;
    }
    const enriched = enrichError(err, input);
    const where = enriched.span
      ? `${fileName}:${enriched.span.start.line}:${enriched.span.start.column}`
      : fileName;
    const lines = [`${where}: error ${enriched.errorId}: ${enriched.message}`];
    if (enriched.sourceSnippet) {
      lines.push(...renderSnippet(enriched.sourceSnippet));
    }
    if (enriched.suggestions) {
      lines.push(`Did you mean: ${enriched.suggestions.join(', ')}?`);
    }
    return lines.join('\n');
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

// ============================================================
// TRACING
// ============================================================

/** Observability callbacks writing one line per event */
export function createTraceCallbacks(
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onStatement: (event) => {
      write(`[trace] ${event.kind} @${event.range.start}..${event.range.end}`);
    },
    onBuiltinCall: (event) => {
      write(
        `[trace] call ${event.name}(${event.args.map(formatValue).join(', ')})`
      );
    },
    onBuiltinReturn: (event) => {
      write(
        `[trace] return ${event.name} -> ${formatValue(event.value)} (${event.durationMs.toFixed(2)}ms)`
      );
    },
    onError: (event) => {
      write(`[trace] error ${event.error.message}`);
    },
  };
}

// ============================================================
// VERSION
// ============================================================

/** Package version, read from package.json beside src/ or dist/ */
export function readVersion(): string {
  try {
    const data: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof data === 'object' &&
      data !== null &&
      'version' in data &&
      typeof data.version === 'string'
    ) {
      return data.version;
    }
  } catch {
    // Fall through to the placeholder version
  }
  return '0.0.0';
}
