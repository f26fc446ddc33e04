/**
 * CLI Error Enrichment
 * Functions for extracting source snippets and suggesting similar names
 */

import type { TesselError } from './error-classes.js';
import {
  locate,
  toSpan,
  type SourceRange,
  type SourceSpan,
} from './source-location.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
  /** Characters to underline on this line, as [start, end) columns of `content` */
  readonly highlight?: readonly [number, number] | undefined;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: string[] | undefined;
}

const decoder = new TextDecoder('utf-8');

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/** Byte offsets at which each line starts */
function lineStarts(input: Uint8Array): number[] {
  const starts = [0];
  input.forEach((byte, i) => {
    if (byte === 0x0a) starts.push(i + 1);
  });
  return starts;
}

/**
 * Extract source lines around an error range.
 *
 * Constraints:
 * - Context lines: 2 before, 2 after (configurable)
 * - Line numbers: 1-based
 * - The highlight marks the range on its first line, at least one column
 *
 * @throws {RangeError} When the range exceeds the input
 */
export function extractSnippet(
  input: Uint8Array,
  range: SourceRange,
  contextLines: number = 2
): SourceSnippet {
  if (range.start > input.length || range.end > input.length) {
    throw new RangeError('Range exceeds source bounds');
  }

  const span = toSpan(input, range);
  const starts = lineStarts(input);
  const totalLines = starts.length;
  const firstLine = Math.max(1, span.start.line - contextLines);
  const lastLine = Math.min(totalLines, span.end.line + contextLines);

  const lines: SnippetLine[] = [];
  for (let lineNumber = firstLine; lineNumber <= lastLine; lineNumber++) {
    const lineStart = starts[lineNumber - 1] ?? 0;
    const nextStart = starts[lineNumber];
    const lineEnd = nextStart === undefined ? input.length : nextStart - 1;
    const content = decoder.decode(input.subarray(lineStart, lineEnd));
    const isErrorLine =
      lineNumber >= span.start.line && lineNumber <= span.end.line;

    let highlight: readonly [number, number] | undefined;
    if (lineNumber === span.start.line) {
      const from = decoder.decode(input.subarray(lineStart, range.start)).length;
      const to = decoder.decode(
        input.subarray(lineStart, Math.min(range.end, lineEnd))
      ).length;
      highlight = [from, Math.max(to, from + 1)];
    }

    lines.push({ lineNumber, content, isErrorLine, highlight });
  }

  return { lines, highlightSpan: span };
}

// ============================================================
// NAME SUGGESTION
// ============================================================

/**
 * Find similar names using fuzzy matching.
 *
 * Constraints:
 * - Edit distance threshold: <= 2
 * - Max suggestions: 3
 * - Sort: ascending by distance, then alphabetically
 */
export function suggestSimilarNames(
  target: string,
  candidates: readonly string[]
): string[] {
  if (target === '' || candidates.length === 0) {
    return [];
  }

  const candidatesWithDistance = candidates
    .filter((candidate) => candidate !== target)
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2);

  candidatesWithDistance.sort((a, b) => {
    if (a.distance !== b.distance) {
      return a.distance - b.distance;
    }
    return a.name.localeCompare(b.name);
  });

  return candidatesWithDistance.slice(0, 3).map((item) => item.name);
}

/**
 * Calculate Levenshtein distance between two strings.
 * Uses dynamic programming with O(m*n) time and O(min(m,n)) space.
 */
function levenshteinDistance(a: string, b: string): number {
  // Ensure a is the shorter string for space optimization
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;

    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1, // deletion
        (currRow[i - 1] ?? 0) + 1, // insertion
        (prevRow[i - 1] ?? 0) + cost // substitution
      );
    }

    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Enrich an error with a source snippet and, for unresolved names,
 * suggestions from the names that were in scope.
 */
export function enrichError(
  error: TesselError,
  input: Uint8Array
): EnrichedError {
  let span: SourceSpan | undefined;
  let sourceSnippet: SourceSnippet | undefined;
  if (error.range && error.range.end <= input.length) {
    span = toSpan(input, error.range);
    sourceSnippet = extractSnippet(input, error.range);
  } else if (error.range) {
    const at = locate(input, input.length);
    span = { start: at, end: at };
  }

  let suggestions: string[] | undefined;
  const name = error.context?.['name'];
  const candidates = error.context?.['candidates'];
  if (
    error.errorId === 'TSL-R003' &&
    typeof name === 'string' &&
    Array.isArray(candidates)
  ) {
    const names = candidates.filter(
      (candidate): candidate is string => typeof candidate === 'string'
    );
    // Only the last segment of a dotted path can be misspelled here.
    const similar = suggestSimilarNames(name.split('.').pop() ?? name, names);
    if (similar.length > 0) suggestions = similar;
  }

  return {
    errorId: error.errorId,
    message: error.message,
    span,
    context: error.context,
    sourceSnippet,
    suggestions,
  };
}
