// ============================================================
// SOURCE RANGE
// ============================================================

/** Half-open byte range [start, end) into the UTF-8 source */
export interface SourceRange {
  readonly start: number;
  readonly end: number;
}

/** Human-facing position, derived from a byte offset on demand */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/**
 * Convert a byte offset into a 1-based line and column.
 * Columns count bytes, so a multi-byte character advances the column by
 * its encoded length.
 */
export function locate(input: Uint8Array, offset: number): SourceLocation {
  let line = 1;
  let column = 1;
  const limit = Math.min(offset, input.length);
  for (let i = 0; i < limit; i++) {
    if (input[i] === 0x0a) {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset };
}

export function toSpan(input: Uint8Array, range: SourceRange): SourceSpan {
  return { start: locate(input, range.start), end: locate(input, range.end) };
}
