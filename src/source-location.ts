// ============================================================
// SOURCE LOCATION
// ============================================================

/** Half-open range of UTF-16 offsets into the parsed source */
export interface Span {
  readonly start: number;
  readonly end: number;
}

/** 1-based line/column position, plus the offset it was computed from */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Span enriched with the line/column of its start, for diagnostics */
export interface SourceSpan extends Span {
  readonly line: number;
  readonly column: number;
}

/**
 * Compute the 1-based line and column for an offset.
 * Only \n counts as a line break; a preceding \r stays part of the line.
 */
export function locate(source: string, offset: number): SourceLocation {
  const clamped = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1, offset: clamped };
}
