// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in source text: 1-based line and column, 0-based offset */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Span covering the single character that starts at `start` */
export function charSpan(start: SourceLocation): SourceSpan {
  return {
    start,
    end: { line: start.line, column: start.column + 1, offset: start.offset + 1 },
  };
}

export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
