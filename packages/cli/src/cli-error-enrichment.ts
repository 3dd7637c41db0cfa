/**
 * CLI Error Enrichment
 * Attach source snippets and registry help text to tapewright errors
 */

import {
  charSpan,
  ERROR_REGISTRY,
  type SourceSpan,
  type TapeError,
} from '@tapewright/core';

// ============================================================
// TYPES
// ============================================================

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface SourceSnippet {
  readonly lines: readonly SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly name?: string | undefined;
  /** Message without the trailing ` at line:col` */
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: readonly string[] | undefined;
  /** Registry cause text, shown with --verbose */
  readonly cause?: string | undefined;
}

// ============================================================
// SNIPPETS
// ============================================================

/**
 * Extract the lines around a span, with `contextLines` lines of context
 * before the span's first line and after its last.
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines = 2
): SourceSnippet {
  const sourceLines = source.split('\n');
  const first = Math.max(1, span.start.line - contextLines);
  const last = Math.min(sourceLines.length, span.end.line + contextLines);

  const lines: SnippetLine[] = [];
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    lines.push({
      lineNumber,
      content: (sourceLines[lineNumber - 1] ?? '').replace(/\r$/, ''),
      isErrorLine:
        lineNumber >= span.start.line && lineNumber <= span.end.line,
    });
  }

  return { lines, highlightSpan: span };
}

// ============================================================
// ENRICHMENT
// ============================================================

/**
 * Combine an error with its source snippet and the registry's resolution
 * text. Errors without a location get no snippet.
 */
export function enrichError(error: TapeError, source?: string): EnrichedError {
  const data = error.toData();
  const definition = ERROR_REGISTRY.get(data.errorId);
  const span = data.location ? charSpan(data.location) : undefined;

  return {
    errorId: data.errorId,
    name: definition?.name,
    message: data.message,
    span,
    sourceSnippet:
      span !== undefined && source !== undefined
        ? extractSnippet(source, span)
        : undefined,
    suggestions: definition?.resolution ? [definition.resolution] : undefined,
    cause: definition?.cause,
  };
}
