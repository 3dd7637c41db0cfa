/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { SourceSpan } from '@tapewright/core';
import type { EnrichedError } from './cli-error-enrichment.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type { EnrichedError };

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'human',
  'json',
  'compact',
];

/**
 * Format options for error output.
 */
export interface FormatOptions {
  readonly format: OutputFormat;
  /** Adds the registry's cause text */
  readonly verbose: boolean;
  /** Program file shown in the location line */
  readonly fileName?: string | undefined;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format enriched error for output.
 *
 * - Human format: multi-line with snippet and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 *
 * @throws {TypeError} Unknown format
 */
export function formatError(
  error: EnrichedError,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'json':
      return formatErrorJson(error, options);
    case 'compact':
      return formatErrorCompact(error, options);
    case 'human':
      return formatErrorHuman(error, options);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * error[TAPE-P002]: Unmatched ']'
 *   --> loop.b:2:4
 *    |
 *  1 | +++
 *  2 | [-]]
 *    |    ^
 *    |
 *    = help: Add the matching '[' ...
 * ```
 */
function formatErrorHuman(
  error: EnrichedError,
  options: FormatOptions
): string {
  const lines: string[] = [];

  lines.push(`error[${error.errorId}]: ${error.message}`);

  if (error.span) {
    lines.push(`  --> ${locationLabel(error.span, options.fileName)}`);
  }

  if (error.sourceSnippet && error.sourceSnippet.lines.length > 0) {
    lines.push('   |');

    const maxLineNumber = Math.max(
      ...error.sourceSnippet.lines.map((l) => l.lineNumber)
    );
    const lineNumberWidth = String(maxLineNumber).length;

    for (const line of error.sourceSnippet.lines) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`);

      if (line.isErrorLine && error.span) {
        const caret = renderCaretUnderline(error.span, line.content);
        const padding = ' '.repeat(lineNumberWidth);
        lines.push(` ${padding} | ${caret}`);
      }
    }
    lines.push('   |');
  }

  if (options.verbose && error.cause) {
    lines.push(`   = note: ${error.cause}`);
  }

  for (const suggestion of error.suggestions ?? []) {
    lines.push(`   = help: ${suggestion}`);
  }

  return lines.join('\n');
}

interface LspPosition {
  line: number;
  character: number;
}

/**
 * Format error in JSON format (LSP Diagnostic compatible).
 * Lines and characters are 0-based.
 */
function formatErrorJson(error: EnrichedError, options: FormatOptions): string {
  const diagnostic: {
    errorId: string;
    severity: number;
    message: string;
    range?: { start: LspPosition; end: LspPosition };
    source: string;
    code: string;
    file?: string;
    suggestions?: string[];
    cause?: string;
  } = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'tapewright',
    code: error.errorId,
  };

  if (error.span) {
    diagnostic.range = {
      start: {
        line: error.span.start.line - 1,
        character: error.span.start.column - 1,
      },
      end: {
        line: error.span.end.line - 1,
        character: error.span.end.column - 1,
      },
    };
  }

  if (options.fileName !== undefined) {
    diagnostic.file = options.fileName;
  }

  if (error.suggestions && error.suggestions.length > 0) {
    diagnostic.suggestions = [...error.suggestions];
  }

  if (options.verbose && error.cause) {
    diagnostic.cause = error.cause;
  }

  return JSON.stringify(diagnostic, null, 2);
}

/**
 * Format error in compact format (single line for CI).
 */
function formatErrorCompact(
  error: EnrichedError,
  options: FormatOptions
): string {
  const parts: string[] = [`[${error.errorId}]`, error.message];

  if (error.span) {
    parts.push(`at ${locationLabel(error.span, options.fileName)}`);
  }

  return parts.join(' ');
}

function locationLabel(span: SourceSpan, fileName: string | undefined): string {
  const location = `${span.start.line}:${span.start.column}`;
  return fileName === undefined ? location : `${fileName}:${location}`;
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render caret underline for error span (1-based columns).
 *
 * - Single-char: single ^
 * - Multi-char same line: ^^^^^ (length = span width)
 * - Multi-line: carets to the end of the first line
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : lineContent.length + 1;

  const padding = ' '.repeat(Math.max(0, startColumn - 1));
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));

  return padding + carets;
}
