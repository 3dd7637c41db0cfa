/**
 * Error Classes and Factory
 * Structured error types keyed by registry error IDs
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TapeErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all tapewright errors.
 * Provides structured data for host applications to format as needed.
 */
export class TapeError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TapeErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TapeError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TapeErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TapeErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Loop resolution errors; execution never starts */
export class ParseError extends TapeError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

/** Errors raised while the engine runs a program */
export class RuntimeError extends TapeError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
  }
}

/** Configuration file and command-line option errors */
export class ConfigError extends TapeError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super({
      errorId: 'TAPE-C001',
      message: renderMessage(requireTemplate('TAPE-C001'), { reason }),
      context: { reason, ...context },
    });
    this.name = 'ConfigError';
  }
}

function requireTemplate(errorId: string): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return definition.messageTemplate;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template with
 * `context` and picking the class that matches the error's category.
 *
 * @example
 * createError('TAPE-R004', { maxSteps: 100 })
 * // RuntimeError: "Program did not halt within 100 steps"
 *
 * @example
 * createError('TAPE-X999', {})
 * // Throws: TypeError("Unknown error ID: TAPE-X999")
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): TapeError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'parse':
      if (!location) {
        throw new TypeError(`Parse error ${errorId} requires a location`);
      }
      return new ParseError(errorId, message, location, context);
    case 'runtime':
      return new RuntimeError(errorId, message, location, context);
    case 'config':
      return new ConfigError(String(context['reason'] ?? ''), context);
  }
}
