/**
 * Error Registry
 * Central error definitions with message templates and documentation.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining the letter after the `TAPE-` prefix */
export type ErrorCategory = 'parse' | 'runtime' | 'config';

const CATEGORY_LETTERS: Record<ErrorCategory, string> = {
  parse: 'P',
  runtime: 'R',
  config: 'C',
};

/** Pattern every registered error ID follows */
export const ERROR_ID_PATTERN = /^TAPE-[PRC]\d{3}$/;

/**
 * Example demonstrating an error condition.
 * Rendered by `explainError()` for the --explain flag.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TAPE-{category letter}{3-digit} (e.g., TAPE-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short name used in diagnostics (e.g., UnmatchedLoopOpen) */
  readonly name: string;
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Read-only registry with lookup by error ID.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      const letter = CATEGORY_LETTERS[def.category];
      if (!ERROR_ID_PATTERN.test(def.errorId) || def.errorId[5] !== letter) {
        throw new TypeError(
          `Error ID ${def.errorId} does not match category ${def.category}`
        );
      }
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Parse Errors (TAPE-P0xx)
  {
    errorId: 'TAPE-P001',
    category: 'parse',
    name: 'UnmatchedLoopOpen',
    description: 'Unmatched loop open',
    messageTemplate: "Unmatched '['",
    cause:
      "A '[' has no ']' after it at the same nesting depth. The earliest unmatched bracket is reported.",
    resolution:
      "Add the missing ']' where the loop body ends, or delete the stray '['.",
    examples: [
      { description: 'Loop never closed', code: '+[>+' },
      { description: 'One close for two opens', code: '[[-]' },
    ],
  },
  {
    errorId: 'TAPE-P002',
    category: 'parse',
    name: 'UnmatchedLoopClose',
    description: 'Unmatched loop close',
    messageTemplate: "Unmatched ']'",
    cause: "A ']' appears with no open '[' before it.",
    resolution:
      "Add the matching '[' where the loop body starts, or delete the stray ']'.",
    examples: [
      { description: 'Close before any open', code: '+]' },
      { description: 'Extra close after a complete loop', code: '[-]]' },
    ],
  },

  // Runtime Errors (TAPE-R0xx)
  {
    errorId: 'TAPE-R001',
    category: 'runtime',
    name: 'PointerUnderflow',
    description: 'Data pointer moved left of cell 0',
    messageTemplate: 'Data pointer moved left of cell 0 (instruction {pc})',
    cause:
      "A '<' ran while the data pointer was at cell 0 and the pointer policy is 'error'.",
    resolution:
      "Fix the program's pointer arithmetic, or run with the 'clamp' or 'wrap' pointer policy.",
    examples: [{ description: 'Moving left from the start', code: '<+' }],
  },
  {
    errorId: 'TAPE-R002',
    category: 'runtime',
    name: 'TapeLimitExceeded',
    description: 'Tape grew past its maximum size',
    messageTemplate: 'Tape cannot grow past {maxSize} cells (pointer {pointer})',
    cause: 'The data pointer moved right past the configured maximum tape size.',
    resolution:
      'Raise runtime.maxTapeSize, or check the program for a runaway pointer loop.',
    examples: [{ description: 'Unbounded rightward scan', code: '+[>+]' }],
  },
  {
    errorId: 'TAPE-R003',
    category: 'runtime',
    name: 'NoPendingInput',
    description: 'Input supplied with no pending request',
    messageTemplate: 'No input requested (instruction {pc})',
    cause:
      "supplyInput() was called while the instruction at the program counter is not a pending ','.",
    resolution:
      "Only call supplyInput() after step() has returned a 'needs-input' outcome.",
  },
  {
    errorId: 'TAPE-R004',
    category: 'runtime',
    name: 'StepLimitExceeded',
    description: 'Step limit exceeded',
    messageTemplate: 'Program did not halt within {maxSteps} steps',
    cause: 'The program executed more instructions than the configured step limit.',
    resolution:
      'Raise runtime.maxSteps (or --max-steps), or check the program for an infinite loop.',
    examples: [{ description: 'Loop that never reaches zero', code: '+[]' }],
  },

  // Configuration Errors (TAPE-C0xx)
  {
    errorId: 'TAPE-C001',
    category: 'config',
    name: 'InvalidConfiguration',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause:
      'A configuration file or command-line option holds a value of the wrong type or outside its allowed range.',
    resolution:
      'Fix the reported key in .tapewright.yaml or the matching command-line flag.',
    examples: [
      {
        description: 'Unknown pointer policy',
        code: 'runtime:\n  pointerPolicy: bounce',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing `{name}` placeholders with context
 * values. Missing values render as an empty string; an unclosed brace returns
 * the template unchanged.
 *
 * @example
 * renderMessage('Program did not halt within {maxSteps} steps', { maxSteps: 10 })
 * // Returns: "Program did not halt within 10 steps"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
