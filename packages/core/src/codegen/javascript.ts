/**
 * JavaScript Generator
 *
 * Emits a self-contained ES module that runs the program under Node.js.
 * Repeated tokens become a single statement, which keeps the generated
 * text small.
 */

import { ConfigError } from '../error-classes.js';
import type { Program } from '../instructions.js';
import { TOKEN_TYPES } from '../token-types.js';
import { VERSION } from '../version.js';
import { segment, type Repeated, type Segment } from './segments.js';

// ============================================================
// OPTIONS
// ============================================================

export type CellSize = 8 | 16 | 32;

/**
 * How generated code treats the pointer at the memory boundaries:
 * - wrap: modulo the memory size
 * - clamp: stop at the first or last cell
 * - none: no checks
 */
export type PointerSafety = 'wrap' | 'clamp' | 'none';

/** What `,` stores once input runs out: nothing, 0, or a fixed byte */
export type CodegenEof = 'unchanged' | 'zero' | number;

export const CELL_SIZES: readonly CellSize[] = [8, 16, 32];
export const POINTER_SAFETY_MODES: readonly PointerSafety[] = [
  'wrap',
  'clamp',
  'none',
];

export const DEFAULT_MEMORY_SIZE = 30_000;

/** Pending output bytes that trigger a flush to stdout */
const FLUSH_THRESHOLD = 4096;

export interface GenerateOptions {
  readonly cellSize?: CellSize | undefined;
  readonly memorySize?: number | undefined;
  readonly pointerSafety?: PointerSafety | undefined;
  readonly eof?: CodegenEof | undefined;
  /** Used as the program's input instead of reading stdin */
  readonly fixedInput?: string | undefined;
  /** Named in the header comment */
  readonly sourceName?: string | undefined;
  /** Collapse repeated tokens (default true) */
  readonly compress?: boolean | undefined;
}

const ARRAY_TYPES: Record<CellSize, string> = {
  8: 'Uint8Array',
  16: 'Uint16Array',
  32: 'Uint32Array',
};

const INDENT = '  ';

// ============================================================
// GENERATION
// ============================================================

export function generateJavaScript(
  program: Program,
  options: GenerateOptions = {}
): string {
  const cellSize = options.cellSize ?? 8;
  const memorySize = options.memorySize ?? DEFAULT_MEMORY_SIZE;
  const pointerSafety = options.pointerSafety ?? 'none';
  const eof = options.eof ?? 'unchanged';

  if (!Number.isSafeInteger(memorySize) || memorySize < 1) {
    throw new ConfigError(
      `memorySize must be a positive integer, got ${memorySize}`
    );
  }
  if (typeof eof === 'number' && !isByte(eof)) {
    throw new ConfigError(`eof byte must be between 0 and 255, got ${eof}`);
  }

  const header = options.sourceName
    ? `// Generated by tapewright ${VERSION} from ${options.sourceName}`
    : `// Generated by tapewright ${VERSION}`;

  const lines: string[] = [header];

  if (program.needsInput && options.fixedInput === undefined) {
    lines.push("import { readFileSync } from 'node:fs';");
  }

  lines.push(
    '',
    `const MEM_SIZE = ${memorySize};`,
    `const tape = new ${ARRAY_TYPES[cellSize]}(MEM_SIZE);`,
    'let pointer = 0;',
    'const output = [];',
    '',
    'function flush() {',
    `${INDENT}process.stdout.write(Uint8Array.from(output));`,
    `${INDENT}output.length = 0;`,
    '}',
    '',
    'function put(value, count) {',
    `${INDENT}for (let i = 0; i < count; i++) {`,
    `${INDENT}${INDENT}output.push(value & 0xff);`,
    `${INDENT}}`,
    `${INDENT}if (output.length >= ${FLUSH_THRESHOLD}) {`,
    `${INDENT}${INDENT}flush();`,
    `${INDENT}}`,
    '}'
  );

  if (program.needsInput) {
    lines.push(
      '',
      options.fixedInput === undefined
        ? 'const input = readFileSync(0);'
        : `const input = new TextEncoder().encode(${JSON.stringify(options.fixedInput)});`,
      'let inputPos = 0;'
    );
  }

  const body = segment(program, { compress: options.compress ?? true });
  if (body.length > 0) {
    lines.push('');
    emitSegments(body, 0, { pointerSafety, eof }, lines);
  }

  lines.push('', 'flush();', '');
  return lines.join('\n');
}

interface EmitContext {
  readonly pointerSafety: PointerSafety;
  readonly eof: CodegenEof;
}

function emitSegments(
  segments: readonly Segment[],
  depth: number,
  context: EmitContext,
  lines: string[]
): void {
  const pad = INDENT.repeat(depth);

  for (const seg of segments) {
    if (seg.kind === 'loop') {
      lines.push(`${pad}while (tape[pointer] !== 0) {`);
      emitSegments(seg.body, depth + 1, context, lines);
      lines.push(`${pad}}`);
      continue;
    }
    for (const repeated of seg.tokens) {
      for (const line of statement(repeated, context)) {
        lines.push(`${pad}${line}`);
      }
    }
  }
}

function statement(
  { token, count }: Repeated,
  { pointerSafety, eof }: EmitContext
): string[] {
  switch (token) {
    case TOKEN_TYPES.MOVE_RIGHT:
      return [moveRight(count, pointerSafety)];

    case TOKEN_TYPES.MOVE_LEFT:
      return [moveLeft(count, pointerSafety)];

    case TOKEN_TYPES.INCREMENT:
      return [`tape[pointer] += ${count};`];

    case TOKEN_TYPES.DECREMENT:
      return [`tape[pointer] -= ${count};`];

    case TOKEN_TYPES.OUTPUT:
      return [`put(tape[pointer], ${count});`];

    case TOKEN_TYPES.INPUT: {
      const read = [
        'if (inputPos < input.length) {',
        `${INDENT}tape[pointer] = input[inputPos++];`,
      ];
      if (eof === 'unchanged') {
        return [...read, '}'];
      }
      const fill = eof === 'zero' ? 0 : eof;
      return [...read, '} else {', `${INDENT}tape[pointer] = ${fill};`, '}'];
    }
  }
}

function moveRight(count: number, pointerSafety: PointerSafety): string {
  switch (pointerSafety) {
    case 'wrap':
      return `pointer = (pointer + ${count}) % MEM_SIZE;`;
    case 'clamp':
      return `pointer = Math.min(pointer + ${count}, MEM_SIZE - 1);`;
    case 'none':
      return `pointer += ${count};`;
  }
}

function moveLeft(count: number, pointerSafety: PointerSafety): string {
  switch (pointerSafety) {
    case 'wrap':
      return `pointer = ((pointer - ${count}) % MEM_SIZE + MEM_SIZE) % MEM_SIZE;`;
    case 'clamp':
      return `pointer = Math.max(pointer, ${count}) - ${count};`;
    case 'none':
      return `pointer -= ${count};`;
  }
}

function isByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}
