/**
 * Segments
 *
 * Tree form of a program for code generation: straight-line runs of
 * non-bracket tokens and loops holding nested segments.
 */

import {
  isLoopInstruction,
  type Program,
  type StraightTokenType,
} from '../instructions.js';
import { TOKEN_TYPES } from '../token-types.js';

/** A token together with how many times it repeats back to back */
export interface Repeated {
  readonly token: StraightTokenType;
  readonly count: number;
}

export type Segment =
  | { readonly kind: 'executable'; readonly tokens: readonly Repeated[] }
  | { readonly kind: 'loop'; readonly body: readonly Segment[] };

export interface SegmentOptions {
  /** Collapse runs of identical tokens (default true) */
  readonly compress?: boolean | undefined;
}

/**
 * Collapse consecutive identical tokens into `{ token, count }`.
 * Input is never merged: each `,` consumes its own byte.
 */
export function compress(tokens: readonly StraightTokenType[]): Repeated[] {
  const out: Repeated[] = [];
  let index = 0;

  while (index < tokens.length) {
    const token = tokens[index];
    if (token === undefined) break;

    let count = 1;
    if (token !== TOKEN_TYPES.INPUT) {
      while (tokens[index + count] === token) {
        count++;
      }
    }

    out.push({ token, count });
    index += count;
  }

  return out;
}

/**
 * Build the segment tree using each loop's resolved partner, so no
 * bracket matching happens here.
 */
export function segment(
  program: Program,
  options: SegmentOptions = {}
): Segment[] {
  const shouldCompress = options.compress ?? true;
  const { instructions } = program;

  const build = (start: number, end: number): Segment[] => {
    const segments: Segment[] = [];
    let run: StraightTokenType[] = [];

    const flush = (): void => {
      if (run.length === 0) return;
      const tokens = shouldCompress
        ? compress(run)
        : run.map((token) => ({ token, count: 1 }));
      segments.push({ kind: 'executable', tokens });
      run = [];
    };

    let index = start;
    while (index < end) {
      const instruction = instructions[index];
      if (instruction === undefined) break;

      if (isLoopInstruction(instruction)) {
        flush();
        segments.push({
          kind: 'loop',
          body: build(index + 1, instruction.partner),
        });
        index = instruction.partner + 1;
        continue;
      }

      run.push(instruction.type);
      index++;
    }

    flush();
    return segments;
  };

  return build(0, instructions.length);
}
