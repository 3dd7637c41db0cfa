/**
 * Program dump for inspection (`tape-gen --dump-ast`)
 */

import type { Program } from '../instructions.js';
import { segment, type Segment, type SegmentOptions } from './segments.js';

export interface ProgramDump {
  readonly segments: readonly Segment[];
  readonly needsInput: boolean;
}

export function toDump(
  program: Program,
  options: SegmentOptions = {}
): ProgramDump {
  return { segments: segment(program, options), needsInput: program.needsInput };
}

/** Pretty-printed JSON of the program's segment tree */
export function dumpProgram(
  program: Program,
  options: SegmentOptions = {}
): string {
  return JSON.stringify(toDump(program, options), null, 2);
}
