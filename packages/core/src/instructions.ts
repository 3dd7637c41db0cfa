/**
 * Instruction Types
 * The resolved, indexed program shared by the engine and the code generator
 */

import type { SourceLocation } from './source-location.js';
import { TOKEN_TYPES, type TokenType } from './token-types.js';

// ============================================================
// INSTRUCTIONS
// ============================================================

export type LoopTokenType =
  | typeof TOKEN_TYPES.LOOP_OPEN
  | typeof TOKEN_TYPES.LOOP_CLOSE;

export type StraightTokenType = Exclude<TokenType, LoopTokenType>;

/** Any instruction other than a loop bracket */
export interface StraightInstruction {
  readonly type: StraightTokenType;
  readonly index: number;
  readonly location: SourceLocation;
}

/** Loop bracket carrying the index of its structural partner */
export interface LoopInstruction {
  readonly type: LoopTokenType;
  readonly index: number;
  readonly location: SourceLocation;
  readonly partner: number;
}

export type Instruction = StraightInstruction | LoopInstruction;

/**
 * Flat, frozen instruction sequence. Indices double as jump targets and
 * every loop bracket's partner is resolved.
 */
export interface Program {
  readonly instructions: readonly Instruction[];
  /** True when at least one `,` appears */
  readonly needsInput: boolean;
}

export function isLoopInstruction(
  instruction: Instruction
): instruction is LoopInstruction {
  return (
    instruction.type === TOKEN_TYPES.LOOP_OPEN ||
    instruction.type === TOKEN_TYPES.LOOP_CLOSE
  );
}
