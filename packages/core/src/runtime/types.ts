/**
 * Runtime Types
 * Options, outcomes, snapshots and observability callbacks for the engine
 */

import type { Instruction } from '../instructions.js';

// ============================================================
// POLICIES
// ============================================================

/**
 * What `<` does at cell 0:
 * - clamp: stay at cell 0
 * - error: throw TAPE-R001
 * - wrap: jump to the tape's current last cell
 */
export type PointerPolicy = 'clamp' | 'error' | 'wrap';

/**
 * What `,` stores once the input source is exhausted:
 * - zero: store 0
 * - unchanged: leave the cell as it is
 */
export type EofPolicy = 'zero' | 'unchanged';

export const POINTER_POLICIES: readonly PointerPolicy[] = [
  'clamp',
  'error',
  'wrap',
];
export const EOF_POLICIES: readonly EofPolicy[] = ['zero', 'unchanged'];

export const DEFAULT_TAPE_SIZE = 30_000;
export const DEFAULT_MAX_TAPE_SIZE = 16_777_216;

// ============================================================
// OBSERVABILITY
// ============================================================

export interface StepEvent {
  readonly pc: number;
  readonly instruction: Instruction;
  readonly steps: number;
}

export interface InputEvent {
  readonly pc: number;
  /** undefined once the input source is exhausted */
  readonly byte: number | undefined;
}

export interface TapeGrowEvent {
  readonly from: number;
  readonly to: number;
}

export interface HaltEvent {
  readonly steps: number;
}

export interface ErrorEvent {
  readonly error: Error;
  readonly pc: number;
}

/**
 * Observability callbacks for monitoring execution.
 * All callbacks are optional and fire synchronously.
 */
export interface ObservabilityCallbacks {
  onStep?: ((event: StepEvent) => void) | undefined;
  onOutput?: ((byte: number) => void) | undefined;
  onInput?: ((event: InputEvent) => void) | undefined;
  onTapeGrow?: ((event: TapeGrowEvent) => void) | undefined;
  onHalt?: ((event: HaltEvent) => void) | undefined;
  onError?: ((event: ErrorEvent) => void) | undefined;
}

// ============================================================
// MACHINE
// ============================================================

export interface MachineOptions {
  /** Cells allocated up front (default 30 000) */
  readonly initialTapeSize?: number | undefined;
  /** Growth limit; moving past it throws TAPE-R002 */
  readonly maxTapeSize?: number | undefined;
  readonly pointerPolicy?: PointerPolicy | undefined;
  readonly eofPolicy?: EofPolicy | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
}

/** Result of executing (or attempting) one instruction */
export type StepOutcome =
  | { readonly kind: 'continued' }
  | { readonly kind: 'halted' }
  | { readonly kind: 'needs-input' }
  | { readonly kind: 'output'; readonly byte: number };

/** Read-only view of the tape */
export interface TapeView {
  readonly length: number;
  get(index: number): number;
  /** Copy of cells in [start, end); indices past the tape read as 0 */
  slice(start: number, end: number): Uint8Array;
}

/** Live engine state; only the engine mutates it */
export interface ExecutionState {
  readonly tape: TapeView;
  readonly pointer: number;
  readonly pc: number;
  readonly halted: boolean;
}

/** Frozen copy of the engine state for rendering and results */
export interface ExecutionSnapshot {
  readonly pc: number;
  readonly pointer: number;
  readonly halted: boolean;
  readonly awaitingInput: boolean;
  readonly steps: number;
  readonly tapeLength: number;
  /** Value of the cell under the pointer */
  readonly cell: number;
  cells(start: number, end: number): Uint8Array;
}
