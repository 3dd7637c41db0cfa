/**
 * Tape Execution Engine
 *
 * Executes one instruction per step() against the tape, data pointer and
 * program counter. Input and output are surfaced as step outcomes; the
 * engine never performs I/O itself.
 */

import { createError } from '../error-classes.js';
import type { Instruction, Program } from '../instructions.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Tape } from './tape.js';
import {
  DEFAULT_MAX_TAPE_SIZE,
  DEFAULT_TAPE_SIZE,
  type EofPolicy,
  type ExecutionSnapshot,
  type ExecutionState,
  type MachineOptions,
  type ObservabilityCallbacks,
  type PointerPolicy,
  type StepOutcome,
  type TapeView,
} from './types.js';

const CONTINUED: StepOutcome = Object.freeze({ kind: 'continued' });
const HALTED: StepOutcome = Object.freeze({ kind: 'halted' });
const NEEDS_INPUT: StepOutcome = Object.freeze({ kind: 'needs-input' });

export class Machine implements ExecutionState {
  readonly program: Program;
  private readonly cells: Tape;
  private readonly initialTapeSize: number;
  private readonly pointerPolicy: PointerPolicy;
  private readonly eofPolicy: EofPolicy;
  private readonly observability: ObservabilityCallbacks;

  private dataPointer = 0;
  private counter = 0;
  private isHalted = false;
  private awaitingInput = false;
  private executed = 0;

  constructor(program: Program, options: MachineOptions = {}) {
    this.program = program;
    this.initialTapeSize = options.initialTapeSize ?? DEFAULT_TAPE_SIZE;
    this.cells = new Tape(
      this.initialTapeSize,
      options.maxTapeSize ?? DEFAULT_MAX_TAPE_SIZE
    );
    this.pointerPolicy = options.pointerPolicy ?? 'clamp';
    this.eofPolicy = options.eofPolicy ?? 'zero';
    this.observability = options.observability ?? {};
  }

  get tape(): TapeView {
    return this.cells;
  }

  get pointer(): number {
    return this.dataPointer;
  }

  get pc(): number {
    return this.counter;
  }

  get halted(): boolean {
    return this.isHalted;
  }

  /** Instructions completed since construction or the last reset() */
  get steps(): number {
    return this.executed;
  }

  /** True once the program counter has moved past the last instruction */
  get atEnd(): boolean {
    return this.counter >= this.program.instructions.length;
  }

  /** True while a `,` waits for supplyInput() */
  get pendingInput(): boolean {
    return this.awaitingInput;
  }

  /**
   * Execute the instruction at the program counter.
   *
   * Stepping past the end sets `halted`; stepping a halted machine is a
   * no-op that reports `halted` again. A pending `,` keeps reporting
   * `needs-input` until supplyInput() is called.
   */
  step(): StepOutcome {
    if (this.isHalted) {
      return HALTED;
    }
    if (this.awaitingInput) {
      return NEEDS_INPUT;
    }

    const instruction = this.program.instructions[this.counter];
    if (instruction === undefined) {
      this.isHalted = true;
      return HALTED;
    }

    return this.execute(instruction);
  }

  /**
   * Complete a pending `,` with the next input byte, or undefined when the
   * input source is exhausted (the EOF policy then applies).
   *
   * @throws RuntimeError TAPE-R003 when no input is pending
   */
  supplyInput(byte: number | undefined): void {
    const instruction = this.program.instructions[this.counter];
    if (!this.awaitingInput || instruction === undefined) {
      throw createError(
        'TAPE-R003',
        { pc: this.counter },
        instruction?.location
      );
    }

    if (byte !== undefined) {
      this.cells.set(this.dataPointer, byte);
    } else if (this.eofPolicy === 'zero') {
      this.cells.set(this.dataPointer, 0);
    }

    this.awaitingInput = false;
    this.advance();
  }

  snapshot(): ExecutionSnapshot {
    const tape = this.cells;
    return Object.freeze({
      pc: this.counter,
      pointer: this.dataPointer,
      halted: this.isHalted,
      awaitingInput: this.awaitingInput,
      steps: this.executed,
      tapeLength: tape.length,
      cell: tape.get(this.dataPointer),
      cells: (start: number, end: number) => tape.slice(start, end),
    });
  }

  /** Return to the initial state: zeroed tape, pointer and counter at 0 */
  reset(): void {
    this.cells.clear(this.initialTapeSize);
    this.dataPointer = 0;
    this.counter = 0;
    this.isHalted = false;
    this.awaitingInput = false;
    this.executed = 0;
  }

  // ============================================================
  // INSTRUCTION SEMANTICS
  // ============================================================

  private execute(instruction: Instruction): StepOutcome {
    switch (instruction.type) {
      case TOKEN_TYPES.MOVE_RIGHT:
        this.moveRight(instruction);
        return this.advance();

      case TOKEN_TYPES.MOVE_LEFT:
        this.moveLeft(instruction);
        return this.advance();

      case TOKEN_TYPES.INCREMENT:
        this.cells.increment(this.dataPointer);
        return this.advance();

      case TOKEN_TYPES.DECREMENT:
        this.cells.decrement(this.dataPointer);
        return this.advance();

      case TOKEN_TYPES.OUTPUT: {
        const byte = this.cells.get(this.dataPointer);
        this.advance();
        return { kind: 'output', byte };
      }

      case TOKEN_TYPES.INPUT:
        this.awaitingInput = true;
        return NEEDS_INPUT;

      case TOKEN_TYPES.LOOP_OPEN:
        if (this.cells.get(this.dataPointer) === 0) {
          return this.jumpPast(instruction.partner);
        }
        return this.advance();

      case TOKEN_TYPES.LOOP_CLOSE:
        if (this.cells.get(this.dataPointer) !== 0) {
          return this.jumpPast(instruction.partner);
        }
        return this.advance();
    }
  }

  private moveRight(instruction: Instruction): void {
    const next = this.dataPointer + 1;
    if (next >= this.cells.maxSize) {
      throw createError(
        'TAPE-R002',
        { maxSize: this.cells.maxSize, pointer: next, pc: this.counter },
        instruction.location
      );
    }
    const previous = this.cells.ensure(next);
    if (previous !== null) {
      this.observability.onTapeGrow?.({ from: previous, to: this.cells.length });
    }
    this.dataPointer = next;
  }

  private moveLeft(instruction: Instruction): void {
    if (this.dataPointer > 0) {
      this.dataPointer--;
      return;
    }

    switch (this.pointerPolicy) {
      case 'clamp':
        return;
      case 'wrap':
        this.dataPointer = this.cells.length - 1;
        return;
      case 'error':
        throw createError(
          'TAPE-R001',
          { pc: this.counter },
          instruction.location
        );
    }
  }

  private advance(): StepOutcome {
    this.counter++;
    this.executed++;
    return CONTINUED;
  }

  /** Land on the instruction after a loop partner */
  private jumpPast(partner: number): StepOutcome {
    this.counter = partner + 1;
    this.executed++;
    return CONTINUED;
  }
}
