/**
 * Program Execution
 *
 * Binds a machine to an input source and an output sink.
 * Provides both full execution and step-by-step execution.
 */

import { createError } from '../error-classes.js';
import type { Program } from '../instructions.js';
import { bufferOutput, emptyInput, type InputSource, type OutputSink } from './io.js';
import { Machine } from './machine.js';
import type {
  ExecutionSnapshot,
  MachineOptions,
  ObservabilityCallbacks,
  StepOutcome,
} from './types.js';

export interface RunOptions extends MachineOptions {
  /** Defaults to an exhausted source */
  readonly input?: InputSource | undefined;
  /** Defaults to an in-memory buffer */
  readonly output?: OutputSink | undefined;
}

export interface ExecuteOptions extends RunOptions {
  /** Instructions allowed before TAPE-R004; unbounded when omitted */
  readonly maxSteps?: number | undefined;
}

/** Outcome of one stepper call; `needs-input` never escapes the stepper */
export type StepResult = Exclude<StepOutcome, { readonly kind: 'needs-input' }>;

export interface ExecutionStepper {
  readonly machine: Machine;
  readonly done: boolean;
  /** Execute exactly one instruction */
  step(): StepResult;
  snapshot(): ExecutionSnapshot;
}

export interface ExecutionResult {
  readonly steps: number;
  /** Every byte the program wrote, in order */
  readonly output: Uint8Array;
  readonly snapshot: ExecutionSnapshot;
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Input requests are satisfied from the input source within the same call,
 * and output bytes are forwarded to the sink before the call returns.
 */
export function createStepper(
  program: Program,
  options: RunOptions = {}
): ExecutionStepper {
  const observability: ObservabilityCallbacks = options.observability ?? {};
  const machine = new Machine(program, options);
  const input = options.input ?? emptyInput();
  const output = options.output ?? bufferOutput();

  const run = (): StepResult => {
    const pc = machine.pc;
    const instruction = program.instructions[pc];
    const outcome = machine.step();

    switch (outcome.kind) {
      case 'halted':
        observability.onHalt?.({ steps: machine.steps });
        return outcome;

      case 'needs-input': {
        const byte = input.read();
        observability.onInput?.({ pc, byte });
        machine.supplyInput(byte);
        break;
      }

      case 'output':
        output.write(outcome.byte);
        observability.onOutput?.(outcome.byte);
        break;

      case 'continued':
        break;
    }

    if (instruction !== undefined) {
      observability.onStep?.({ pc, instruction, steps: machine.steps });
    }
    return outcome.kind === 'needs-input' ? { kind: 'continued' } : outcome;
  };

  return {
    machine,
    get done() {
      return machine.halted;
    },

    step(): StepResult {
      try {
        return run();
      } catch (error) {
        if (error instanceof Error) {
          observability.onError?.({ error, pc: machine.pc });
        }
        throw error;
      }
    },

    snapshot() {
      return machine.snapshot();
    },
  };
}

/**
 * Run a program until it halts.
 *
 * @throws RuntimeError TAPE-R004 when `maxSteps` instructions ran and the
 * program has not reached its end
 */
export function execute(
  program: Program,
  options: ExecuteOptions = {}
): ExecutionResult {
  const collected = bufferOutput();
  const sink = options.output;
  const stepper = createStepper(program, {
    ...options,
    output: {
      write(byte) {
        collected.write(byte);
        sink?.write(byte);
      },
    },
  });
  const { maxSteps } = options;

  while (!stepper.done) {
    const { machine } = stepper;
    if (maxSteps !== undefined && machine.steps >= maxSteps && !machine.atEnd) {
      const error = createError(
        'TAPE-R004',
        { maxSteps, pc: machine.pc },
        program.instructions[machine.pc]?.location
      );
      options.observability?.onError?.({ error, pc: machine.pc });
      throw error;
    }
    stepper.step();
  }

  const snapshot = stepper.snapshot();
  return { steps: snapshot.steps, output: collected.bytes(), snapshot };
}
