/**
 * Runtime Module
 * Tape machine, runner and I/O
 */

export { Tape } from './tape.js';
export { Machine } from './machine.js';
export {
  bufferOutput,
  bytesInput,
  emptyInput,
  fdInput,
  repeatingInput,
  streamOutput,
  stringInput,
  type BufferOutput,
  type ByteWritable,
  type InputSource,
  type OutputSink,
} from './io.js';
export {
  createStepper,
  execute,
  type ExecuteOptions,
  type ExecutionResult,
  type ExecutionStepper,
  type RunOptions,
  type StepResult,
} from './execute.js';
export {
  DEFAULT_MAX_TAPE_SIZE,
  DEFAULT_TAPE_SIZE,
  EOF_POLICIES,
  POINTER_POLICIES,
  type EofPolicy,
  type ErrorEvent,
  type ExecutionSnapshot,
  type ExecutionState,
  type HaltEvent,
  type InputEvent,
  type MachineOptions,
  type ObservabilityCallbacks,
  type PointerPolicy,
  type StepEvent,
  type StepOutcome,
  type TapeGrowEvent,
  type TapeView,
} from './types.js';
