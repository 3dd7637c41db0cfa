/**
 * Debugger Controller
 *
 * Drives a stepper one instruction at a time while paused, or continuously
 * with throttled redraws while running. Runs on the single event loop and
 * never executes two steps concurrently.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ConfigError } from '../error-classes.js';
import type { Program } from '../instructions.js';
import {
  createStepper,
  type ExecutionStepper,
  type RunOptions,
} from '../runtime/execute.js';
import type { ExecutionSnapshot } from '../runtime/types.js';
import type { KeySource } from './keys.js';
import {
  applyKey,
  createDebuggerState,
  DEFAULT_MAX_THROTTLE,
  DEFAULT_THROTTLE,
  type DebuggerLimits,
  type DebuggerState,
  recordStep,
} from './state.js';

export const DEFAULT_YIELD_INTERVAL = 1024;

export type RedrawReason = 'step' | 'throttle' | 'pause' | 'halt';

export interface Frame {
  readonly reason: RedrawReason;
  readonly execution: ExecutionSnapshot;
  readonly debugger: DebuggerState;
}

export interface DebugSessionOptions extends RunOptions {
  readonly keys: KeySource;
  readonly redraw: (frame: Frame) => void;
  /** Initial instructions per redraw while running (default 1) */
  readonly throttle?: number | undefined;
  readonly maxThrottle?: number | undefined;
  /** Instructions between event-loop yields while running */
  readonly yieldInterval?: number | undefined;
}

export interface SessionResult {
  readonly reason: 'quit' | 'halted';
  readonly executed: number;
}

export interface DebugSession {
  readonly stepper: ExecutionStepper;
  readonly state: DebuggerState;
  snapshot(): ExecutionSnapshot;
  /** Resolves once the user quits or the program halts */
  run(): Promise<SessionResult>;
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function createDebugSession(
  program: Program,
  options: DebugSessionOptions
): DebugSession {
  const { keys, redraw } = options;
  const stepper = createStepper(program, options);
  const limits: DebuggerLimits = {
    maxThrottle: positiveInteger(
      'maxThrottle',
      options.maxThrottle ?? DEFAULT_MAX_THROTTLE
    ),
  };
  const yieldInterval = positiveInteger(
    'yieldInterval',
    options.yieldInterval ?? DEFAULT_YIELD_INTERVAL
  );
  let state = createDebuggerState(
    Math.min(
      positiveInteger('throttle', options.throttle ?? DEFAULT_THROTTLE),
      limits.maxThrottle
    )
  );
  let started = false;

  const draw = (reason: RedrawReason): void => {
    redraw({ reason, execution: stepper.snapshot(), debugger: state });
  };

  const finish = (reason: SessionResult['reason']): SessionResult => ({
    reason,
    executed: state.executed,
  });

  const advance = (): { halted: boolean; redraw: boolean } => {
    const result = stepper.step();
    if (result.kind === 'halted') {
      return { halted: true, redraw: true };
    }
    const counted = recordStep(state);
    state = counted.state;
    return { halted: false, redraw: counted.redraw };
  };

  const run = async (): Promise<SessionResult> => {
    let sinceYield = 0;

    for (;;) {
      if (state.mode === 'paused') {
        const transition = applyKey(state, await keys.next(), limits);
        state = transition.state;

        if (transition.effect === 'quit') {
          return finish('quit');
        }
        if (transition.effect === 'step') {
          const stepped = advance();
          if (stepped.halted) {
            draw('halt');
            return finish('halted');
          }
          draw('step');
        }
        continue;
      }

      const key = keys.poll();
      if (key !== undefined) {
        const transition = applyKey(state, key, limits);
        state = transition.state;
        if (transition.effect === 'quit') {
          return finish('quit');
        }
        if (transition.effect === 'pause') {
          draw('pause');
          continue;
        }
      }

      const stepped = advance();
      if (stepped.halted) {
        draw('halt');
        return finish('halted');
      }
      if (stepped.redraw) {
        draw('throttle');
      }

      sinceYield++;
      if (sinceYield >= yieldInterval) {
        sinceYield = 0;
        await yieldToEventLoop();
      }
    }
  };

  return {
    stepper,
    get state() {
      return state;
    },
    snapshot() {
      return stepper.snapshot();
    },
    run() {
      if (started) {
        return Promise.reject(new Error('Debug session already started'));
      }
      started = true;
      return run();
    },
  };
}
