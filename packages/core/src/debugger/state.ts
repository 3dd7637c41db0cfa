/**
 * Debugger State Machine
 * Pure transitions between paused and running
 */

import type { KeyEvent } from './keys.js';

export type DebuggerMode = 'paused' | 'running';

export interface DebuggerState {
  readonly mode: DebuggerMode;
  /** Instructions executed per redraw while running */
  readonly throttle: number;
  /** Instructions left before the next throttled redraw */
  readonly countdown: number;
  readonly quitRequested: boolean;
  /** Instructions executed in this session */
  readonly executed: number;
}

export interface DebuggerLimits {
  readonly maxThrottle: number;
}

export const DEFAULT_THROTTLE = 1;
export const DEFAULT_MAX_THROTTLE = 1_048_576;

/**
 * What the controller must do after a key:
 * - none: keep going
 * - step: execute one instruction and redraw
 * - pause: redraw once in the paused state
 * - quit: stop without executing anything further
 */
export type KeyEffect = 'none' | 'step' | 'pause' | 'quit';

export interface Transition {
  readonly state: DebuggerState;
  readonly effect: KeyEffect;
}

export function createDebuggerState(
  throttle: number = DEFAULT_THROTTLE
): DebuggerState {
  return Object.freeze({
    mode: 'paused',
    throttle,
    countdown: throttle,
    quitRequested: false,
    executed: 0,
  });
}

/** Apply one key event; never touches execution state */
export function applyKey(
  state: DebuggerState,
  key: KeyEvent,
  limits: DebuggerLimits
): Transition {
  if (key.kind === 'quit') {
    return transition({ ...state, quitRequested: true }, 'quit');
  }

  switch (state.mode) {
    case 'paused':
      if (key.kind === 'continue') {
        return transition(
          { ...state, mode: 'running', countdown: state.throttle },
          'none'
        );
      }
      return transition(state, 'step');

    case 'running':
      switch (key.kind) {
        case 'pause':
          return transition({ ...state, mode: 'paused' }, 'pause');
        case 'speed-up':
          return transition(
            withThrottle(state, Math.min(state.throttle * 2, limits.maxThrottle)),
            'none'
          );
        case 'speed-down':
          return transition(
            withThrottle(state, Math.max(1, Math.floor(state.throttle / 2))),
            'none'
          );
        case 'continue':
        case 'step':
          return transition(state, 'none');
      }
  }
}

/**
 * Count one executed instruction. While running, reports whether the
 * throttle countdown ran out and a redraw is due.
 */
export function recordStep(state: DebuggerState): {
  readonly state: DebuggerState;
  readonly redraw: boolean;
} {
  const executed = state.executed + 1;
  if (state.mode === 'paused') {
    return { state: Object.freeze({ ...state, executed }), redraw: true };
  }

  const countdown = state.countdown - 1;
  if (countdown <= 0) {
    return {
      state: Object.freeze({ ...state, executed, countdown: state.throttle }),
      redraw: true,
    };
  }
  return {
    state: Object.freeze({ ...state, executed, countdown }),
    redraw: false,
  };
}

function withThrottle(state: DebuggerState, throttle: number): DebuggerState {
  return { ...state, throttle, countdown: Math.min(state.countdown, throttle) };
}

function transition(state: DebuggerState, effect: KeyEffect): Transition {
  return { state: Object.freeze(state), effect };
}
