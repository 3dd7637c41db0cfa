/**
 * Debugger Module
 * Interactive stepping and throttled running
 */

export {
  createKeyQueue,
  type KeyEvent,
  type KeyKind,
  type KeyQueue,
  type KeySource,
} from './keys.js';
export {
  applyKey,
  createDebuggerState,
  DEFAULT_MAX_THROTTLE,
  DEFAULT_THROTTLE,
  recordStep,
  type DebuggerLimits,
  type DebuggerMode,
  type DebuggerState,
  type KeyEffect,
  type Transition,
} from './state.js';
export {
  createDebugSession,
  DEFAULT_YIELD_INTERVAL,
  type DebugSession,
  type DebugSessionOptions,
  type Frame,
  type RedrawReason,
  type SessionResult,
} from './controller.js';
