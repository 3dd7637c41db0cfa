/**
 * Keyboard Decoding
 * Maps terminal keypresses onto debugger key events
 */

import * as readline from 'node:readline';
import type { KeyEvent, KeyQueue } from '@tapewright/core';

/** Subset of readline's keypress descriptor that decoding looks at */
export interface Keypress {
  readonly name?: string | undefined;
  readonly ctrl?: boolean | undefined;
  readonly sequence?: string | undefined;
}

/**
 * c continue, p pause, q or Ctrl-C quit, Up/Down speed.
 * Any other key is a step key.
 */
export function decodeKey(
  str: string | undefined,
  key: Keypress | undefined
): KeyEvent | undefined {
  if (key?.ctrl && key.name === 'c') {
    return { kind: 'quit' };
  }

  switch (key?.name) {
    case 'q':
      return { kind: 'quit' };
    case 'c':
      return { kind: 'continue' };
    case 'p':
      return { kind: 'pause' };
    case 'up':
      return { kind: 'speed-up' };
    case 'down':
      return { kind: 'speed-down' };
  }

  const name = key?.name ?? str ?? key?.sequence;
  if (name === undefined || name === '') {
    return undefined;
  }
  return { kind: 'step', key: name };
}

/**
 * Feed keypresses from a terminal into `queue`. Raw mode is enabled on TTYs
 * so keys arrive without Enter. End of input counts as quit.
 * Returns a function that detaches and restores the terminal.
 */
export function attachKeyboard(
  input: NodeJS.ReadStream,
  queue: KeyQueue
): () => void {
  readline.emitKeypressEvents(input);

  const raw = input.isTTY === true;
  if (raw) {
    input.setRawMode?.(true);
  }

  const onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
    const event = decodeKey(str, key);
    if (event !== undefined) {
      queue.push(event);
    }
  };
  const onEnd = (): void => {
    queue.push({ kind: 'quit' });
  };

  input.on('keypress', onKeypress);
  input.on('end', onEnd);
  input.resume();

  return () => {
    input.off('keypress', onKeypress);
    input.off('end', onEnd);
    if (raw) {
      input.setRawMode?.(false);
    }
    input.pause();
  };
}
