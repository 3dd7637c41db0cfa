/**
 * Key Events
 * Abstract debugger commands and the sources that deliver them
 */

export type KeyEvent =
  | { readonly kind: 'continue' }
  | { readonly kind: 'pause' }
  | { readonly kind: 'quit' }
  | { readonly kind: 'speed-up' }
  | { readonly kind: 'speed-down' }
  | { readonly kind: 'step'; readonly key: string };

export type KeyKind = KeyEvent['kind'];

/**
 * Where the debugger reads keys from.
 * poll() never blocks; next() is only awaited while paused.
 */
export interface KeySource {
  poll(): KeyEvent | undefined;
  next(): Promise<KeyEvent>;
}

/** Key source fed by push(), for terminals and tests alike */
export interface KeyQueue extends KeySource {
  push(event: KeyEvent): void;
  readonly size: number;
}

export function createKeyQueue(): KeyQueue {
  const buffered: KeyEvent[] = [];
  const waiters: ((event: KeyEvent) => void)[] = [];

  return {
    push(event) {
      const waiter = waiters.shift();
      if (waiter) {
        waiter(event);
      } else {
        buffered.push(event);
      }
    },

    poll() {
      return buffered.shift();
    },

    next() {
      const event = buffered.shift();
      if (event !== undefined) {
        return Promise.resolve(event);
      }
      return new Promise<KeyEvent>((resolve) => {
        waiters.push(resolve);
      });
    },

    get size() {
      return buffered.length;
    },
  };
}
