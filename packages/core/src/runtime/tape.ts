/**
 * Tape
 * Growable sequence of 8-bit cells with wraparound arithmetic
 */

import { ConfigError } from '../error-classes.js';
import {
  DEFAULT_MAX_TAPE_SIZE,
  DEFAULT_TAPE_SIZE,
  type TapeView,
} from './types.js';

export class Tape implements TapeView {
  private cells: Uint8Array;
  private extent: number;
  readonly maxSize: number;

  constructor(
    initialSize: number = DEFAULT_TAPE_SIZE,
    maxSize: number = DEFAULT_MAX_TAPE_SIZE
  ) {
    if (!Number.isSafeInteger(initialSize) || initialSize < 1) {
      throw new ConfigError(
        `initialTapeSize must be a positive integer, got ${initialSize}`
      );
    }
    if (!Number.isSafeInteger(maxSize) || maxSize < initialSize) {
      throw new ConfigError(
        `maxTapeSize must be an integer of at least ${initialSize}, got ${maxSize}`
      );
    }
    this.cells = new Uint8Array(initialSize);
    this.extent = initialSize;
    this.maxSize = maxSize;
  }

  /** Number of addressable cells; never shrinks */
  get length(): number {
    return this.extent;
  }

  get(index: number): number {
    return this.cells[index] ?? 0;
  }

  set(index: number, value: number): void {
    this.cells[index] = value & 0xff;
  }

  increment(index: number): void {
    this.set(index, this.get(index) + 1);
  }

  decrement(index: number): void {
    this.set(index, this.get(index) - 1);
  }

  /**
   * Extend the tape so `index` is addressable, zero-filling new cells.
   * Backing storage doubles so repeated single-cell moves stay amortized.
   * Returns the previous length when the tape grew, otherwise null.
   */
  ensure(index: number): number | null {
    if (index < this.extent) {
      return null;
    }
    if (index >= this.maxSize) {
      throw new RangeError(
        `Cell ${index} is past the tape limit of ${this.maxSize}`
      );
    }

    if (index >= this.cells.length) {
      const capacity = Math.min(
        this.maxSize,
        Math.max(index + 1, this.cells.length * 2)
      );
      const grown = new Uint8Array(capacity);
      grown.set(this.cells);
      this.cells = grown;
    }

    const previous = this.extent;
    this.extent = index + 1;
    return previous;
  }

  slice(start: number, end: number): Uint8Array {
    const from = Math.max(0, start);
    const to = Math.max(from, end);
    const out = new Uint8Array(to - from);
    const available = Math.min(to, this.extent);
    if (available > from) {
      out.set(this.cells.subarray(from, available));
    }
    return out;
  }

  /** Zero every cell and return to the initial length */
  clear(initialSize: number): void {
    this.cells = new Uint8Array(initialSize);
    this.extent = initialSize;
  }
}
