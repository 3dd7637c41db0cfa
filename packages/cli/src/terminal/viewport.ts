/**
 * Viewport Math
 * Which slice of a long buffer fits on screen around a cursor
 */

export interface Bounds {
  readonly start: number;
  readonly end: number;
  /** Cursor column relative to `start` */
  readonly rel: number;
}

/**
 * Window of at most `width` characters of a buffer of `length`, starting
 * half a width before `pos` (never before 0).
 */
export function regionBounds(width: number, length: number, pos: number): Bounds {
  const start = Math.max(0, pos - Math.floor(width / 2));
  const end = Math.min(start + width, length);
  return { start, end, rel: pos - start };
}

export interface CellWindow {
  readonly start: number;
  readonly end: number;
}

/** Each cell renders as three digits and a space */
export const CELL_WIDTH = 4;

export function cellsPerRow(width: number): number {
  return Math.max(1, Math.floor(width / CELL_WIDTH));
}

/**
 * Scroll the memory window the least amount that keeps `pointer` visible.
 * The window never runs past the tape's current length.
 */
export function followPointer(
  window: CellWindow | undefined,
  pointer: number,
  count: number,
  tapeLength: number
): CellWindow {
  let start = window?.start ?? 0;

  if (pointer >= start + count) {
    start = pointer - count + 1;
  } else if (pointer < start) {
    start = pointer;
  }

  let end = start + count;
  if (end > tapeLength) {
    end = tapeLength;
    start = Math.max(0, end - count);
  }

  return { start, end };
}
