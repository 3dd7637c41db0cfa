/**
 * Terminal Renderer
 * Draws debugger frames: input, memory, output and code windows
 */

import * as readline from 'node:readline';
import type { BufferOutput, Frame, InputSource, Program } from '@tapewright/core';
import {
  CELL_WIDTH,
  cellsPerRow,
  followPointer,
  regionBounds,
  type CellWindow,
} from './viewport.js';

export interface RendererOptions {
  readonly program: Program;
  readonly source: string;
  /** Literal input text, when input comes from a string */
  readonly inputText?: string | undefined;
  readonly input: InputSource;
  readonly output: BufferOutput;
  readonly width: number;
  readonly now?: (() => number) | undefined;
}

/** Replace control characters so every buffer renders on one row */
function flatten(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]/g, ' ');
}

/**
 * Instructions per second over the last full second of frames.
 */
export class RateMeter {
  private windowStart: number;
  private windowExecuted = 0;
  private rate = 0;

  constructor(private readonly now: () => number) {
    this.windowStart = now();
  }

  record(executed: number): number {
    const now = this.now();
    const elapsed = now - this.windowStart;
    if (elapsed >= 1000) {
      this.rate = ((executed - this.windowExecuted) * 1000) / elapsed;
      this.windowStart = now;
      this.windowExecuted = executed;
    }
    return this.rate;
  }
}

export class FrameRenderer {
  private memoryWindow: CellWindow | undefined;
  private readonly meter: RateMeter;
  private readonly code: string;

  constructor(private readonly options: RendererOptions) {
    this.meter = new RateMeter(options.now ?? (() => performance.now()));
    this.code = flatten(options.source);
  }

  /** Render a frame as screen rows */
  render(frame: Frame): string[] {
    const { width, program, input } = this.options;
    const { execution, debugger: state } = frame;
    const rows: string[] = [];

    if (this.options.inputText !== undefined) {
      const text = flatten(this.options.inputText);
      // Repeating input keeps counting past the end of the text
      const pos =
        input.position <= text.length
          ? input.position
          : input.position % text.length;
      rows.push(...this.region('Input', text, pos), '');
    }

    rows.push(`Pos: ${execution.pc}`, '');

    const count = cellsPerRow(width);
    const window = followPointer(
      this.memoryWindow,
      execution.pointer,
      count,
      execution.tapeLength
    );
    this.memoryWindow = window;
    const cells = Array.from(execution.cells(window.start, window.end), (cell) =>
      String(cell).padStart(3, '0')
    );
    rows.push(
      'Memory:',
      cells.join(' '),
      `${' '.repeat((execution.pointer - window.start) * CELL_WIDTH)}^`,
      '',
      `Pointer: ${execution.pointer}`,
      ''
    );

    const output = flatten(this.options.output.text());
    rows.push(...this.region('Output', output, output.length), '');

    const instruction = program.instructions[execution.pc];
    const codePos = instruction?.location.offset ?? this.code.length;
    rows.push(...this.region('Code', this.code, codePos), '');

    const rate = this.meter.record(state.executed);
    const status = execution.halted ? 'halted' : state.mode;
    rows.push(
      `Mode: ${status} (${frame.reason})  Steps: ${execution.steps}`,
      `Update frequency: 1/${state.throttle} instructions displayed`,
      `Ops/s: ${rate.toFixed(2)}`
    );

    return rows;
  }

  private region(label: string, text: string, pos: number): string[] {
    const { start, end, rel } = regionBounds(this.options.width, text.length, pos);
    return [`${label}:`, text.slice(start, end), `${' '.repeat(rel)}^`];
  }
}

/** Clear the screen and draw rows from the top-left corner */
export function drawRows(stream: NodeJS.WritableStream, rows: readonly string[]): void {
  readline.cursorTo(stream, 0, 0);
  readline.clearScreenDown(stream);
  stream.write(rows.join('\n'));
  stream.write('\n');
}
