/**
 * Machine Tests
 * Instruction semantics, policies and the halt and input protocol
 */

import { describe, expect, it } from 'vitest';
import {
  Machine,
  parse,
  RuntimeError,
  type MachineOptions,
  type TapeGrowEvent,
} from '@tapewright/core';

/** Step until halted, feeding `input` bytes to each `,` */
function runToHalt(machine: Machine, input: number[] = []): number[] {
  const output: number[] = [];
  for (;;) {
    const outcome = machine.step();
    if (outcome.kind === 'halted') return output;
    if (outcome.kind === 'output') output.push(outcome.byte);
    if (outcome.kind === 'needs-input') machine.supplyInput(input.shift());
  }
}

function machineFor(source: string, options: MachineOptions = {}): Machine {
  return new Machine(parse(source), options);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

describe('Machine', () => {
  it('starts at pc 0 and pointer 0 with a zeroed tape', () => {
    const machine = machineFor('+');
    expect(machine.pc).toBe(0);
    expect(machine.pointer).toBe(0);
    expect(machine.halted).toBe(false);
    expect(machine.tape.length).toBe(30000);
    expect(machine.tape.get(0)).toBe(0);
  });

  describe('halting', () => {
    it('reports halted on the step after the last instruction', () => {
      const machine = machineFor('+');
      expect(machine.step()).toEqual({ kind: 'continued' });
      expect(machine.halted).toBe(false);
      expect(machine.atEnd).toBe(true);
      expect(machine.step()).toEqual({ kind: 'halted' });
      expect(machine.halted).toBe(true);
    });

    it('halts an empty program on the first step', () => {
      const machine = machineFor('');
      expect(machine.step()).toEqual({ kind: 'halted' });
      expect(machine.steps).toBe(0);
    });

    it('keeps reporting halted without changing state', () => {
      const machine = machineFor('+');
      runToHalt(machine);
      expect(machine.step()).toEqual({ kind: 'halted' });
      expect(machine.pc).toBe(1);
      expect(machine.steps).toBe(1);
      expect(machine.tape.get(0)).toBe(1);
    });
  });

  describe('instructions', () => {
    it('runs a multiplication loop', () => {
      const machine = machineFor('++[>++<-]');
      runToHalt(machine);
      expect(machine.tape.get(0)).toBe(0);
      expect(machine.tape.get(1)).toBe(4);
      expect(machine.pointer).toBe(0);
    });

    it('skips a loop whose cell is zero', () => {
      const machine = machineFor('[-]>+');
      expect(machine.step()).toEqual({ kind: 'continued' });
      expect(machine.pc).toBe(3);
      runToHalt(machine);
      expect(machine.tape.get(0)).toBe(0);
      expect(machine.tape.get(1)).toBe(1);
      expect(machine.steps).toBe(3);
    });

    it('jumps from a close bracket to the instruction after its partner', () => {
      const machine = machineFor('++[-]');
      machine.step();
      machine.step();
      machine.step();
      machine.step();
      expect(machine.pc).toBe(4);
      machine.step();
      expect(machine.pc).toBe(3);
    });

    it('counts every executed instruction including jumps', () => {
      // + + [ - ] - ]  with the close taken once
      const machine = machineFor('++[-]');
      runToHalt(machine);
      expect(machine.steps).toBe(7);
    });

    it('wraps cell values in both directions', () => {
      const down = machineFor('-');
      runToHalt(down);
      expect(down.tape.get(0)).toBe(255);

      const up = machineFor('+'.repeat(256));
      runToHalt(up);
      expect(up.tape.get(0)).toBe(0);
    });

    it('reports the current cell as an output outcome', () => {
      const machine = machineFor('+++.');
      machine.step();
      machine.step();
      machine.step();
      expect(machine.step()).toEqual({ kind: 'output', byte: 3 });
      expect(machine.pc).toBe(4);
    });
  });

  describe('input protocol', () => {
    it('waits at a comma until input is supplied', () => {
      const machine = machineFor(',.');
      expect(machine.step()).toEqual({ kind: 'needs-input' });
      expect(machine.pc).toBe(0);
      expect(machine.pendingInput).toBe(true);
      expect(machine.step()).toEqual({ kind: 'needs-input' });

      machine.supplyInput(65);
      expect(machine.pendingInput).toBe(false);
      expect(machine.pc).toBe(1);
      expect(machine.steps).toBe(1);
      expect(machine.step()).toEqual({ kind: 'output', byte: 65 });
      expect(machine.step()).toEqual({ kind: 'halted' });
    });

    it('stores 0 at end of input under the zero policy', () => {
      const machine = machineFor('+,', { eofPolicy: 'zero' });
      runToHalt(machine);
      expect(machine.tape.get(0)).toBe(0);
    });

    it('leaves the cell alone at end of input under the unchanged policy', () => {
      const machine = machineFor('+,', { eofPolicy: 'unchanged' });
      runToHalt(machine);
      expect(machine.tape.get(0)).toBe(1);
    });

    it('rejects input when none is pending', () => {
      const machine = machineFor('+');
      const err = catchError(() => machine.supplyInput(1));
      expect(err).toBeInstanceOf(RuntimeError);
      if (err instanceof RuntimeError) {
        expect(err.errorId).toBe('TAPE-R003');
        expect(err.message).toBe('No input requested (instruction 0) at 1:1');
      }
    });

    it('rejects input after the program has ended', () => {
      const machine = machineFor('');
      const err = catchError(() => machine.supplyInput(undefined));
      expect(err).toBeInstanceOf(RuntimeError);
      if (err instanceof RuntimeError) {
        expect(err.message).toBe('No input requested (instruction 0)');
        expect(err.location).toBeUndefined();
      }
    });
  });

  describe('pointer policies', () => {
    it('clamp keeps the pointer at cell 0', () => {
      const machine = machineFor('<+');
      runToHalt(machine);
      expect(machine.pointer).toBe(0);
      expect(machine.tape.get(0)).toBe(1);
    });

    it('wrap moves to the last cell of the current tape', () => {
      const machine = machineFor('<+', {
        pointerPolicy: 'wrap',
        initialTapeSize: 5,
      });
      runToHalt(machine);
      expect(machine.pointer).toBe(4);
      expect(machine.tape.get(4)).toBe(1);
    });

    it('error throws TAPE-R001 at the offending instruction', () => {
      const machine = machineFor('+\n<', { pointerPolicy: 'error' });
      machine.step();
      const err = catchError(() => machine.step());
      expect(err).toBeInstanceOf(RuntimeError);
      if (err instanceof RuntimeError) {
        expect(err.errorId).toBe('TAPE-R001');
        expect(err.location).toEqual({ line: 2, column: 1, offset: 2 });
        expect(err.message).toBe(
          'Data pointer moved left of cell 0 (instruction 1) at 2:1'
        );
      }
    });
  });

  describe('tape growth', () => {
    it('grows the tape when moving right past its end', () => {
      const grown: TapeGrowEvent[] = [];
      const machine = machineFor('>>', {
        initialTapeSize: 2,
        maxTapeSize: 4,
        observability: { onTapeGrow: (event) => grown.push(event) },
      });
      runToHalt(machine);
      expect(machine.pointer).toBe(2);
      expect(machine.tape.length).toBe(3);
      expect(grown).toEqual([{ from: 2, to: 3 }]);
    });

    it('throws TAPE-R002 when the limit is reached', () => {
      const machine = machineFor('>>>', { initialTapeSize: 2, maxTapeSize: 3 });
      machine.step();
      machine.step();
      const err = catchError(() => machine.step());
      expect(err).toBeInstanceOf(RuntimeError);
      if (err instanceof RuntimeError) {
        expect(err.errorId).toBe('TAPE-R002');
        expect(err.context).toEqual({ maxSize: 3, pointer: 3, pc: 2 });
        expect(err.message).toBe('Tape cannot grow past 3 cells (pointer 3) at 1:3');
      }
      expect(machine.pointer).toBe(2);
    });
  });

  describe('snapshot and reset', () => {
    it('captures the current state', () => {
      const machine = machineFor('+>++');
      runToHalt(machine);
      const snapshot = machine.snapshot();
      expect(snapshot.pc).toBe(4);
      expect(snapshot.pointer).toBe(1);
      expect(snapshot.cell).toBe(2);
      expect(snapshot.steps).toBe(4);
      expect(snapshot.halted).toBe(true);
      expect(snapshot.awaitingInput).toBe(false);
      expect(Array.from(snapshot.cells(0, 3))).toEqual([1, 2, 0]);
      expect(Object.isFrozen(snapshot)).toBe(true);
    });

    it('reset returns to the initial state', () => {
      const machine = machineFor('+>+', { initialTapeSize: 1 });
      runToHalt(machine);
      machine.reset();
      expect(machine.pc).toBe(0);
      expect(machine.pointer).toBe(0);
      expect(machine.steps).toBe(0);
      expect(machine.halted).toBe(false);
      expect(machine.tape.length).toBe(1);
      expect(machine.tape.get(0)).toBe(0);
    });
  });
});
