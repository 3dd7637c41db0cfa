/**
 * Runner Tests
 * Full execution, step limits, I/O wiring and observability
 */

import { describe, expect, it, vi } from 'vitest';
import {
  bufferOutput,
  createStepper,
  execute,
  parse,
  RuntimeError,
  streamOutput,
  stringInput,
} from '@tapewright/core';

const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe('execute', () => {
  it('collects output and counts steps', () => {
    // 8 x 8 + 1 = 65
    const result = execute(parse('++++++++[>++++++++<-]>+.'));
    expect(decode(result.output)).toBe('A');
    expect(result.steps).toBe(108);
    expect(result.snapshot.halted).toBe(true);
    expect(result.snapshot.pointer).toBe(1);
  });

  it('echoes input until end of input', () => {
    const result = execute(parse(',[.,]'), { input: stringInput('hi') });
    expect(decode(result.output)).toBe('hi');
  });

  it('treats missing input as exhausted', () => {
    const result = execute(parse('+,.'));
    expect(Array.from(result.output)).toEqual([0]);
  });

  it('forwards output to the given sink as well', () => {
    const sink = bufferOutput();
    const result = execute(parse('+.+.'), { output: sink });
    expect(Array.from(sink.bytes())).toEqual([1, 2]);
    expect(Array.from(result.output)).toEqual([1, 2]);
  });

  it('writes each byte to a stream', () => {
    const chunks: number[][] = [];
    const stream = {
      write(chunk: Uint8Array) {
        chunks.push(Array.from(chunk));
        return true;
      },
    };
    execute(parse('++.+.'), { output: streamOutput(stream) });
    expect(chunks).toEqual([[2], [3]]);
  });

  describe('step limit', () => {
    it('throws TAPE-R004 when the program does not halt in time', () => {
      let caught: unknown;
      try {
        execute(parse('+[]'), { maxSteps: 10 });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(RuntimeError);
      if (caught instanceof RuntimeError) {
        expect(caught.errorId).toBe('TAPE-R004');
        expect(caught.context).toEqual({ maxSteps: 10, pc: 2 });
        expect(caught.message).toBe('Program did not halt within 10 steps at 1:3');
      }
    });

    it('allows a program that ends exactly at the limit', () => {
      const result = execute(parse('+++'), { maxSteps: 3 });
      expect(result.steps).toBe(3);
      expect(result.snapshot.cell).toBe(3);
    });

    it('reports the step limit to onError', () => {
      const onError = vi.fn();
      expect(() =>
        execute(parse('+[]'), { maxSteps: 5, observability: { onError } })
      ).toThrow('Program did not halt within 5 steps');
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toMatchObject({ pc: 2 });
    });
  });

  describe('observability', () => {
    it('fires callbacks in execution order', () => {
      const log: string[] = [];
      execute(parse(',.'), {
        input: stringInput('A'),
        observability: {
          onStep: ({ pc, steps }) => log.push(`step ${pc} ${steps}`),
          onInput: ({ pc, byte }) => log.push(`input ${pc} ${byte ?? 'EOF'}`),
          onOutput: (byte) => log.push(`output ${byte}`),
          onHalt: ({ steps }) => log.push(`halt ${steps}`),
        },
      });
      expect(log).toEqual([
        'input 0 65',
        'step 0 1',
        'output 65',
        'step 1 2',
        'halt 2',
      ]);
    });

    it('reports end of input as undefined', () => {
      const onInput = vi.fn();
      execute(parse(','), { observability: { onInput } });
      expect(onInput).toHaveBeenCalledWith({ pc: 0, byte: undefined });
    });

    it('reports runtime errors before rethrowing them', () => {
      const onError = vi.fn();
      expect(() =>
        execute(parse('+<'), {
          pointerPolicy: 'error',
          observability: { onError },
        })
      ).toThrow(RuntimeError);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toMatchObject({ pc: 1 });
    });
  });
});

describe('createStepper', () => {
  it('executes one instruction per call', () => {
    const stepper = createStepper(parse('+.'));
    expect(stepper.done).toBe(false);
    expect(stepper.step()).toEqual({ kind: 'continued' });
    expect(stepper.step()).toEqual({ kind: 'output', byte: 1 });
    expect(stepper.done).toBe(false);
    expect(stepper.step()).toEqual({ kind: 'halted' });
    expect(stepper.done).toBe(true);
  });

  it('satisfies input within the same call', () => {
    const stepper = createStepper(parse(','), { input: stringInput('z') });
    expect(stepper.step()).toEqual({ kind: 'continued' });
    expect(stepper.snapshot().cell).toBe(122);
    expect(stepper.machine.pc).toBe(1);
  });

  it('consumes exactly one byte per comma', () => {
    const input = stringInput('abc');
    const stepper = createStepper(parse(',,'), { input });
    stepper.step();
    stepper.step();
    expect(input.position).toBe(2);
    expect(stepper.snapshot().cell).toBe(98);
  });
});
