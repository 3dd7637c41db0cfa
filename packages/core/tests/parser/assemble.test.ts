/**
 * Loop Resolver Tests
 * Partner resolution and rejection of unbalanced brackets
 */

import { describe, expect, it } from 'vitest';
import {
  assemble,
  isLoopInstruction,
  parse,
  ParseError,
  TOKEN_TYPES,
  tokenize,
  type Program,
} from '@tapewright/core';

function partners(program: Program): Array<[number, number]> {
  return program.instructions
    .filter(isLoopInstruction)
    .map((instruction) => [instruction.index, instruction.partner]);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

describe('assemble', () => {
  it('indexes every instruction in order', () => {
    const program = parse('+>.');
    expect(program.instructions.map((instruction) => instruction.index)).toEqual([
      0, 1, 2,
    ]);
    expect(program.instructions.map((instruction) => instruction.type)).toEqual([
      TOKEN_TYPES.INCREMENT,
      TOKEN_TYPES.MOVE_RIGHT,
      TOKEN_TYPES.OUTPUT,
    ]);
  });

  it('resolves partners for a single loop', () => {
    expect(partners(parse('+[-]'))).toEqual([
      [1, 3],
      [3, 1],
    ]);
  });

  it('resolves nested and sibling loops', () => {
    // indices: [0 [1 ]2 [3 ]4 ]5 [6 ]7
    expect(partners(parse('[[][]][]'))).toEqual([
      [0, 5],
      [1, 2],
      [2, 1],
      [3, 4],
      [4, 3],
      [5, 0],
      [6, 7],
      [7, 6],
    ]);
  });

  it('gives symmetric partners with no crossing pairs', () => {
    const program = parse('+[>[-<+>]<[->+<]]++[.]');
    const pairs = new Map(partners(program));

    for (const [index, partner] of pairs) {
      expect(pairs.get(partner)).toBe(index);
    }

    const opens = [...pairs].filter(([index, partner]) => index < partner);
    for (const [a, b] of opens) {
      for (const [c, d] of opens) {
        const crossing = a < c && c < b && b < d;
        expect(crossing).toBe(false);
      }
    }
  });

  it('records whether the program reads input', () => {
    expect(parse('+.').needsInput).toBe(false);
    expect(parse('+,.').needsInput).toBe(true);
  });

  it('returns a frozen program', () => {
    const program = parse('[-]');
    expect(Object.isFrozen(program)).toBe(true);
    expect(Object.isFrozen(program.instructions)).toBe(true);
    expect(Object.isFrozen(program.instructions[0])).toBe(true);
  });

  it('accepts an empty token stream', () => {
    const program = assemble([]);
    expect(program.instructions).toEqual([]);
    expect(program.needsInput).toBe(false);
  });

  it('keeps the source location of each instruction', () => {
    const program = assemble(tokenize('a\n +'));
    expect(program.instructions[0]?.location).toEqual({
      line: 2,
      column: 2,
      offset: 3,
    });
  });

  describe('unbalanced brackets', () => {
    it('rejects a close bracket with no open bracket', () => {
      const err = catchError(() => parse('+]'));
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.errorId).toBe('TAPE-P002');
        expect(err.location).toEqual({ line: 1, column: 2, offset: 1 });
        expect(err.message).toBe("Unmatched ']' at 1:2");
      }
    });

    it('reports the first stray close bracket', () => {
      const err = catchError(() => parse('[-]]]'));
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.errorId).toBe('TAPE-P002');
        expect(err.location?.column).toBe(4);
      }
    });

    it('rejects an open bracket with no close bracket', () => {
      const err = catchError(() => parse('+[>+'));
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.errorId).toBe('TAPE-P001');
        expect(err.location).toEqual({ line: 1, column: 2, offset: 1 });
      }
    });

    it('reports the earliest unmatched open bracket', () => {
      // the second '[' at column 3 is closed; columns 1 and 2 stay open
      const err = catchError(() => parse('[[[-]'));
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.errorId).toBe('TAPE-P001');
        expect(err.location?.column).toBe(1);
        expect(err.context?.['unmatched']).toBe(2);
      }
    });

    it('rejects a close bracket that comes before its open bracket', () => {
      const err = catchError(() => parse("]["));
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.errorId).toBe('TAPE-P002');
      }
    });
  });
});
