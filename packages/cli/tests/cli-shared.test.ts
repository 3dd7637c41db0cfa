/**
 * CLI Shared Utilities Tests
 * Argument scanning, error formatting and trace logging
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  execute,
  parse,
  ParseError,
  RuntimeError,
  stringInput,
} from '@tapewright/core';
import {
  createTraceCallbacks,
  detectHelpVersionFlag,
  formatError,
  parseChoice,
  parseFormat,
  parsePositiveInt,
  scanArgs,
} from '../src/cli-shared.js';

function parseFailure(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
  }
  throw new Error('Expected a parse error');
}

describe('cli-shared', () => {
  describe('detectHelpVersionFlag', () => {
    it('detects help and version anywhere in argv', () => {
      expect(detectHelpVersionFlag(['prog.b', '-h'])).toEqual({ mode: 'help' });
      expect(detectHelpVersionFlag(['--version'])).toEqual({ mode: 'version' });
      expect(detectHelpVersionFlag(['prog.b'])).toBeNull();
    });

    it('prefers help over version', () => {
      expect(detectHelpVersionFlag(['-v', '--help'])).toEqual({ mode: 'help' });
    });
  });

  describe('scanArgs', () => {
    it('separates values, switches and positionals', () => {
      const scanned = scanArgs(
        ['--max-steps', '10', 'prog.b', '--trace', '-'],
        ['--max-steps'],
        ['--trace']
      );
      expect(scanned.values).toEqual(new Map([['--max-steps', '10']]));
      expect(scanned.switches).toEqual(new Set(['--trace']));
      expect(scanned.positionals).toEqual(['prog.b', '-']);
    });

    it('rejects a value flag at the end', () => {
      expect(() => scanArgs(['--max-steps'], ['--max-steps'])).toThrow(
        'Missing value after --max-steps'
      );
    });

    it('rejects unknown options', () => {
      expect(() => scanArgs(['--fast'], [])).toThrow('Unknown option: --fast');
    });
  });

  describe('value parsers', () => {
    it('parsePositiveInt accepts digits only', () => {
      expect(parsePositiveInt('42', '--max-steps')).toBe(42);
      expect(() => parsePositiveInt('0', '--max-steps')).toThrow(
        '--max-steps must be a positive integer'
      );
      expect(() => parsePositiveInt('1e3', '--max-steps')).toThrow(
        '--max-steps must be a positive integer'
      );
    });

    it('parseChoice lists the allowed values', () => {
      expect(parseChoice('b', '--mode', ['a', 'b'])).toBe('b');
      expect(() => parseChoice('c', '--mode', ['a', 'b'])).toThrow(
        'Invalid --mode value: c. Must be one of: a, b'
      );
    });

    it('parseFormat defaults to human', () => {
      expect(parseFormat(undefined)).toBe('human');
      expect(parseFormat('json')).toBe('json');
    });
  });

  describe('formatError', () => {
    const source = '+++\n[-]]';

    it('renders a parse error with its snippet', () => {
      const formatted = formatError(parseFailure(source), source, {
        fileName: 'loop.b',
      });
      expect(formatted).toBe(
        [
          "error[TAPE-P002]: Unmatched ']'",
          '  --> loop.b:2:4',
          '   |',
          ' 1 | +++',
          ' 2 | [-]]',
          '   |    ^',
          '   |',
          "   = help: Add the matching '[' where the loop body starts, or delete the stray ']'.",
        ].join('\n')
      );
    });

    it('adds the cause in verbose mode', () => {
      const formatted = formatError(parseFailure(source), source, { verbose: true });
      expect(formatted.split('\n')).toContain(
        "   = note: A ']' appears with no open '[' before it."
      );
    });

    it('renders a single line in compact format', () => {
      expect(
        formatError(parseFailure(source), source, {
          format: 'compact',
          fileName: 'loop.b',
        })
      ).toBe("[TAPE-P002] Unmatched ']' at loop.b:2:4");
    });

    it('renders 0-based positions in JSON format', () => {
      const formatted = formatError(parseFailure(source), source, {
        format: 'json',
        fileName: 'loop.b',
      });
      expect(JSON.parse(formatted)).toEqual({
        errorId: 'TAPE-P002',
        severity: 1,
        message: "Unmatched ']'",
        source: 'tapewright',
        code: 'TAPE-P002',
        range: {
          start: { line: 1, character: 3 },
          end: { line: 1, character: 4 },
        },
        file: 'loop.b',
        suggestions: [
          "Add the matching '[' where the loop body starts, or delete the stray ']'.",
        ],
      });
    });

    it('renders errors without a location', () => {
      const formatted = formatError(
        new RuntimeError('TAPE-R004', 'Program did not halt within 5 steps'),
        undefined,
        { format: 'compact' }
      );
      expect(formatted).toBe('[TAPE-R004] Program did not halt within 5 steps');
    });

    it('renders configuration errors with help text', () => {
      expect(formatError(new ConfigError('bad value')).split('\n')).toEqual([
        'error[TAPE-C001]: Invalid configuration: bad value',
        '   = help: Fix the reported key in .tapewright.yaml or the matching command-line flag.',
      ]);
    });

    it('reports missing files by path', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: 'missing.b',
      });
      expect(formatError(err)).toBe('File not found: missing.b');
    });

    it('prints other errors as their message', () => {
      expect(formatError(new Error('Missing file argument'))).toBe(
        'Missing file argument'
      );
    });
  });

  describe('createTraceCallbacks', () => {
    it('logs one line per event', () => {
      const lines: string[] = [];
      execute(parse(',.'), {
        input: stringInput('A'),
        observability: createTraceCallbacks((line) => lines.push(line)),
      });
      expect(lines).toEqual([
        '[trace] input pc=0 byte=65',
        '[trace] step 1 pc=0 INPUT',
        '[trace] output byte=65',
        '[trace] step 2 pc=1 OUTPUT',
        '[trace] halted after 2 steps',
      ]);
    });

    it('logs end of input, tape growth and errors', () => {
      const lines: string[] = [];
      expect(() =>
        execute(parse(',>>'), {
          initialTapeSize: 1,
          maxTapeSize: 2,
          observability: createTraceCallbacks((line) => lines.push(line)),
        })
      ).toThrow(RuntimeError);
      expect(lines).toEqual([
        '[trace] input pc=0 byte=EOF',
        '[trace] step 1 pc=0 INPUT',
        '[trace] tape grew 1 -> 2',
        '[trace] step 2 pc=1 MOVE_RIGHT',
        '[trace] error pc=2: Tape cannot grow past 2 cells (pointer 2) at 1:3',
      ]);
    });
  });
});
