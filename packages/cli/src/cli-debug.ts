#!/usr/bin/env node
/**
 * tape-debug
 *
 * Interactive terminal debugger: step one instruction per key, or run with
 * throttled redraws. Keys: c continue, p pause, q quit, Up/Down speed.
 */

import {
  bufferOutput,
  createDebugSession,
  createKeyQueue,
  parse,
  type DebugSessionOptions,
  type Frame,
} from '@tapewright/core';
import { createDefaultConfig, loadConfig, type TapeConfig } from './config.js';
import { explainError } from './cli-explain.js';
import { createInput, parseInputSpec, type InputSpec } from './cli-input.js';
import {
  detectHelpVersionFlag,
  formatError,
  parsePositiveInt,
  readSource,
  scanArgs,
  shouldRunMain,
  VERSION,
} from './cli-shared.js';
import { attachKeyboard } from './terminal/keys.js';
import { drawRows, FrameRenderer } from './terminal/renderer.js';

// ============================================================
// ARGUMENTS
// ============================================================

export type ParsedArgs =
  | {
      mode: 'debug';
      file: string;
      input: InputSpec;
      throttle: number | undefined;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const VALUE_FLAGS = [
  '--input',
  '--fixed-input',
  '--repeat-input',
  '--throttle',
  '--explain',
];

/**
 * Parse command-line arguments into structured command
 *
 * Stdin carries keystrokes, so the program must come from a file and input
 * defaults to none.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) {
    return helpOrVersion;
  }

  const { values, positionals } = scanArgs(argv, VALUE_FLAGS);

  const errorId = values.get('--explain');
  if (errorId !== undefined) {
    return { mode: 'explain', errorId };
  }

  const file = positionals[0];
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (file === '-') {
    throw new Error('tape-debug reads keys from stdin; pass the program as a file');
  }
  if (positionals.length > 1) {
    throw new Error(`Unexpected argument: ${positionals[1] ?? ''}`);
  }

  const throttle = values.get('--throttle');
  return {
    mode: 'debug',
    file,
    input: parseInputSpec(values, 'none'),
    throttle:
      throttle === undefined ? undefined : parsePositiveInt(throttle, '--throttle'),
  };
}

export function debugOptions(
  parsed: Extract<ParsedArgs, { mode: 'debug' }>,
  config: TapeConfig
): Pick<
  DebugSessionOptions,
  | 'initialTapeSize'
  | 'maxTapeSize'
  | 'pointerPolicy'
  | 'eofPolicy'
  | 'throttle'
  | 'maxThrottle'
  | 'yieldInterval'
> {
  return {
    initialTapeSize: config.runtime.initialTapeSize,
    maxTapeSize: config.runtime.maxTapeSize,
    pointerPolicy: config.runtime.pointerPolicy,
    eofPolicy: config.runtime.eofPolicy,
    throttle: parsed.throttle ?? config.debugger.throttle,
    maxThrottle: config.debugger.maxThrottle,
    yieldInterval: config.debugger.yieldInterval,
  };
}

// ============================================================
// ENTRY POINT
// ============================================================

const USAGE = `Usage:
  tape-debug <program> [options]   Debug a program in the terminal
  tape-debug --help                Show this help message
  tape-debug --version             Show version information
  tape-debug --explain TAPE-XXXX   Show error documentation

Options:
  --input <file>            Read program input from a file
  --fixed-input <text>      Use a literal string as program input
  --repeat-input <text>     Use a literal string, restarted whenever it runs out
  --throttle <n>            Instructions per redraw while running (default: 1)

Keys:
  c          continue (run)
  p          pause
  q, Ctrl-C  quit
  Up / Down  draw less / more often while running
  any other  execute one instruction while paused`;

function inputText(spec: InputSpec): string | undefined {
  return spec.kind === 'fixed' || spec.kind === 'repeat' ? spec.text : undefined;
}

/**
 * Entry point for the tape-debug binary.
 * Resolves with the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let source: string | undefined;

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Invalid error ID: ${parsed.errorId}`);
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'debug': {
        const config = loadConfig(process.cwd()) ?? createDefaultConfig();
        source = await readSource(parsed.file);
        const program = parse(source);

        const input = createInput(parsed.input);
        const output = bufferOutput();
        const renderer = new FrameRenderer({
          program,
          source,
          inputText: inputText(parsed.input),
          input,
          output,
          width: process.stdout.columns ?? 80,
        });
        const draw = (frame: Frame): void => {
          drawRows(process.stdout, renderer.render(frame));
        };

        const keys = createKeyQueue();
        const session = createDebugSession(program, {
          ...debugOptions(parsed, config),
          input,
          output,
          keys,
          redraw: draw,
        });

        const detach = attachKeyboard(process.stdin, keys);
        try {
          draw({
            reason: 'pause',
            execution: session.snapshot(),
            debugger: session.state,
          });

          const result = await session.run();
          console.log(
            result.reason === 'halted'
              ? `Halted after ${result.executed} instructions`
              : `Quit after ${result.executed} instructions`
          );
          return 0;
        } finally {
          detach();
        }
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, source));
    return 1;
  }
}

if (shouldRunMain()) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
