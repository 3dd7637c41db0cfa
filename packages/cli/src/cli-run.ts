#!/usr/bin/env node
/**
 * tape-run
 *
 * Runs a program headlessly: input from a file, a literal string or stdin,
 * output straight to stdout.
 */

import {
  EOF_POLICIES,
  execute,
  parse,
  POINTER_POLICIES,
  streamOutput,
  type EofPolicy,
  type ExecuteOptions,
  type PointerPolicy,
} from '@tapewright/core';
import { createDefaultConfig, loadConfig, type TapeConfig } from './config.js';
import { explainError } from './cli-explain.js';
import { createInput, parseInputSpec, type InputSpec } from './cli-input.js';
import type { OutputFormat } from './cli-error-formatter.js';
import {
  createTraceCallbacks,
  detectHelpVersionFlag,
  formatError,
  parseChoice,
  parseFormat,
  parsePositiveInt,
  readSource,
  scanArgs,
  shouldRunMain,
  VERSION,
} from './cli-shared.js';

// ============================================================
// ARGUMENTS
// ============================================================

export type ParsedArgs =
  | {
      mode: 'run';
      file: string;
      input: InputSpec;
      maxSteps: number | undefined;
      pointerPolicy: PointerPolicy | undefined;
      eofPolicy: EofPolicy | undefined;
      trace: boolean;
      verbose: boolean;
      format: OutputFormat;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const VALUE_FLAGS = [
  '--input',
  '--fixed-input',
  '--repeat-input',
  '--max-steps',
  '--pointer-policy',
  '--eof',
  '--format',
  '--explain',
];

const SWITCHES = ['--trace', '--verbose'];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) {
    return helpOrVersion;
  }

  const { values, switches, positionals } = scanArgs(argv, VALUE_FLAGS, SWITCHES);

  const errorId = values.get('--explain');
  if (errorId !== undefined) {
    return { mode: 'explain', errorId };
  }

  const file = positionals[0];
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (positionals.length > 1) {
    throw new Error(`Unexpected argument: ${positionals[1] ?? ''}`);
  }

  const maxSteps = values.get('--max-steps');
  const pointerPolicy = values.get('--pointer-policy');
  const eofPolicy = values.get('--eof');

  return {
    mode: 'run',
    file,
    input: parseInputSpec(values, file === '-' ? 'none' : 'stdin'),
    maxSteps:
      maxSteps === undefined ? undefined : parsePositiveInt(maxSteps, '--max-steps'),
    pointerPolicy:
      pointerPolicy === undefined
        ? undefined
        : parseChoice(pointerPolicy, '--pointer-policy', POINTER_POLICIES),
    eofPolicy:
      eofPolicy === undefined
        ? undefined
        : parseChoice(eofPolicy, '--eof', EOF_POLICIES),
    trace: switches.has('--trace'),
    verbose: switches.has('--verbose'),
    format: parseFormat(values.get('--format')),
  };
}

/**
 * Merge config file values with flags; flags win.
 */
export function runOptions(
  parsed: Extract<ParsedArgs, { mode: 'run' }>,
  config: TapeConfig
): ExecuteOptions {
  return {
    initialTapeSize: config.runtime.initialTapeSize,
    maxTapeSize: config.runtime.maxTapeSize,
    pointerPolicy: parsed.pointerPolicy ?? config.runtime.pointerPolicy,
    eofPolicy: parsed.eofPolicy ?? config.runtime.eofPolicy,
    maxSteps: parsed.maxSteps ?? config.runtime.maxSteps,
  };
}

// ============================================================
// ENTRY POINT
// ============================================================

const USAGE = `Usage:
  tape-run <program> [options]     Run a program
  tape-run -                       Read the program from stdin
  tape-run --help                  Show this help message
  tape-run --version               Show version information
  tape-run --explain TAPE-XXXX     Show error documentation

Options:
  --input <file>            Read program input from a file (default: stdin)
  --fixed-input <text>      Use a literal string as program input
  --repeat-input <text>     Use a literal string, restarted whenever it runs out
  --max-steps <n>           Stop with TAPE-R004 after n instructions
  --pointer-policy <p>      '<' at cell 0: clamp, error, wrap (default: clamp)
  --eof <policy>            ',' after input ends: zero, unchanged (default: zero)
  --trace                   Log every instruction to stderr
  --format <format>         Error format: human, json, compact (default: human)
  --verbose                 Include error causes

Examples:
  tape-run hello.b
  echo "abc" | tape-run rev.b
  tape-run --max-steps 100000 --format json loop.b
  tape-run --explain TAPE-P001`;

/**
 * Entry point for the tape-run binary.
 * Resolves with the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let source: string | undefined;
  let format: OutputFormat = 'human';
  let verbose = false;
  let fileName: string | undefined;

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
          console.error(
            'Error ID must be in format TAPE-{P|R|C}{3-digit}, e.g., TAPE-P001'
          );
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'run': {
        format = parsed.format;
        verbose = parsed.verbose;
        fileName = parsed.file === '-' ? '<stdin>' : parsed.file;

        const config = loadConfig(process.cwd()) ?? createDefaultConfig();
        source = await readSource(parsed.file);
        const program = parse(source);

        execute(program, {
          ...runOptions(parsed, config),
          input: createInput(parsed.input),
          output: streamOutput(process.stdout),
          observability: parsed.trace ? createTraceCallbacks() : undefined,
        });
        return 0;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, source, { format, verbose, fileName }));
    return 1;
  }
}

if (shouldRunMain()) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
