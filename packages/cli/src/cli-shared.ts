/**
 * CLI Shared Utilities
 * Argument helpers, program loading and error formatting for the binaries
 */

import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import {
  TapeError,
  VERSION,
  type ObservabilityCallbacks,
} from '@tapewright/core';
import { enrichError } from './cli-error-enrichment.js';
import {
  formatError as formatEnrichedError,
  OUTPUT_FORMATS,
  type FormatOptions,
  type OutputFormat,
} from './cli-error-formatter.js';

/**
 * Format error for stderr output.
 *
 * Tapewright errors go through the enrichment pipeline (snippet and help
 * text when the source is known). Other errors print their message.
 */
export function formatError(
  err: Error,
  source?: string,
  options?: Partial<FormatOptions>
): string {
  const formatOpts: FormatOptions = {
    format: options?.format ?? 'human',
    verbose: options?.verbose ?? false,
    fileName: options?.fileName,
  };

  if (err instanceof TapeError) {
    return formatEnrichedError(enrichError(err, source), formatOpts);
  }

  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

// ============================================================
// ARGUMENT HELPERS
// ============================================================

/**
 * Split argv into flag values and positionals.
 * Flags in `valueFlags` consume the next argument; flags in `switches`
 * take none. Any other argument starting with `-` (except `-`) is rejected.
 */
export function scanArgs(
  argv: readonly string[],
  valueFlags: readonly string[],
  switches: readonly string[] = []
): { values: Map<string, string>; switches: Set<string>; positionals: string[] } {
  const values = new Map<string, string>();
  const seen = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (valueFlags.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      values.set(arg, value);
      i++;
    } else if (switches.includes(arg)) {
      seen.add(arg);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  return { values, switches: seen, positionals };
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer`);
  }
  return parsed;
}

export function parseChoice<T extends string>(
  value: string,
  flag: string,
  allowed: readonly T[]
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(
      `Invalid ${flag} value: ${value}. Must be one of: ${allowed.join(', ')}`
    );
  }
  return match;
}

export function parseFormat(value: string | undefined): OutputFormat {
  return value === undefined
    ? 'human'
    : parseChoice(value, '--format', OUTPUT_FORMATS);
}

// ============================================================
// PROGRAM LOADING
// ============================================================

/**
 * Read program source from a file, or from stdin when `file` is `-`.
 */
export async function readSource(file: string): Promise<string> {
  return file === '-' ? readFileSync(0, 'utf-8') : readFile(file, 'utf-8');
}

// ============================================================
// TRACING
// ============================================================

/**
 * Observability callbacks that log execution to `log` (stderr by default),
 * one line per event.
 */
export function createTraceCallbacks(
  log: (line: string) => void = (line) => console.error(line)
): ObservabilityCallbacks {
  return {
    onStep: ({ pc, instruction, steps }) => {
      log(`[trace] step ${steps} pc=${pc} ${instruction.type}`);
    },
    onInput: ({ pc, byte }) => {
      log(`[trace] input pc=${pc} byte=${byte ?? 'EOF'}`);
    },
    onOutput: (byte) => {
      log(`[trace] output byte=${byte}`);
    },
    onTapeGrow: ({ from, to }) => {
      log(`[trace] tape grew ${from} -> ${to}`);
    },
    onHalt: ({ steps }) => {
      log(`[trace] halted after ${steps} steps`);
    },
    onError: ({ error, pc }) => {
      log(`[trace] error pc=${pc}: ${error.message}`);
    },
  };
}

/**
 * Only run main outside the test runner.
 */
export function shouldRunMain(): boolean {
  return (
    process.env['NODE_ENV'] !== 'test' &&
    !process.env['VITEST'] &&
    !process.env['VITEST_WORKER_ID']
  );
}

/**
 * Package version string
 */
export { VERSION };
