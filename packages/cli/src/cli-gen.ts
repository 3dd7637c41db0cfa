#!/usr/bin/env node
/**
 * tape-gen
 *
 * Transpiles a program to a JavaScript module and writes it, with a
 * package.json, README and a copy of the program, into a project directory.
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  CELL_SIZES,
  dumpProgram,
  generateJavaScript,
  parse,
  POINTER_SAFETY_MODES,
  writeProject,
  type CellSize,
  type CodegenEof,
  type GenerateOptions,
  type PointerSafety,
} from '@tapewright/core';
import {
  createDefaultConfig,
  loadConfig,
  parseCodegenEof,
  type TapeConfig,
} from './config.js';
import { explainError } from './cli-explain.js';
import type { OutputFormat } from './cli-error-formatter.js';
import {
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
      mode: 'gen';
      file: string;
      outDir: string;
      dumpAst: string | undefined;
      fixedInput: string | undefined;
      cellSize: CellSize | undefined;
      memorySize: number | undefined;
      pointerSafety: PointerSafety | undefined;
      eof: CodegenEof | undefined;
      uncompressed: boolean;
      format: OutputFormat;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const VALUE_FLAGS = [
  '--dump-ast',
  '--fixed-input',
  '--cell-size',
  '--memory-size',
  '--pointer-safety',
  '--eof',
  '--format',
  '--explain',
];

const SWITCHES = ['--no-compress'];

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

  const [file, outDir, extra] = positionals;
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (outDir === undefined) {
    throw new Error('Missing output directory argument');
  }
  if (extra !== undefined) {
    throw new Error(`Unexpected argument: ${extra}`);
  }

  const cellSize = values.get('--cell-size');
  const memorySize = values.get('--memory-size');
  const pointerSafety = values.get('--pointer-safety');
  const eof = values.get('--eof');

  return {
    mode: 'gen',
    file,
    outDir,
    dumpAst: values.get('--dump-ast'),
    fixedInput: values.get('--fixed-input'),
    cellSize: cellSize === undefined ? undefined : parseCellSize(cellSize),
    memorySize:
      memorySize === undefined
        ? undefined
        : parsePositiveInt(memorySize, '--memory-size'),
    pointerSafety:
      pointerSafety === undefined
        ? undefined
        : parseChoice(pointerSafety, '--pointer-safety', POINTER_SAFETY_MODES),
    eof: eof === undefined ? undefined : parseCodegenEof(eof),
    uncompressed: switches.has('--no-compress'),
    format: parseFormat(values.get('--format')),
  };
}

function parseCellSize(value: string): CellSize {
  const size = CELL_SIZES.find((candidate) => String(candidate) === value);
  if (size === undefined) {
    throw new Error(
      `Invalid --cell-size value: ${value}. Must be one of: ${CELL_SIZES.join(', ')}`
    );
  }
  return size;
}

/**
 * Merge config file values with flags; flags win.
 */
export function generateOptions(
  parsed: Extract<ParsedArgs, { mode: 'gen' }>,
  config: TapeConfig
): GenerateOptions {
  return {
    cellSize: parsed.cellSize ?? config.codegen.cellSize,
    memorySize: parsed.memorySize ?? config.codegen.memorySize,
    pointerSafety: parsed.pointerSafety ?? config.codegen.pointerSafety,
    eof: parsed.eof ?? config.codegen.eof,
    fixedInput: parsed.fixedInput,
    sourceName: basename(parsed.file),
    compress: !parsed.uncompressed,
  };
}

// ============================================================
// ENTRY POINT
// ============================================================

const USAGE = `Usage:
  tape-gen <program> <outDir> [options]   Generate a Node.js project
  tape-gen --help                         Show this help message
  tape-gen --version                      Show version information
  tape-gen --explain TAPE-XXXX            Show error documentation

Options:
  --dump-ast <file>         Also write the parsed program as JSON
  --fixed-input <text>      Bake a literal input string into the program
  --cell-size <bits>        Cell width: 8, 16, 32 (default: 8)
  --memory-size <n>         Number of cells (default: 30000)
  --pointer-safety <mode>   Pointer bounds: wrap, clamp, none (default: none)
  --eof <behavior>          ',' after input ends: unchanged, zero or a byte (default: unchanged)
  --no-compress             Emit one statement per instruction
  --format <format>         Error format: human, json, compact (default: human)

Examples:
  tape-gen hello.b out/hello
  tape-gen --cell-size 16 --pointer-safety wrap rev.b out/rev
  tape-gen --dump-ast hello.json hello.b out/hello`;

/**
 * Entry point for the tape-gen binary.
 * Resolves with the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let source: string | undefined;
  let format: OutputFormat = 'human';
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
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'gen': {
        format = parsed.format;
        fileName = parsed.file;

        const config = loadConfig(process.cwd()) ?? createDefaultConfig();
        source = await readSource(parsed.file);
        const program = parse(source);
        const options = generateOptions(parsed, config);

        if (parsed.dumpAst !== undefined) {
          await writeFile(
            parsed.dumpAst,
            dumpProgram(program, { compress: options.compress })
          );
        }

        const written = await writeProject(parsed.outDir, {
          sourceName: basename(parsed.file),
          sourceText: source,
          code: generateJavaScript(program, options),
        });
        for (const path of written) {
          console.log(`wrote ${path}`);
        }
        return 0;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, source, { format, fileName }));
    return 1;
  }
}

if (shouldRunMain()) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
