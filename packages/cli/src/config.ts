/**
 * Configuration Loader
 * Loads and validates .tapewright.yaml (or .yml / .json) from a directory.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  CELL_SIZES,
  ConfigError,
  EOF_POLICIES,
  POINTER_SAFETY_MODES,
  POINTER_POLICIES,
  type CellSize,
  type CodegenEof,
  type EofPolicy,
  type PointerPolicy,
  type PointerSafety,
} from '@tapewright/core';

// ============================================================
// TYPES
// ============================================================

export interface RuntimeConfig {
  readonly initialTapeSize?: number | undefined;
  readonly maxTapeSize?: number | undefined;
  readonly pointerPolicy?: PointerPolicy | undefined;
  readonly eofPolicy?: EofPolicy | undefined;
  readonly maxSteps?: number | undefined;
}

export interface DebuggerConfig {
  readonly throttle?: number | undefined;
  readonly maxThrottle?: number | undefined;
  readonly yieldInterval?: number | undefined;
}

export interface CodegenConfig {
  readonly cellSize?: CellSize | undefined;
  readonly memorySize?: number | undefined;
  readonly pointerSafety?: PointerSafety | undefined;
  readonly eof?: CodegenEof | undefined;
}

export interface TapeConfig {
  readonly runtime: RuntimeConfig;
  readonly debugger: DebuggerConfig;
  readonly codegen: CodegenConfig;
}

/** Searched in order; the first file found wins */
export const CONFIG_FILE_NAMES = [
  '.tapewright.yaml',
  '.tapewright.yml',
  '.tapewright.json',
] as const;

const SECTIONS = ['runtime', 'debugger', 'codegen'] as const;

// ============================================================
// LOADING
// ============================================================

export function createDefaultConfig(): TapeConfig {
  return { runtime: {}, debugger: {}, codegen: {} };
}

/**
 * Load configuration from the first config file in `cwd`.
 * Returns null when no config file exists.
 *
 * @throws ConfigError when the file cannot be read, parsed or validated
 */
export function loadConfig(cwd: string): TapeConfig | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(cwd, fileName);
    if (!existsSync(configPath)) continue;

    let text: string;
    try {
      text = readFileSync(configPath, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`cannot read ${fileName}: ${reason}`);
    }
    return parseConfig(text, fileName);
  }
  return null;
}

/**
 * Parse and validate configuration text. JSON files go through the same
 * YAML parser, since JSON is a subset of YAML.
 */
export function parseConfig(text: string, fileName: string): TapeConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${fileName} is not valid YAML: ${reason}`);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return createDefaultConfig();
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${fileName} must be an object`);
  }

  for (const key of Object.keys(parsed)) {
    if (!isSection(key)) {
      throw new ConfigError(`unknown section "${key}"`);
    }
  }

  return {
    runtime: parseRuntime(section(parsed, 'runtime')),
    debugger: parseDebugger(section(parsed, 'debugger')),
    codegen: parseCodegen(section(parsed, 'codegen')),
  };
}

// ============================================================
// SECTIONS
// ============================================================

function parseRuntime(values: Record<string, unknown>): RuntimeConfig {
  checkKeys('runtime', values, [
    'initialTapeSize',
    'maxTapeSize',
    'pointerPolicy',
    'eofPolicy',
    'maxSteps',
  ]);
  return {
    initialTapeSize: positiveInteger(values, 'runtime.initialTapeSize'),
    maxTapeSize: positiveInteger(values, 'runtime.maxTapeSize'),
    pointerPolicy: oneOf(values, 'runtime.pointerPolicy', POINTER_POLICIES),
    eofPolicy: oneOf(values, 'runtime.eofPolicy', EOF_POLICIES),
    maxSteps: positiveInteger(values, 'runtime.maxSteps'),
  };
}

function parseDebugger(values: Record<string, unknown>): DebuggerConfig {
  checkKeys('debugger', values, ['throttle', 'maxThrottle', 'yieldInterval']);
  return {
    throttle: positiveInteger(values, 'debugger.throttle'),
    maxThrottle: positiveInteger(values, 'debugger.maxThrottle'),
    yieldInterval: positiveInteger(values, 'debugger.yieldInterval'),
  };
}

function parseCodegen(values: Record<string, unknown>): CodegenConfig {
  checkKeys('codegen', values, ['cellSize', 'memorySize', 'pointerSafety', 'eof']);
  return {
    cellSize: oneOf(values, 'codegen.cellSize', CELL_SIZES),
    memorySize: positiveInteger(values, 'codegen.memorySize'),
    pointerSafety: oneOf(values, 'codegen.pointerSafety', POINTER_SAFETY_MODES),
    eof: codegenEof(values['eof']),
  };
}

// ============================================================
// VALUE PARSERS
// ============================================================

/**
 * Parse a codegen EOF setting: `unchanged`, `zero` or a byte value.
 * Shared with the --eof flag of tape-gen.
 */
export function parseCodegenEof(value: string): CodegenEof {
  if (value === 'unchanged' || value === 'zero') {
    return value;
  }
  const byte = Number(value);
  if (value.trim() !== '' && Number.isInteger(byte) && byte >= 0 && byte <= 255) {
    return byte;
  }
  throw new ConfigError(
    `eof must be "unchanged", "zero" or a byte from 0 to 255, got "${value}"`
  );
}

function codegenEof(value: unknown): CodegenEof | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number' || typeof value === 'string') {
    return parseCodegenEof(String(value));
  }
  throw new ConfigError('codegen.eof must be a string or a number');
}

function positiveInteger(
  values: Record<string, unknown>,
  path: string
): number | undefined {
  const value = values[leaf(path)];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`${path} must be a positive integer`);
  }
  return value;
}

function oneOf<T extends string | number>(
  values: Record<string, unknown>,
  path: string,
  allowed: readonly T[]
): T | undefined {
  const value = values[leaf(path)];
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(
      `${path} must be one of: ${allowed.join(', ')}`
    );
  }
  return match;
}

// ============================================================
// HELPERS
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSection(key: string): key is (typeof SECTIONS)[number] {
  return SECTIONS.some((name) => name === key);
}

function section(
  parsed: Record<string, unknown>,
  name: (typeof SECTIONS)[number]
): Record<string, unknown> {
  const value = parsed[name];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${name} must be an object`);
  }
  return value;
}

function checkKeys(
  name: string,
  values: Record<string, unknown>,
  known: readonly string[]
): void {
  for (const key of Object.keys(values)) {
    if (!known.includes(key)) {
      throw new ConfigError(`unknown key "${name}.${key}"`);
    }
  }
}

function leaf(path: string): string {
  return path.slice(path.indexOf('.') + 1);
}
