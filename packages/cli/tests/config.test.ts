/**
 * Configuration Loader Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@tapewright/core';
import { loadConfig, parseCodegenEof, parseConfig } from '../src/config.js';

describe('parseConfig', () => {
  it('returns defaults for an empty file', () => {
    expect(parseConfig('', '.tapewright.yaml')).toEqual({
      runtime: {},
      debugger: {},
      codegen: {},
    });
  });

  it('reads every section', () => {
    const text = [
      'runtime:',
      '  maxSteps: 100',
      '  pointerPolicy: wrap',
      'debugger:',
      '  throttle: 4',
      'codegen:',
      '  cellSize: 16',
      '  eof: 0',
    ].join('\n');
    expect(parseConfig(text, '.tapewright.yaml')).toEqual({
      runtime: { maxSteps: 100, pointerPolicy: 'wrap' },
      debugger: { throttle: 4 },
      codegen: { cellSize: 16, eof: 0 },
    });
  });

  it('reads JSON', () => {
    const config = parseConfig(
      '{ "runtime": { "eofPolicy": "unchanged" } }',
      '.tapewright.json'
    );
    expect(config.runtime.eofPolicy).toBe('unchanged');
  });

  it('accepts keyword end-of-input settings for codegen', () => {
    expect(parseConfig('codegen:\n  eof: zero', 'c.yaml').codegen.eof).toBe('zero');
  });

  describe('validation', () => {
    const reject = (text: string): unknown => {
      try {
        parseConfig(text, 'c.yaml');
      } catch (err) {
        return err;
      }
      throw new Error('Expected parseConfig to throw');
    };

    const rejected: Array<[string, string]> = [
      ['- a\n- b', 'Invalid configuration: c.yaml must be an object'],
      ['other: {}', 'Invalid configuration: unknown section "other"'],
      ['runtime: 5', 'Invalid configuration: runtime must be an object'],
      ['runtime:\n  speed: 1', 'Invalid configuration: unknown key "runtime.speed"'],
      [
        'runtime:\n  maxSteps: -1',
        'Invalid configuration: runtime.maxSteps must be a positive integer',
      ],
      [
        'debugger:\n  throttle: 1.5',
        'Invalid configuration: debugger.throttle must be a positive integer',
      ],
      [
        'runtime:\n  pointerPolicy: bounce',
        'Invalid configuration: runtime.pointerPolicy must be one of: clamp, error, wrap',
      ],
      [
        'codegen:\n  cellSize: 12',
        'Invalid configuration: codegen.cellSize must be one of: 8, 16, 32',
      ],
      [
        'codegen:\n  eof: true',
        'Invalid configuration: codegen.eof must be a string or a number',
      ],
    ];

    it.each(rejected)('rejects %j', (text, message) => {
      const err = reject(text);
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.message).toBe(message);
      }
    });

    it('rejects malformed YAML', () => {
      const err = reject('runtime: [');
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.message).toMatch(/^Invalid configuration: c\.yaml is not valid YAML: /);
      }
    });
  });
});

describe('parseCodegenEof', () => {
  it('accepts keywords and bytes', () => {
    expect(parseCodegenEof('unchanged')).toBe('unchanged');
    expect(parseCodegenEof('zero')).toBe('zero');
    expect(parseCodegenEof('255')).toBe(255);
  });

  it('rejects anything else', () => {
    expect(() => parseCodegenEof('256')).toThrow(
      'Invalid configuration: eof must be "unchanged", "zero" or a byte from 0 to 255, got "256"'
    );
    expect(() => parseCodegenEof(' ')).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tapewright-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null when no config file exists', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  it('loads a .yml file', () => {
    writeFileSync(join(dir, '.tapewright.yml'), 'runtime:\n  maxSteps: 7\n');
    expect(loadConfig(dir)?.runtime.maxSteps).toBe(7);
  });

  it('prefers .tapewright.yaml over the JSON file', () => {
    writeFileSync(join(dir, '.tapewright.yaml'), 'debugger:\n  throttle: 2\n');
    writeFileSync(join(dir, '.tapewright.json'), '{"debugger": {"throttle": 9}}');
    expect(loadConfig(dir)?.debugger.throttle).toBe(2);
  });

  it('reports validation errors from the file', () => {
    writeFileSync(join(dir, '.tapewright.json'), '{"runtime": {"maxSteps": 0}}');
    expect(() => loadConfig(dir)).toThrow(
      'Invalid configuration: runtime.maxSteps must be a positive integer'
    );
  });
});
