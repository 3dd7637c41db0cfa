/**
 * Input and Output Tests
 */

import { closeSync, mkdtempSync, openSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  bufferOutput,
  bytesInput,
  emptyInput,
  fdInput,
  repeatingInput,
  stringInput,
  type InputSource,
} from '@tapewright/core';

function drain(input: InputSource, count: number): Array<number | undefined> {
  return Array.from({ length: count }, () => input.read());
}

describe('input sources', () => {
  it('bytesInput yields each byte then undefined', () => {
    const input = bytesInput(Uint8Array.of(1, 2));
    expect(drain(input, 4)).toEqual([1, 2, undefined, undefined]);
    expect(input.position).toBe(2);
  });

  it('stringInput yields UTF-8 bytes', () => {
    expect(drain(stringInput('aé'), 4)).toEqual([97, 195, 169, undefined]);
  });

  it('emptyInput is exhausted from the start', () => {
    const input = emptyInput();
    expect(input.read()).toBeUndefined();
    expect(input.position).toBe(0);
  });

  it('repeatingInput restarts the text when it runs out', () => {
    const input = repeatingInput('ab');
    expect(drain(input, 5)).toEqual([97, 98, 97, 98, 97]);
    expect(input.position).toBe(5);
  });

  it('repeatingInput of an empty string is exhausted', () => {
    expect(repeatingInput('').read()).toBeUndefined();
  });

  describe('fdInput', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'tapewright-io-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads one byte per request until end of file', () => {
      const path = join(dir, 'input.txt');
      writeFileSync(path, 'ok');
      const fd = openSync(path, 'r');
      try {
        const input = fdInput(fd);
        expect(drain(input, 4)).toEqual([111, 107, undefined, undefined]);
        expect(input.position).toBe(2);
      } finally {
        closeSync(fd);
      }
    });
  });
});

describe('bufferOutput', () => {
  it('collects bytes masked to 8 bits', () => {
    const output = bufferOutput();
    output.write(72);
    output.write(361);
    expect(Array.from(output.bytes())).toEqual([72, 105]);
    expect(output.text()).toBe('Hi');
  });

  it('decodes multi-byte sequences', () => {
    const output = bufferOutput();
    output.write(195);
    output.write(169);
    expect(output.text()).toBe('é');
  });
});
