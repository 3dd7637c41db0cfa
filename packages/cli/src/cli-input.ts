/**
 * Program Input Selection
 * Shared by tape-run and tape-debug
 */

import { readFileSync } from 'node:fs';
import {
  bytesInput,
  emptyInput,
  fdInput,
  repeatingInput,
  stringInput,
  type InputSource,
} from '@tapewright/core';

/** Where `,` reads from */
export type InputSpec =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'fixed'; readonly text: string }
  | { readonly kind: 'repeat'; readonly text: string }
  | { readonly kind: 'stdin' };

/**
 * Pick the input flag. At most one of --input, --fixed-input and
 * --repeat-input may be given; without one, `fallback` applies
 * (`none` reads nothing, e.g. when the program itself came from stdin).
 */
export function parseInputSpec(
  values: ReadonlyMap<string, string>,
  fallback: 'stdin' | 'none'
): InputSpec {
  const given = (['--input', '--fixed-input', '--repeat-input'] as const).filter(
    (flag) => values.has(flag)
  );
  if (given.length > 1) {
    throw new Error(`Options ${given.join(' and ')} cannot be combined`);
  }

  const path = values.get('--input');
  if (path !== undefined) return { kind: 'file', path };
  const fixed = values.get('--fixed-input');
  if (fixed !== undefined) return { kind: 'fixed', text: fixed };
  const repeat = values.get('--repeat-input');
  if (repeat !== undefined) return { kind: 'repeat', text: repeat };
  return fallback === 'stdin' ? { kind: 'stdin' } : { kind: 'fixed', text: '' };
}

export function createInput(spec: InputSpec): InputSource {
  switch (spec.kind) {
    case 'file':
      return bytesInput(readFileSync(spec.path));
    case 'fixed':
      return spec.text === '' ? emptyInput() : stringInput(spec.text);
    case 'repeat':
      return repeatingInput(spec.text);
    case 'stdin':
      return fdInput(0);
  }
}
