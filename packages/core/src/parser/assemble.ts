/**
 * Loop Resolver
 * Turns the token stream into a flat program with resolved loop partners
 */

import { createError } from '../error-classes.js';
import type { Instruction, Program } from '../instructions.js';
import { tokenize } from '../lexer/index.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';

/**
 * Resolve bracket partners and index every token.
 *
 * Partners are computed with a stack of pending `[` positions before any
 * instruction is built, so a failure never leaves a partial program behind.
 *
 * @throws ParseError TAPE-P002 at the first `]` with no open `[`
 * @throws ParseError TAPE-P001 at the earliest `[` left open
 */
export function assemble(tokens: readonly Token[]): Program {
  const partners = new Map<number, number>();
  const pending: number[] = [];

  tokens.forEach((token, index) => {
    if (token.type === TOKEN_TYPES.LOOP_OPEN) {
      pending.push(index);
    } else if (token.type === TOKEN_TYPES.LOOP_CLOSE) {
      const open = pending.pop();
      if (open === undefined) {
        throw createError(
          'TAPE-P002',
          { index, name: 'UnmatchedLoopClose' },
          token.location
        );
      }
      partners.set(open, index);
      partners.set(index, open);
    }
  });

  const earliest = pending[0];
  if (earliest !== undefined) {
    throw createError(
      'TAPE-P001',
      { index: earliest, name: 'UnmatchedLoopOpen', unmatched: pending.length },
      tokens[earliest]?.location
    );
  }

  let needsInput = false;
  const instructions = tokens.map((token, index): Instruction => {
    if (
      token.type === TOKEN_TYPES.LOOP_OPEN ||
      token.type === TOKEN_TYPES.LOOP_CLOSE
    ) {
      const partner = partners.get(index);
      if (partner === undefined) {
        throw new Error(`Loop bracket ${index} has no resolved partner`);
      }
      return Object.freeze({
        type: token.type,
        index,
        location: token.location,
        partner,
      });
    }
    if (token.type === TOKEN_TYPES.INPUT) {
      needsInput = true;
    }
    return Object.freeze({ type: token.type, index, location: token.location });
  });

  return Object.freeze({
    instructions: Object.freeze(instructions),
    needsInput,
  });
}

/**
 * Tokenize and assemble source text in one call.
 */
export function parse(source: string): Program {
  return assemble(tokenize(source));
}
