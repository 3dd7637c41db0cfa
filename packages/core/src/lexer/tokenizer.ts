/**
 * Tokenizer
 * Filters source text down to the eight instruction characters.
 */

import { SYMBOL_TOKENS, type Token } from '../token-types.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read the next instruction token, skipping every other character.
 * Returns null once the source is exhausted.
 */
export function nextToken(state: LexerState): Token | null {
  while (!isAtEnd(state)) {
    const type = SYMBOL_TOKENS.get(peek(state));
    if (type !== undefined) {
      const location = currentLocation(state);
      advance(state);
      return { type, location };
    }
    advance(state);
  }
  return null;
}

/**
 * Convert source text into instruction tokens.
 * Total: any character outside `><+-.,[]` is treated as a comment.
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (let token = nextToken(state); token !== null; token = nextToken(state)) {
    tokens.push(token);
  }

  return tokens;
}
