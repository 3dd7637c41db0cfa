import type { SourceLocation } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  MOVE_RIGHT: 'MOVE_RIGHT', // >
  MOVE_LEFT: 'MOVE_LEFT', // <
  INCREMENT: 'INCREMENT', // +
  DECREMENT: 'DECREMENT', // -
  OUTPUT: 'OUTPUT', // .
  INPUT: 'INPUT', // ,
  LOOP_OPEN: 'LOOP_OPEN', // [
  LOOP_CLOSE: 'LOOP_CLOSE', // ]
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Source character for each opcode */
export const TOKEN_SYMBOLS: Readonly<Record<TokenType, string>> = {
  MOVE_RIGHT: '>',
  MOVE_LEFT: '<',
  INCREMENT: '+',
  DECREMENT: '-',
  OUTPUT: '.',
  INPUT: ',',
  LOOP_OPEN: '[',
  LOOP_CLOSE: ']',
};

/** Reverse lookup from source character to opcode */
export const SYMBOL_TOKENS: ReadonlyMap<string, TokenType> = new Map(
  Object.values(TOKEN_TYPES).map((type) => [TOKEN_SYMBOLS[type], type])
);

export interface Token {
  readonly type: TokenType;
  readonly location: SourceLocation;
}
