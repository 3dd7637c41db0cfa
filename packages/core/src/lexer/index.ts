/**
 * Lexer Module
 * Converts source text into instruction tokens
 */

export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
