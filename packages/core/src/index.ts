/**
 * tapewright core
 * Exports lexer, loop resolver, runtime, debugger and code generator
 */

export { createLexerState, nextToken, tokenize, type LexerState } from './lexer/index.js';
export { assemble, parse } from './parser/index.js';
export {
  TOKEN_SYMBOLS,
  TOKEN_TYPES,
  SYMBOL_TOKENS,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  isLoopInstruction,
  type Instruction,
  type LoopInstruction,
  type LoopTokenType,
  type Program,
  type StraightInstruction,
  type StraightTokenType,
} from './instructions.js';
export {
  charSpan,
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
export { VERSION } from './version.js';

// ============================================================
// RUNTIME
// ============================================================
export * from './runtime/index.js';

// ============================================================
// DEBUGGER
// ============================================================
export * from './debugger/index.js';

// ============================================================
// CODE GENERATION
// ============================================================
export * from './codegen/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ConfigError,
  createError,
  ParseError,
  RuntimeError,
  TapeError,
  type TapeErrorData,
} from './error-classes.js';
