/**
 * tapewright CLI library surface
 * Configuration, error formatting and terminal helpers used by the binaries
 */

export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  loadConfig,
  parseCodegenEof,
  parseConfig,
  type CodegenConfig,
  type DebuggerConfig,
  type RuntimeConfig,
  type TapeConfig,
} from './config.js';
export {
  enrichError,
  extractSnippet,
  type EnrichedError,
  type SnippetLine,
  type SourceSnippet,
} from './cli-error-enrichment.js';
export {
  OUTPUT_FORMATS,
  renderCaretUnderline,
  type FormatOptions,
  type OutputFormat,
} from './cli-error-formatter.js';
export { explainError } from './cli-explain.js';
export { createInput, parseInputSpec, type InputSpec } from './cli-input.js';
export { createTraceCallbacks, formatError } from './cli-shared.js';
export { attachKeyboard, decodeKey, type Keypress } from './terminal/keys.js';
export { drawRows, FrameRenderer, RateMeter, type RendererOptions } from './terminal/renderer.js';
export {
  cellsPerRow,
  followPointer,
  regionBounds,
  type Bounds,
  type CellWindow,
} from './terminal/viewport.js';
