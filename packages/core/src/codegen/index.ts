/**
 * Code Generation Module
 * Segments, JavaScript emission, program dumps and project packaging
 */

export {
  compress,
  segment,
  type Repeated,
  type Segment,
  type SegmentOptions,
} from './segments.js';
export {
  CELL_SIZES,
  DEFAULT_MEMORY_SIZE,
  generateJavaScript,
  POINTER_SAFETY_MODES,
  type CellSize,
  type CodegenEof,
  type GenerateOptions,
  type PointerSafety,
} from './javascript.js';
export { dumpProgram, toDump, type ProgramDump } from './dump.js';
export {
  escapeJsonString,
  fillTemplate,
  toPackageName,
  writeProject,
  type ProjectOptions,
  type Replacements,
} from './project.js';
