export type { AlignedDiff, DiffMarkers, Opcode, OpcodeTag } from './diff.js';
export {
  ANSI_MARKERS,
  alignedDiff,
  diffStrings,
  getMatchingBlocks,
  getOpcodes,
  PLAIN_MARKERS,
} from './diff.js';
export { defaultRenderNumber } from './render-numbers.js';
export type { TextResultsOptions } from './renderer.js';
export {
  renderImageResults,
  renderMetricsTable,
  renderTextResults,
  SEPARATOR,
} from './renderer.js';
export { DEFAULT_METRIC, worstExamples } from './worst-examples.js';
