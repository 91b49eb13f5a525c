export type { CsvCell } from './csv.js';
export { formatCsvField, parseCsv, stringifyCsv } from './csv.js';
export { IMAGE_EXTENSION, readImage, writeImage } from './images.js';
export type { DatasetSelection, Language, SplitRange } from './prompts.js';
export {
  applySplit,
  defaultPrompts,
  LANGUAGES,
  loadDatasetSplit,
  loadImagePrompts,
  loadInpaintingPrompts,
  loadPromptStrings,
  parseSplit,
} from './prompts.js';
export type { PromptDatasetRow } from './schema.js';
export {
  groundTruthRowSchema,
  promptDatasetSchema,
  scoreRowSchema,
  tableCellSchema,
  tableSchema,
} from './schema.js';
export type { TableCell, TableFormat, TableOptions, TableRow } from './tables.js';
export {
  inferTableFormat,
  readGroundTruthTable,
  readScoreTable,
  readTable,
  writeGroundTruthTable,
  writeScoreTable,
  writeTable,
} from './tables.js';
