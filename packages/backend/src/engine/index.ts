export * from './analysis/index.js';
export * from './batch/index.js';
export * from './rules/index.js';
export type {
  WorkRecord,
  RecordRef,
  RoadCategory,
  WorkType,
  DataQualityNote,
  DataQualityNoteKind,
} from './records/types.js';
export { parseWorkRecord, toRecordRef } from './records/work-record.js';
export { mapSheetRows, resolveColumns } from './records/column-map.js';
export type { MappedSheet, ColumnResolution } from './records/column-map.js';
export {
  AnalysisConfigSchema,
  loadAnalysisConfig,
  resolveAnalysisConfig,
  toLedgerAmount,
} from '../lib/config/analysis.js';
export type { AnalysisConfig, AnalysisConfigInput, SplittingConfig } from '../lib/config/analysis.js';
export { ConfigurationError } from '../lib/errors.js';
