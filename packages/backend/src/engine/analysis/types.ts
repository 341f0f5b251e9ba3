import type { AnalysisConfig } from '../../lib/config/analysis.js';
import type { DataQualityNote, DataQualityNoteKind, RecordRef } from '../records/types.js';
import type { Flag, FlagId, FlagSeverity } from '../rules/types.js';

export interface RedFlaggedRecord {
  readonly record: RecordRef;
  /** Record rules 1–6 in table order, then overlap, then splitting. */
  readonly flags: readonly Flag[];
  readonly overallSeverity: FlagSeverity;
}

export interface AnalysisSummary {
  readonly totalRows: number;
  readonly analyzedRecords: number;
  readonly excludedRecords: number;
  readonly redFlaggedCount: number;
  readonly greenFlaggedCount: number;
  readonly totalFlags: number;
  readonly byFlagId: Readonly<Record<FlagId, number>>;
  readonly byFlagName: Readonly<Record<string, number>>;
  readonly bySeverity: Readonly<Record<FlagSeverity, number>>;
  readonly dataQualityNotes: Readonly<Record<DataQualityNoteKind, number>>;
}

export interface AnalysisResult {
  /** Evaluation date (YYYY-MM-DD) used for every time-based rule. */
  readonly asOf: string;
  readonly totalRows: number;
  readonly redFlagged: readonly RedFlaggedRecord[];
  readonly greenFlagged: readonly RecordRef[];
  readonly summary: AnalysisSummary;
  readonly dataQualityNotes: readonly DataQualityNote[];
  readonly config: AnalysisConfig;
}
