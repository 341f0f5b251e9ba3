import type { AnalysisConfig } from '../../lib/config/analysis.js';
import type { DataQualityNote, WorkRecord } from '../records/types.js';
import type { Flag } from '../rules/types.js';

/**
 * Scores how alike two work names are, 0 (unrelated) to 1 (same). Implementations
 * normalize their inputs themselves.
 */
export interface StringSimilarity {
  readonly id: string;
  compare(a: string, b: string): number;
}

/** Flags keyed by record id, plus notes for records the analyzer had to pass over. */
export interface BatchAnalyzerResult {
  flagsByRecord: Map<string, Flag[]>;
  notes: DataQualityNote[];
}

export interface BatchContext {
  readonly config: AnalysisConfig;
  readonly asOf: Date;
}

export interface CrossRecordAnalyzer {
  readonly id: string;
  readonly name: string;
  analyze(records: readonly WorkRecord[], context: BatchContext): BatchAnalyzerResult;
}
