import type { DataQualityNote, WorkRecord } from '../records/types.js';
import type { Flag } from '../rules/types.js';
import { attachFlag } from './grouping.js';
import { OverlapAnalyzer } from './overlap-analyzer.js';
import { SplittingAnalyzer } from './splitting-analyzer.js';
import type { BatchAnalyzerResult, BatchContext, CrossRecordAnalyzer, StringSimilarity } from './types.js';

/** Runs the cross-record analyzers in order (overlap, then splitting) over the whole record set. */
export class BatchAnalyzer {
  private analyzers: CrossRecordAnalyzer[];

  constructor({
    analyzers,
    similarity,
  }: { analyzers?: CrossRecordAnalyzer[]; similarity?: StringSimilarity } = {}) {
    this.analyzers = analyzers ?? [new OverlapAnalyzer(), new SplittingAnalyzer(similarity)];
  }

  analyze(records: readonly WorkRecord[], context: BatchContext): BatchAnalyzerResult {
    const flagsByRecord = new Map<string, Flag[]>();
    const notes: DataQualityNote[] = [];

    for (const analyzer of this.analyzers) {
      const result = analyzer.analyze(records, context);
      for (const [recordId, flags] of result.flagsByRecord) {
        for (const flag of flags) attachFlag(flagsByRecord, recordId, flag);
      }
      notes.push(...result.notes);
    }

    return { flagsByRecord, notes };
  }
}
