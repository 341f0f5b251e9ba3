import { toRecordRef } from '../records/work-record.js';
import type { DataQualityNote, DataQualityNoteKind, RecordRef, WorkRecord } from '../records/types.js';
import { FLAG_IDS, FLAG_NAMES, SEVERITY_RANK } from '../rules/flag-catalog.js';
import type { Flag, FlagId, FlagSeverity } from '../rules/types.js';
import type { AnalysisSummary, RedFlaggedRecord } from './types.js';

export function maxSeverity(flags: readonly Flag[]): FlagSeverity {
  let highest: FlagSeverity = 'LOW';
  for (const flag of flags) {
    if (SEVERITY_RANK[flag.severity] > SEVERITY_RANK[highest]) highest = flag.severity;
  }
  return highest;
}

export interface Partition {
  redFlagged: RedFlaggedRecord[];
  greenFlagged: RecordRef[];
}

/**
 * Merge record-rule flags and batch flags per record id and split the
 * records, in input order, into red and green.
 */
export function aggregateFlags(
  records: readonly WorkRecord[],
  recordFlags: ReadonlyMap<string, readonly Flag[]>,
  batchFlags: ReadonlyMap<string, readonly Flag[]>
): Partition {
  const redFlagged: RedFlaggedRecord[] = [];
  const greenFlagged: RecordRef[] = [];

  for (const record of records) {
    const flags = Object.freeze([
      ...(recordFlags.get(record.id) ?? []),
      ...(batchFlags.get(record.id) ?? []),
    ]);

    if (flags.length === 0) {
      greenFlagged.push(toRecordRef(record));
    } else {
      redFlagged.push(
        Object.freeze({ record: toRecordRef(record), flags, overallSeverity: maxSeverity(flags) })
      );
    }
  }

  return { redFlagged, greenFlagged };
}

function emptyFlagCounts(): Record<FlagId, number> {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 0, 8: 0 };
}

export function buildSummary(
  totalRows: number,
  analyzedRecords: number,
  partition: Partition,
  notes: readonly DataQualityNote[]
): AnalysisSummary {
  const byFlagId = emptyFlagCounts();
  const byFlagName: Record<string, number> = {};
  const bySeverity: Record<FlagSeverity, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  let totalFlags = 0;

  for (const entry of partition.redFlagged) {
    for (const flag of entry.flags) {
      byFlagId[flag.flagId] += 1;
      bySeverity[flag.severity] += 1;
      totalFlags += 1;
    }
  }
  for (const id of FLAG_IDS) {
    if (byFlagId[id] > 0) byFlagName[FLAG_NAMES[id]] = byFlagId[id];
  }

  const noteCounts: Record<DataQualityNoteKind, number> = {
    EXCLUDED_RECORD: 0,
    DUPLICATE_RECORD: 0,
    RULE_SKIPPED: 0,
    UNKNOWN_COLUMN: 0,
  };
  for (const note of notes) noteCounts[note.kind] += 1;

  return Object.freeze({
    totalRows,
    analyzedRecords,
    excludedRecords: noteCounts.EXCLUDED_RECORD + noteCounts.DUPLICATE_RECORD,
    redFlaggedCount: partition.redFlagged.length,
    greenFlaggedCount: partition.greenFlagged.length,
    totalFlags,
    byFlagId: Object.freeze(byFlagId),
    byFlagName: Object.freeze(byFlagName),
    bySeverity: Object.freeze(bySeverity),
    dataQualityNotes: Object.freeze(noteCounts),
  });
}
