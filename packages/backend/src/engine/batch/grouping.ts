import type { DataQualityNote, WorkRecord } from '../records/types.js';
import type { Flag, FlagId } from '../rules/types.js';

/**
 * Index-based grouping: group key → record indices, in input order. Records
 * for which `keyOf` returns null are left out. Keys come back sorted so that
 * downstream iteration does not depend on input order.
 */
export function groupIndices(
  records: readonly WorkRecord[],
  keyOf: (record: WorkRecord) => string | null
): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  records.forEach((record, index) => {
    const key = keyOf(record);
    if (key === null) return;
    const members = groups.get(key);
    if (members) {
      members.push(index);
    } else {
      groups.set(key, [index]);
    }
  });
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** Note for a record that cannot be placed on any road, so a batch rule never saw it. */
export function unplacedRecordNote(record: WorkRecord, flagId: FlagId, ruleName: string): DataQualityNote {
  return {
    kind: 'RULE_SKIPPED',
    rowNumber: record.rowNumber,
    recordId: record.id,
    flagId,
    message: `${ruleName} not checked for record ${record.id}: missing roadCategory`,
    fields: ['roadCategory'],
  };
}

export function compareIds(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}

export function attachFlag(flagsByRecord: Map<string, Flag[]>, recordId: string, flag: Flag): void {
  const existing = flagsByRecord.get(recordId);
  if (existing) {
    existing.push(flag);
  } else {
    flagsByRecord.set(recordId, [flag]);
  }
}

/** Human label for a road group, e.g. "SH12" or "MDR (unnumbered)". */
export function roadLabel(record: WorkRecord): string {
  if (record.roadNumber) return record.roadNumber;
  return record.roadCategory ? `${record.roadCategory} (unnumbered)` : 'unknown road';
}
