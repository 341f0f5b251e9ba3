import { toIsoDate } from '../records/dates.js';
import { activeWindow, roadGroupKey, type DateWindow } from '../records/work-record.js';
import type { DataQualityNote, WorkRecord } from '../records/types.js';
import { createFlag, round2 } from '../rules/flag-catalog.js';
import type { Flag } from '../rules/types.js';
import {
  attachFlag,
  compareIds,
  groupIndices,
  roadLabel,
  unplacedRecordNote,
} from './grouping.js';
import type { BatchAnalyzerResult, BatchContext, CrossRecordAnalyzer } from './types.js';

interface Stretch {
  readonly record: WorkRecord;
  readonly from: number;
  readonly to: number;
  readonly window: DateWindow;
}

function windowsIntersect(a: DateWindow, b: DateWindow): DateWindow | null {
  const start = Math.max(a.start.getTime(), b.start.getTime());
  const end = Math.min(a.end.getTime(), b.end.getTime());
  return start <= end ? { start: new Date(start), end: new Date(end) } : null;
}

function byChainage(a: Stretch, b: Stretch): number {
  return a.from - b.from || a.to - b.to || compareIds(a.record.id, b.record.id);
}

/**
 * Overlapping works: two works on the same road whose chainages intersect
 * while both are within their execution or defect liability period.
 *
 * Each road group is swept in chainage order with a list of still-open
 * stretches, so only intersecting pairs are ever compared.
 */
export class OverlapAnalyzer implements CrossRecordAnalyzer {
  readonly id = 'overlapping-works';
  readonly name = 'Overlapping of Work';

  analyze(records: readonly WorkRecord[], context: BatchContext): BatchAnalyzerResult {
    const notes: DataQualityNote[] = [];
    const pairs = new Map<string, Array<{ peer: Stretch; flag: Flag }>>();

    const groups = groupIndices(records, roadGroupKey);
    for (const record of records) {
      if (roadGroupKey(record) === null) notes.push(unplacedRecordNote(record, 4, this.name));
    }

    for (const indices of groups.values()) {
      const stretches: Stretch[] = [];

      for (const index of indices) {
        const record = records[index];
        const { chainageFrom: from, chainageTo: to } = record;
        const window = activeWindow(record, context.config.defaultDlpDays, context.asOf);
        if (from !== null && to !== null && !(from === 0 && to === 0) && window) {
          stretches.push({ record, from, to, window });
          continue;
        }

        const missing: string[] = [];
        if (from === null || to === null || (from === 0 && to === 0)) {
          missing.push('chainageFrom', 'chainageTo');
        }
        if (!window) missing.push('workOrderDate');
        notes.push({
          kind: 'RULE_SKIPPED',
          rowNumber: record.rowNumber,
          recordId: record.id,
          flagId: 4,
          message: `${this.name} not checked for record ${record.id}: missing ${missing.join(', ')}`,
          fields: missing,
        });
      }

      stretches.sort(byChainage);

      let open: Stretch[] = [];
      for (const current of stretches) {
        open = open.filter((stretch) => stretch.to > current.from);
        if (current.to > current.from) {
          for (const earlier of open) {
            const shared = windowsIntersect(earlier.window, current.window);
            if (!shared) continue;
            const overlapTo = Math.min(earlier.to, current.to);
            this.addPair(pairs, current, earlier, current.from, overlapTo, shared);
            this.addPair(pairs, earlier, current, current.from, overlapTo, shared);
          }
          open.push(current);
        }
      }
    }

    const flagsByRecord = new Map<string, Flag[]>();
    for (const record of records) {
      const entries = pairs.get(record.id);
      if (!entries) continue;
      entries.sort((a, b) => byChainage(a.peer, b.peer));
      for (const { flag } of entries) attachFlag(flagsByRecord, record.id, flag);
    }

    return { flagsByRecord, notes };
  }

  private addPair(
    pairs: Map<string, Array<{ peer: Stretch; flag: Flag }>>,
    self: Stretch,
    peer: Stretch,
    overlapFrom: number,
    overlapTo: number,
    shared: DateWindow
  ): void {
    const flag = createFlag(
      4,
      'HIGH',
      `Chainage ${self.from} to ${self.to} on ${roadLabel(self.record)} overlaps record ${peer.record.id} (${peer.from} to ${peer.to}) during its active or defect liability period`,
      {
        peerRecordId: peer.record.id,
        peerRowNumber: peer.record.rowNumber,
        peerBudgetItemNo: peer.record.budgetItemNo,
        road: roadLabel(self.record),
        overlapFrom,
        overlapTo,
        overlapLength: round2(overlapTo - overlapFrom),
        sharedWindowStart: toIsoDate(shared.start),
        sharedWindowEnd: toIsoDate(shared.end),
      }
    );
    const entries = pairs.get(self.record.id) ?? [];
    entries.push({ peer, flag });
    pairs.set(self.record.id, entries);
  }
}
