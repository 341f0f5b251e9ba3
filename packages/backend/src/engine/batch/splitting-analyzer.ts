import { toLedgerAmount } from '../../lib/config/analysis.js';
import { DAY_MS, toIsoDate } from '../records/dates.js';
import { issueDate, roadGroupKey } from '../records/work-record.js';
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
import { BigramDiceSimilarity, workNameSimilarity } from './text-similarity.js';
import type {
  BatchAnalyzerResult,
  BatchContext,
  CrossRecordAnalyzer,
  StringSimilarity,
} from './types.js';

interface Candidate {
  readonly record: WorkRecord;
  readonly from: number;
  readonly to: number;
  readonly cost: number;
  readonly issued: Date;
}

class DisjointSet {
  private parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    // Lower index stays root so components are labelled the same way every run.
    if (rootA < rootB) this.parent[rootB] = rootA;
    else if (rootB < rootA) this.parent[rootA] = rootB;
  }
}

function componentsOf(
  candidates: readonly Candidate[],
  links: ReadonlyArray<readonly [number, number]>,
  include: (a: number, b: number) => boolean
): number[][] {
  const sets = new DisjointSet(candidates.length);
  for (const [a, b] of links) {
    if (include(a, b)) sets.union(a, b);
  }
  const components = new Map<number, number[]>();
  candidates.forEach((_, i) => {
    const root = sets.find(i);
    const members = components.get(root) ?? [];
    members.push(i);
    components.set(root, members);
  });
  return [...components.values()];
}

/**
 * Linked candidates grouped so that no group spans more than `windowMs`
 * between its first and last issue. A linked component is cut into windows
 * from its earliest issue onward, then re-linked within each window.
 */
function boundedComponents(
  candidates: readonly Candidate[],
  links: ReadonlyArray<readonly [number, number]>,
  windowMs: number
): Candidate[][] {
  const windowOf = new Array<number>(candidates.length).fill(0);
  let nextWindow = 0;

  for (const members of componentsOf(candidates, links, () => true)) {
    const byIssue = [...members].sort(
      (a, b) => candidates[a].issued.getTime() - candidates[b].issued.getTime() || a - b
    );
    let windowStart = candidates[byIssue[0]].issued.getTime();
    let current = nextWindow++;
    for (const i of byIssue) {
      const issued = candidates[i].issued.getTime();
      if (issued - windowStart > windowMs) {
        windowStart = issued;
        current = nextWindow++;
      }
      windowOf[i] = current;
    }
  }

  return componentsOf(candidates, links, (a, b) => windowOf[a] === windowOf[b]).map((members) =>
    members.map((i) => candidates[i])
  );
}

/**
 * Splitting of works: several sub-threshold contracts on one stretch of road,
 * with alike names and issued close together, that together would have
 * needed an e-tender.
 */
export class SplittingAnalyzer implements CrossRecordAnalyzer {
  readonly id = 'splitting-of-works';
  readonly name = 'Splitting of Work';

  private similarity: StringSimilarity;

  constructor(similarity?: StringSimilarity) {
    this.similarity = similarity ?? new BigramDiceSimilarity();
  }

  analyze(records: readonly WorkRecord[], context: BatchContext): BatchAnalyzerResult {
    const { splitting } = context.config;
    const ceiling = toLedgerAmount(splitting.tenderThreshold, context.config);
    const notes: DataQualityNote[] = [];
    const flagsByRecord = new Map<string, Flag[]>();

    const groups = groupIndices(records, roadGroupKey);
    for (const record of records) {
      if (roadGroupKey(record) === null) notes.push(unplacedRecordNote(record, 6, this.name));
    }

    for (const indices of groups.values()) {
      const candidates: Candidate[] = [];

      for (const index of indices) {
        const record = records[index];
        const { chainageFrom: from, chainageTo: to, contractCost: cost } = record;
        const issued = issueDate(record);

        if (cost === null || !issued) {
          const missing: string[] = [];
          if (cost === null) missing.push('contractCost');
          if (!issued) missing.push('workOrderDate', 'aaDate');
          notes.push({
            kind: 'RULE_SKIPPED',
            rowNumber: record.rowNumber,
            recordId: record.id,
            flagId: 6,
            message: `${this.name} not checked for record ${record.id}: missing ${missing.join(', ')}`,
            fields: missing,
          });
          continue;
        }
        // Missing chainage is already reported by the overlap check.
        if (from === null || to === null) continue;
        if (cost <= 0 || cost >= ceiling) continue;

        candidates.push({ record, from, to, cost, issued });
      }

      candidates.sort(
        (a, b) => a.from - b.from || a.to - b.to || compareIds(a.record.id, b.record.id)
      );

      const windowMs = splitting.timeWindowDays * DAY_MS;
      const links: Array<[number, number]> = [];

      for (let i = 0; i < candidates.length; i++) {
        const a = candidates[i];
        for (let j = i + 1; j < candidates.length; j++) {
          const b = candidates[j];
          // Sorted by start: once the gap is too wide, it only widens.
          if (b.from - a.to > splitting.maxChainageGapKm) break;
          if (Math.abs(a.issued.getTime() - b.issued.getTime()) > windowMs) continue;
          if (workNameSimilarity(a.record, b.record, this.similarity) < splitting.nameSimilarityThreshold) {
            continue;
          }
          links.push([i, j]);
        }
      }

      const components = boundedComponents(candidates, links, windowMs);
      for (const members of components) {
        if (members.length < splitting.minGroupSize) continue;
        const combinedCost = members.reduce((sum, m) => sum + m.cost, 0);
        if (combinedCost <= ceiling) continue;

        const issuedTimes = members.map((m) => m.issued.getTime());
        const span = {
          chainageFrom: Math.min(...members.map((m) => m.from)),
          chainageTo: Math.max(...members.map((m) => m.to)),
          firstIssued: toIsoDate(new Date(Math.min(...issuedTimes))),
          lastIssued: toIsoDate(new Date(Math.max(...issuedTimes))),
        };

        for (const member of members) {
          const siblings = members.filter((m) => m !== member).map((m) => m.record.id);
          attachFlag(
            flagsByRecord,
            member.record.id,
            createFlag(
              6,
              'HIGH',
              `Potential splitting on ${roadLabel(member.record)}: ${members.length} works each below ${round2(ceiling)} total ${round2(combinedCost)}`,
              {
                siblingRecordIds: siblings,
                groupSize: members.length,
                combinedCost: round2(combinedCost),
                contractCost: member.cost,
                tenderThreshold: round2(ceiling),
                road: roadLabel(member.record),
                ...span,
              }
            )
          );
        }
      }
    }

    return { flagsByRecord, notes };
  }
}
