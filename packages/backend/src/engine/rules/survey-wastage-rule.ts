import { addDays, toIsoDate } from '../records/dates.js';
import { issueDate, roadGroupKey } from '../records/work-record.js';
import type { WorkRecord } from '../records/types.js';
import { createFlag } from './flag-catalog.js';
import type { RecordRule, RuleContext, RuleOutcome, SurveyFollowUpIndex } from './types.js';

/**
 * Index execution-phase works by budget item and by numbered road, so each
 * survey can look up its possible follow-ups without scanning the ledger.
 */
export function buildSurveyFollowUpIndex(records: readonly WorkRecord[]): SurveyFollowUpIndex {
  const byBudgetItem = new Map<string, WorkRecord[]>();
  const byRoad = new Map<string, WorkRecord[]>();

  for (const record of records) {
    if (record.workType === 'survey') continue;

    const items = byBudgetItem.get(record.budgetItemNo) ?? [];
    items.push(record);
    byBudgetItem.set(record.budgetItemNo, items);

    if (record.roadNumber) {
      const key = roadGroupKey(record);
      if (key) {
        const onRoad = byRoad.get(key) ?? [];
        onRoad.push(record);
        byRoad.set(key, onRoad);
      }
    }
  }

  return { byBudgetItem, byRoad };
}

function sameStretch(survey: WorkRecord, work: WorkRecord): boolean {
  if (
    survey.chainageFrom === null ||
    survey.chainageTo === null ||
    work.chainageFrom === null ||
    work.chainageTo === null
  ) {
    return true;
  }
  return Math.max(survey.chainageFrom, work.chainageFrom) <= Math.min(survey.chainageTo, work.chainageTo);
}

export class SurveyWastageRule implements RecordRule {
  readonly flagId = 2;
  readonly name = 'Wasteful Expenditure on Survey Works';

  evaluate(record: WorkRecord, context: RuleContext): RuleOutcome {
    if (record.workType !== 'survey') return { status: 'not-applicable' };
    if (record.totalExpenditure <= 0) return { status: 'clear' };

    const surveyDate = issueDate(record);
    if (!surveyDate) {
      return { status: 'skipped', missing: ['workOrderDate', 'aaDate'] };
    }

    const windowEnd = addDays(surveyDate, context.config.surveyFollowUpDays);
    // Follow-up may still be issued.
    if (windowEnd.getTime() > context.asOf.getTime()) return { status: 'clear' };

    const candidates = new Set<WorkRecord>(context.followUps.byBudgetItem.get(record.budgetItemNo) ?? []);
    const key = record.roadNumber ? roadGroupKey(record) : null;
    if (key) {
      for (const work of context.followUps.byRoad.get(key) ?? []) {
        if (sameStretch(record, work)) candidates.add(work);
      }
    }

    for (const work of candidates) {
      const issued = issueDate(work);
      // Undated works are given the benefit of the doubt.
      if (!issued) return { status: 'clear' };
      if (issued.getTime() >= surveyDate.getTime() && issued.getTime() <= windowEnd.getTime()) {
        return { status: 'clear' };
      }
    }

    return {
      status: 'flagged',
      flag: createFlag(
        this.flagId,
        'MEDIUM',
        `Survey expenditure of ${record.totalExpenditure} with no execution work issued within ${context.config.surveyFollowUpDays} days`,
        {
          surveyDate: toIsoDate(surveyDate),
          followUpWindowEnd: toIsoDate(windowEnd),
          followUpWindowDays: context.config.surveyFollowUpDays,
          surveyExpenditure: record.totalExpenditure,
        }
      ),
    };
  }
}
