import type { WorkRecord } from '../records/types.js';
import { createFlag } from './flag-catalog.js';
import type { RecordRule, RuleOutcome } from './types.js';

function normalizeHead(head: string): string {
  return head.toUpperCase().replace(/[^\p{L}\p{N}]/gu, '');
}

export class DiversionOfFundsRule implements RecordRule {
  readonly flagId = 1;
  readonly name = 'Diversion of Funds';

  evaluate(record: WorkRecord): RuleOutcome {
    if (!record.isDepositWork) return { status: 'not-applicable' };

    const sanctionedHead = record.headOfAccount;
    const bookedHead = record.expenditureHead;
    if (!sanctionedHead || !bookedHead) {
      const missing: string[] = [];
      if (!sanctionedHead) missing.push('headOfAccount');
      if (!bookedHead) missing.push('expenditureHead');
      return { status: 'skipped', missing };
    }

    if (normalizeHead(sanctionedHead) === normalizeHead(bookedHead)) {
      return { status: 'clear' };
    }

    return {
      status: 'flagged',
      flag: createFlag(
        this.flagId,
        'HIGH',
        `Deposit work expenditure booked under "${bookedHead}" instead of sanctioned head "${sanctionedHead}"`,
        {
          headOfAccount: sanctionedHead,
          expenditureHead: bookedHead,
          totalExpenditure: record.totalExpenditure,
        }
      ),
    };
  }
}
