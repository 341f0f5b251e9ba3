import { toLedgerAmount } from '../../lib/config/analysis.js';
import { isComplete } from '../records/work-record.js';
import type { WorkRecord } from '../records/types.js';
import { createFlag } from './flag-catalog.js';
import type { RecordRule, RuleContext, RuleOutcome } from './types.js';

export class UnspentBalanceRule implements RecordRule {
  readonly flagId = 8;
  readonly name = 'Unspent Balance Not Returned';

  evaluate(record: WorkRecord, context: RuleContext): RuleOutcome {
    if (!record.isDepositWork) return { status: 'not-applicable' };
    if (record.physicalProgressPercent === null) {
      return { status: 'skipped', missing: ['physicalProgressPercent'] };
    }
    if (!isComplete(record)) return { status: 'clear' };

    const balance = record.unspentBalance;
    if (balance === null) return { status: 'skipped', missing: ['unspentBalance'] };

    const threshold = toLedgerAmount(context.config.unspentBalanceThreshold, context.config);
    if (balance <= threshold || record.refundRecorded) return { status: 'clear' };

    return {
      status: 'flagged',
      flag: createFlag(
        this.flagId,
        'HIGH',
        `Completed deposit work holds unspent balance of ${balance} with no refund recorded`,
        {
          unspentBalance: balance,
          threshold,
          amountUnit: context.config.amountUnit,
          refundRecorded: false,
        }
      ),
    };
  }
}
