import { excessPercent } from '../records/work-record.js';
import type { WorkRecord } from '../records/types.js';
import { createFlag, round2 } from './flag-catalog.js';
import type { RecordRule, RuleContext, RuleOutcome } from './types.js';

export class ExcessExpenditureRule implements RecordRule {
  readonly flagId = 3;
  readonly name = 'Excess Expenditure Without Approval';

  evaluate(record: WorkRecord, context: RuleContext): RuleOutcome {
    const percent = excessPercent(record);
    if (record.aaCost === null) {
      return { status: 'skipped', missing: ['aaCost'] };
    }
    if (percent === null) {
      return { status: 'skipped', missing: ['aaCost'], reason: 'aaCost is zero' };
    }

    const { excessThresholdPercent, excessHighSeverityPercent } = context.config;
    if (percent <= excessThresholdPercent) return { status: 'clear' };

    return {
      status: 'flagged',
      flag: createFlag(
        this.flagId,
        percent > excessHighSeverityPercent ? 'HIGH' : 'MEDIUM',
        `Expenditure exceeds Administrative Approval by ${percent.toFixed(2)}%`,
        {
          aaCost: record.aaCost,
          totalExpenditure: record.totalExpenditure,
          excessAmount: round2(record.totalExpenditure - record.aaCost),
          excessPercent: round2(percent),
          thresholdPercent: excessThresholdPercent,
        }
      ),
    };
  }
}
