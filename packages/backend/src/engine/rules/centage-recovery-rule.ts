import type { WorkRecord } from '../records/types.js';
import { createFlag, round2 } from './flag-catalog.js';
import type { RecordRule, RuleContext, RuleOutcome } from './types.js';

export class CentageRecoveryRule implements RecordRule {
  readonly flagId = 7;
  readonly name = 'Non-Recovery of Centage Charges';

  evaluate(record: WorkRecord, context: RuleContext): RuleOutcome {
    if (!record.isDepositWork) return { status: 'not-applicable' };

    const { contractCost, centageRecovered } = record;
    if (contractCost === null || centageRecovered === null) {
      const missing: string[] = [];
      if (contractCost === null) missing.push('contractCost');
      if (centageRecovered === null) missing.push('centageRecovered');
      return { status: 'skipped', missing };
    }

    const { centageRate, centageTolerance } = context.config;
    const expected = centageRate * contractCost;
    const shortfall = expected - centageRecovered;
    if (shortfall <= centageTolerance) return { status: 'clear' };

    return {
      status: 'flagged',
      flag: createFlag(
        this.flagId,
        'MEDIUM',
        `Centage recovered ${centageRecovered} is below ${round2(centageRate * 100)}% of contract cost (${round2(expected)})`,
        {
          contractCost,
          centageRate,
          expectedCentage: round2(expected),
          centageRecovered,
          shortfall: round2(shortfall),
        }
      ),
    };
  }
}
