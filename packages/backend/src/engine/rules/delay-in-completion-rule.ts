import { addDays, diffDays, startOfUtcDay, toIsoDate } from '../records/dates.js';
import { isComplete } from '../records/work-record.js';
import type { WorkRecord } from '../records/types.js';
import { createFlag } from './flag-catalog.js';
import type { RecordRule, RuleContext, RuleOutcome } from './types.js';

export class DelayInCompletionRule implements RecordRule {
  readonly flagId = 5;
  readonly name = 'Delay in Completion of Work';

  evaluate(record: WorkRecord, context: RuleContext): RuleOutcome {
    const { workOrderDate, originalTimeLimitDays: limit, physicalProgressPercent: progress } = record;

    // A zero time limit is a blank cell in practice.
    if (!workOrderDate || !limit || progress === null) {
      const missing: string[] = [];
      if (!workOrderDate) missing.push('workOrderDate');
      if (!limit) missing.push('originalTimeLimitDays');
      if (progress === null) missing.push('physicalProgressPercent');
      return { status: 'skipped', missing };
    }

    if (isComplete(record)) return { status: 'clear' };

    const expected = addDays(workOrderDate, limit);
    const today = startOfUtcDay(context.asOf);
    const delayDays = diffDays(expected, today);
    if (delayDays <= 0) return { status: 'clear' };

    const escalated = delayDays > context.config.delayEscalationMultiplier * limit;

    return {
      status: 'flagged',
      flag: createFlag(
        this.flagId,
        escalated ? 'HIGH' : 'MEDIUM',
        `Work delayed by ${delayDays} days, physical progress: ${progress}%`,
        {
          workOrderDate: toIsoDate(workOrderDate),
          timeLimitDays: limit,
          expectedCompletion: toIsoDate(expected),
          asOf: toIsoDate(today),
          delayDays,
          physicalProgressPercent: progress,
        }
      ),
    };
  }
}
