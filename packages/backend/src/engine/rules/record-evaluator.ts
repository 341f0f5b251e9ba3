import type { AnalysisConfig } from '../../lib/config/analysis.js';
import type { DataQualityNote, WorkRecord } from '../records/types.js';
import { RuleRegistry } from './rule-registry.js';
import { buildSurveyFollowUpIndex } from './survey-wastage-rule.js';
import type { Flag, RuleContext } from './types.js';

export interface RecordEvaluation {
  flags: Flag[];
  notes: DataQualityNote[];
}

export function buildRuleContext(
  records: readonly WorkRecord[],
  config: AnalysisConfig,
  asOf: Date
): RuleContext {
  return {
    config,
    asOf,
    followUps: buildSurveyFollowUpIndex(records),
  };
}

export class RecordEvaluator {
  private registry: RuleRegistry;

  constructor(registry?: RuleRegistry) {
    this.registry = registry ?? new RuleRegistry();
  }

  evaluate(record: WorkRecord, context: RuleContext): RecordEvaluation {
    const flags: Flag[] = [];
    const notes: DataQualityNote[] = [];

    for (const rule of this.registry.getAll()) {
      const outcome = rule.evaluate(record, context);

      switch (outcome.status) {
        case 'flagged':
          flags.push(outcome.flag);
          break;
        case 'skipped':
          notes.push({
            kind: 'RULE_SKIPPED',
            rowNumber: record.rowNumber,
            recordId: record.id,
            flagId: rule.flagId,
            message: `${rule.name} not checked for record ${record.id}: ${
              outcome.reason ?? `missing ${outcome.missing.join(', ')}`
            }`,
            fields: outcome.missing,
          });
          break;
        case 'clear':
        case 'not-applicable':
          break;
      }
    }

    return { flags, notes };
  }
}
