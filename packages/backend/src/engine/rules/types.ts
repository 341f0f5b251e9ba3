import type { AnalysisConfig } from '../../lib/config/analysis.js';
import type { WorkRecord } from '../records/types.js';

export type FlagSeverity = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Stable rule identifiers:
 * 1 diversion, 2 survey wastage, 3 excess expenditure, 4 overlapping works,
 * 5 delay, 6 splitting, 7 centage, 8 unspent balance.
 */
export type FlagId = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export type FlagDetailValue = string | number | boolean | null | readonly string[];

export interface Flag {
  readonly flagId: FlagId;
  readonly flagName: string;
  readonly severity: FlagSeverity;
  readonly description: string;
  readonly details: Readonly<Record<string, FlagDetailValue>>;
}

export type RuleOutcome =
  | { status: 'flagged'; flag: Flag }
  | { status: 'clear' }
  | { status: 'not-applicable' }
  | { status: 'skipped'; missing: string[]; reason?: string };

/** Execution-phase works that can count as the follow-up to a survey. */
export interface SurveyFollowUpIndex {
  byBudgetItem: ReadonlyMap<string, readonly WorkRecord[]>;
  byRoad: ReadonlyMap<string, readonly WorkRecord[]>;
}

export interface RuleContext {
  readonly config: AnalysisConfig;
  readonly asOf: Date;
  readonly followUps: SurveyFollowUpIndex;
}

export interface RecordRule {
  readonly flagId: FlagId;
  readonly name: string;
  evaluate(record: WorkRecord, context: RuleContext): RuleOutcome;
}
