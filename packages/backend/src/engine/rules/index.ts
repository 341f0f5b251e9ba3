export type {
  FlagSeverity,
  FlagId,
  FlagDetailValue,
  Flag,
  RuleOutcome,
  RuleContext,
  RecordRule,
  SurveyFollowUpIndex,
} from './types.js';

export { FLAG_IDS, FLAG_NAMES, SEVERITY_RANK, createFlag } from './flag-catalog.js';
export { DiversionOfFundsRule } from './diversion-of-funds-rule.js';
export { SurveyWastageRule, buildSurveyFollowUpIndex } from './survey-wastage-rule.js';
export { ExcessExpenditureRule } from './excess-expenditure-rule.js';
export { DelayInCompletionRule } from './delay-in-completion-rule.js';
export { CentageRecoveryRule } from './centage-recovery-rule.js';
export { UnspentBalanceRule } from './unspent-balance-rule.js';
export { RuleRegistry } from './rule-registry.js';
export { RecordEvaluator, buildRuleContext } from './record-evaluator.js';
export type { RecordEvaluation } from './record-evaluator.js';
