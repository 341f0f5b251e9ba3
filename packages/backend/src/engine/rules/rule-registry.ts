import type { RecordRule } from './types.js';
import { DiversionOfFundsRule } from './diversion-of-funds-rule.js';
import { SurveyWastageRule } from './survey-wastage-rule.js';
import { ExcessExpenditureRule } from './excess-expenditure-rule.js';
import { DelayInCompletionRule } from './delay-in-completion-rule.js';
import { CentageRecoveryRule } from './centage-recovery-rule.js';
import { UnspentBalanceRule } from './unspent-balance-rule.js';

/** Rules run in registration order; the default order is part of the report contract. */
export class RuleRegistry {
  private rules: RecordRule[] = [];

  constructor({ defaults = true }: { defaults?: boolean } = {}) {
    if (defaults) {
      this.rules.push(
        new DiversionOfFundsRule(),
        new SurveyWastageRule(),
        new ExcessExpenditureRule(),
        new DelayInCompletionRule(),
        new CentageRecoveryRule(),
        new UnspentBalanceRule(),
      );
    }
  }

  register(rule: RecordRule): void {
    this.rules.push(rule);
  }

  getAll(): RecordRule[] {
    return [...this.rules];
  }
}
