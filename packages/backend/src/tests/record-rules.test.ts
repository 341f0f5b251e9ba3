import { describe, it, expect } from 'vitest';
import {
  CentageRecoveryRule,
  DelayInCompletionRule,
  DiversionOfFundsRule,
  ExcessExpenditureRule,
  RecordEvaluator,
  RuleRegistry,
  SurveyWastageRule,
  UnspentBalanceRule,
  type RuleOutcome,
} from '../engine/rules/index.js';
import { makeContext, makeRecord } from './setup.js';

function flagOf(outcome: RuleOutcome) {
  if (outcome.status !== 'flagged') {
    throw new Error(`expected a flag, got ${outcome.status}`);
  }
  return outcome.flag;
}

describe('ExcessExpenditureRule', () => {
  const rule = new ExcessExpenditureRule();
  const context = makeContext();

  it('does not flag expenditure exactly at the threshold', () => {
    const outcome = rule.evaluate(makeRecord({ aaCost: 100, totalExpenditure: 110 }), context);
    expect(outcome.status).toBe('clear');
  });

  it('flags just above the threshold as MEDIUM', () => {
    const flag = flagOf(rule.evaluate(makeRecord({ aaCost: 100, totalExpenditure: 110.01 }), context));
    expect(flag.severity).toBe('MEDIUM');
    expect(flag.details.excessPercent).toBe(10.01);
  });

  it('flags above the high threshold as HIGH', () => {
    const flag = flagOf(rule.evaluate(makeRecord({ aaCost: 100, totalExpenditure: 125.01 }), context));
    expect(flag.severity).toBe('HIGH');
  });

  it('reports amount and percentage of the excess', () => {
    const flag = flagOf(rule.evaluate(makeRecord({ aaCost: 100, totalExpenditure: 115 }), context));

    expect(flag.flagId).toBe(3);
    expect(flag.flagName).toBe('Excess Expenditure Without Approval');
    expect(flag.description).toBe('Expenditure exceeds Administrative Approval by 15.00%');
    expect(flag.details).toEqual({
      aaCost: 100,
      totalExpenditure: 115,
      excessAmount: 15,
      excessPercent: 15,
      thresholdPercent: 10,
    });
  });

  it('is skipped without an AA cost', () => {
    const outcome = rule.evaluate(makeRecord({ aaCost: undefined }), context);
    expect(outcome).toEqual({ status: 'skipped', missing: ['aaCost'] });
  });

  it('is skipped with a reason when the AA cost is zero', () => {
    const outcome = rule.evaluate(makeRecord({ aaCost: 0 }), context);
    expect(outcome).toEqual({ status: 'skipped', missing: ['aaCost'], reason: 'aaCost is zero' });
  });

  it('honours a configured threshold', () => {
    const outcome = rule.evaluate(
      makeRecord({ aaCost: 100, totalExpenditure: 115 }),
      makeContext([], { excessThresholdPercent: 20, excessHighSeverityPercent: 30 })
    );
    expect(outcome.status).toBe('clear');
  });
});

describe('DelayInCompletionRule', () => {
  const rule = new DelayInCompletionRule();
  const context = makeContext();
  const openWork = {
    workOrderDate: '2024-01-01',
    physicalCompletionDate: undefined,
    physicalProgressPercent: 40,
  };

  it('flags an overdue work as MEDIUM', () => {
    const flag = flagOf(rule.evaluate(makeRecord({ ...openWork, originalTimeLimitDays: 90 }), context));

    expect(flag.severity).toBe('MEDIUM');
    expect(flag.description).toBe('Work delayed by 91 days, physical progress: 40%');
    expect(flag.details.expectedCompletion).toBe('2024-03-31');
    expect(flag.details.delayDays).toBe(91);
  });

  it('escalates to HIGH beyond the multiplier', () => {
    const flag = flagOf(rule.evaluate(makeRecord({ ...openWork, originalTimeLimitDays: 30 }), context));

    expect(flag.severity).toBe('HIGH');
    expect(flag.details.delayDays).toBe(151);
  });

  it('clears completed works', () => {
    const outcome = rule.evaluate(
      makeRecord({ ...openWork, originalTimeLimitDays: 30, physicalProgressPercent: 100 }),
      context
    );
    expect(outcome.status).toBe('clear');
  });

  it('clears works still within the time limit', () => {
    const outcome = rule.evaluate(makeRecord({ ...openWork, originalTimeLimitDays: 365 }), context);
    expect(outcome.status).toBe('clear');
  });

  it('treats a zero time limit as missing', () => {
    const outcome = rule.evaluate(makeRecord({ ...openWork, originalTimeLimitDays: 0 }), context);
    expect(outcome).toEqual({ status: 'skipped', missing: ['originalTimeLimitDays'] });
  });
});

describe('DiversionOfFundsRule', () => {
  const rule = new DiversionOfFundsRule();

  it('flags deposit works booked under another head', () => {
    const flag = flagOf(
      rule.evaluate(makeRecord({ isDepositWork: true, expenditureHead: '2059-80-001' }))
    );

    expect(flag.severity).toBe('HIGH');
    expect(flag.details.headOfAccount).toBe('5054-03-337');
    expect(flag.details.expenditureHead).toBe('2059-80-001');
  });

  it('ignores formatting differences between heads', () => {
    const outcome = rule.evaluate(makeRecord({ isDepositWork: true, expenditureHead: '5054 03 337' }));
    expect(outcome.status).toBe('clear');
  });

  it('does not apply to regular works', () => {
    const outcome = rule.evaluate(makeRecord({ expenditureHead: '2059-80-001' }));
    expect(outcome.status).toBe('not-applicable');
  });

  it('is skipped when the booked head is unknown', () => {
    const outcome = rule.evaluate(makeRecord({ isDepositWork: true, expenditureHead: undefined }));
    expect(outcome).toEqual({ status: 'skipped', missing: ['expenditureHead'] });
  });
});

describe('CentageRecoveryRule', () => {
  const rule = new CentageRecoveryRule();
  const context = makeContext();

  it('flags a recovery short of the centage rate', () => {
    const flag = flagOf(
      rule.evaluate(makeRecord({ isDepositWork: true, contractCost: 20, centageRecovered: 0.5 }), context)
    );

    expect(flag.severity).toBe('MEDIUM');
    expect(flag.details.expectedCentage).toBe(1);
    expect(flag.details.shortfall).toBe(0.5);
  });

  it('tolerates rounding in the recorded amount', () => {
    const outcome = rule.evaluate(
      makeRecord({ isDepositWork: true, contractCost: 20, centageRecovered: 0.995 }),
      context
    );
    expect(outcome.status).toBe('clear');
  });

  it('is skipped when centage was never recorded', () => {
    const outcome = rule.evaluate(makeRecord({ isDepositWork: true }), context);
    expect(outcome).toEqual({ status: 'skipped', missing: ['centageRecovered'] });
  });
});

describe('UnspentBalanceRule', () => {
  const rule = new UnspentBalanceRule();

  it('flags a completed deposit work holding more than a lakh', () => {
    const flag = flagOf(
      rule.evaluate(makeRecord({ isDepositWork: true, unspentBalance: 1.5 }), makeContext())
    );

    expect(flag.severity).toBe('HIGH');
    expect(flag.details.threshold).toBe(1);
    expect(flag.details.amountUnit).toBe('LAKH');
  });

  it('clears once a refund is recorded', () => {
    const outcome = rule.evaluate(
      makeRecord({ isDepositWork: true, unspentBalance: 1.5, refundRecorded: 'yes' }),
      makeContext()
    );
    expect(outcome.status).toBe('clear');
  });

  it('does not flag a balance equal to the threshold', () => {
    const outcome = rule.evaluate(makeRecord({ isDepositWork: true, unspentBalance: 1 }), makeContext());
    expect(outcome.status).toBe('clear');
  });

  it('compares in rupees for rupee ledgers', () => {
    const outcome = rule.evaluate(
      makeRecord({ isDepositWork: true, unspentBalance: 150000 }),
      makeContext([], { amountUnit: 'RUPEE' })
    );
    expect(outcome.status).toBe('flagged');
  });

  it('waits for the work to complete', () => {
    const outcome = rule.evaluate(
      makeRecord({ isDepositWork: true, unspentBalance: 5, physicalProgressPercent: 60 }),
      makeContext()
    );
    expect(outcome.status).toBe('clear');
  });
});

describe('SurveyWastageRule', () => {
  const rule = new SurveyWastageRule();
  const survey = makeRecord({
    serialNo: 'S1',
    budgetItemNo: 'BI-200',
    workName: 'Survey for widening of SH-12',
    workType: 'Survey',
    workOrderDate: '2022-01-15',
    totalExpenditure: 2.5,
  });

  it('flags a survey with no follow-up inside the window', () => {
    const flag = flagOf(rule.evaluate(survey, makeContext([survey])));

    expect(flag.severity).toBe('MEDIUM');
    expect(flag.details.surveyDate).toBe('2022-01-15');
    expect(flag.details.followUpWindowEnd).toBe('2023-01-15');
  });

  it('clears when the same budget item was executed', () => {
    const followUp = makeRecord({
      serialNo: '9',
      budgetItemNo: 'BI-200',
      roadNumber: 'NH-4',
      workOrderDate: '2022-06-01',
    });
    expect(rule.evaluate(survey, makeContext([survey, followUp])).status).toBe('clear');
  });

  it('clears when work was issued on the surveyed stretch', () => {
    const followUp = makeRecord({
      serialNo: '9',
      budgetItemNo: 'BI-300',
      chainageFrom: 1,
      chainageTo: 3,
      workOrderDate: '2022-09-01',
    });
    expect(rule.evaluate(survey, makeContext([survey, followUp])).status).toBe('clear');
  });

  it('ignores work issued after the window closed', () => {
    const lateWork = makeRecord({
      serialNo: '9',
      budgetItemNo: 'BI-300',
      workOrderDate: '2023-06-01',
    });
    expect(rule.evaluate(survey, makeContext([survey, lateWork])).status).toBe('flagged');
  });

  it('waits until the follow-up window has elapsed', () => {
    const recent = makeRecord({ workType: 'Survey', workOrderDate: '2024-01-01' });
    expect(rule.evaluate(recent, makeContext([recent])).status).toBe('clear');
  });
});

describe('RecordEvaluator', () => {
  it('runs every rule in registry order', () => {
    const ids = new RuleRegistry().getAll().map((rule) => rule.flagId);
    expect(ids).toEqual([1, 2, 3, 5, 7, 8]);
  });

  it('collects flags and turns skipped rules into notes', () => {
    const record = makeRecord({ isDepositWork: true, totalExpenditure: 130 });
    const evaluation = new RecordEvaluator().evaluate(record, makeContext([record]));

    expect(evaluation.flags.map((f) => f.flagId)).toEqual([3]);
    expect(evaluation.notes).toEqual([
      {
        kind: 'RULE_SKIPPED',
        rowNumber: 2,
        recordId: '1',
        flagId: 7,
        message: 'Non-Recovery of Centage Charges not checked for record 1: missing centageRecovered',
        fields: ['centageRecovered'],
      },
      {
        kind: 'RULE_SKIPPED',
        rowNumber: 2,
        recordId: '1',
        flagId: 8,
        message: 'Unspent Balance Not Returned not checked for record 1: missing unspentBalance',
        fields: ['unspentBalance'],
      },
    ]);
  });

  it('reports a zero AA cost as such rather than as missing', () => {
    const record = makeRecord({ aaCost: 0 });
    const evaluation = new RecordEvaluator().evaluate(record, makeContext([record]));

    expect(evaluation.notes.filter((note) => note.flagId === 3)).toEqual([
      {
        kind: 'RULE_SKIPPED',
        rowNumber: 2,
        recordId: '1',
        flagId: 3,
        message: 'Excess Expenditure Without Approval not checked for record 1: aaCost is zero',
        fields: ['aaCost'],
      },
    ]);
  });
});
