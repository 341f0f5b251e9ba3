import { describe, it, expect } from 'vitest';
import { SplittingAnalyzer, type StringSimilarity } from '../engine/batch/index.js';
import { resolveAnalysisConfig } from '../lib/config/analysis.js';
import type { WorkRecordInput } from '../schemas/work-record.schema.js';
import { AS_OF, makeRecord } from './setup.js';

const context = { config: resolveAnalysisConfig(), asOf: AS_OF };

function piece(
  serialNo: string,
  from: number,
  to: number,
  workOrderDate: string,
  overrides: Partial<Record<keyof WorkRecordInput, unknown>> = {}
) {
  return makeRecord({
    serialNo,
    workName: `Strengthening of SH-12 km ${from} to ${to}`,
    chainageFrom: from,
    chainageTo: to,
    contractCost: 8,
    workOrderDate,
    ...overrides,
  });
}

describe('SplittingAnalyzer', () => {
  const analyzer = new SplittingAnalyzer();

  it('flags every member of a split group', () => {
    const records = [
      piece('1', 10, 12, '2024-01-05'),
      piece('2', 12, 14, '2024-01-20'),
      piece('3', 14, 16, '2024-02-10'),
    ];

    const result = analyzer.analyze(records, context);

    expect([...result.flagsByRecord.keys()].sort()).toEqual(['1', '2', '3']);
    const [flag] = result.flagsByRecord.get('1') ?? [];
    expect(flag.flagId).toBe(6);
    expect(flag.severity).toBe('HIGH');
    expect(flag.description).toBe('Potential splitting on SH12: 3 works each below 10 total 24');
    expect(flag.details).toEqual({
      siblingRecordIds: ['2', '3'],
      groupSize: 3,
      combinedCost: 24,
      contractCost: 8,
      tenderThreshold: 10,
      road: 'SH12',
      chainageFrom: 10,
      chainageTo: 16,
      firstIssued: '2024-01-05',
      lastIssued: '2024-02-10',
    });
  });

  it('needs at least the minimum group size', () => {
    const result = analyzer.analyze(
      [piece('1', 10, 12, '2024-01-05'), piece('2', 12, 14, '2024-01-20')],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });

  it('leaves out works with unrelated names', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2024-01-05'),
        piece('2', 12, 14, '2024-01-20'),
        piece('3', 14, 16, '2024-02-10', { workName: 'Construction of bridge over river' }),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });

  it('leaves out works issued outside the time window', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2024-01-05'),
        piece('2', 12, 14, '2024-01-20'),
        piece('3', 14, 16, '2024-12-01'),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });

  it('chains works linked through an intermediate one', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2024-01-01'),
        piece('2', 12, 14, '2024-03-01'),
        piece('3', 14, 16, '2024-05-01'),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(3);
  });

  it('bounds a chained group by the time window', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2024-01-01'),
        piece('2', 12, 14, '2024-03-01'),
        piece('3', 14, 16, '2024-05-01'),
        piece('4', 16, 18, '2024-08-01'),
      ],
      context
    );

    expect([...result.flagsByRecord.keys()].sort()).toEqual(['1', '2', '3']);
    const [flag] = result.flagsByRecord.get('3') ?? [];
    expect(flag.details.firstIssued).toBe('2024-01-01');
    expect(flag.details.lastIssued).toBe('2024-05-01');
    expect(flag.details.siblingRecordIds).toEqual(['1', '2']);
  });

  it('does not let a long chain of works grow into one group', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2021-01-01'),
        piece('2', 12, 14, '2021-06-01'),
        piece('3', 14, 16, '2021-11-01'),
        piece('4', 16, 18, '2022-04-01'),
        piece('5', 18, 20, '2022-09-01'),
        piece('6', 20, 22, '2023-02-01'),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });

  it('only considers contracts below the tender threshold', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2024-01-05'),
        piece('2', 12, 14, '2024-01-20'),
        piece('3', 14, 16, '2024-02-10', { contractCost: 10 }),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });

  it('does not link stretches further apart than the chainage gap', () => {
    const result = analyzer.analyze(
      [
        piece('1', 10, 12, '2024-01-05'),
        piece('2', 12, 14, '2024-01-20'),
        piece('3', 20, 22, '2024-02-10'),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });

  it('notes works without a contract cost', () => {
    const result = analyzer.analyze([piece('1', 10, 12, '2024-01-05', { contractCost: undefined })], context);

    expect(result.notes).toHaveLength(1);
    expect(result.notes[0].flagId).toBe(6);
    expect(result.notes[0].fields).toEqual(['contractCost']);
  });

  it('notes works it cannot place on a road', () => {
    const result = analyzer.analyze(
      [piece('1', 10, 12, '2024-01-05', { roadNumber: undefined, roadCategory: undefined, workName: 'Drainage' })],
      context
    );

    expect(result.notes).toEqual([
      {
        kind: 'RULE_SKIPPED',
        rowNumber: 2,
        recordId: '1',
        flagId: 6,
        message: 'Splitting of Work not checked for record 1: missing roadCategory',
        fields: ['roadCategory'],
      },
    ]);
  });

  it('accepts another similarity strategy', () => {
    const exact: StringSimilarity = {
      id: 'exact',
      compare: (a, b) => (a === b ? 1 : 0),
    };

    const result = new SplittingAnalyzer(exact).analyze(
      [
        piece('1', 10, 12, '2024-01-05'),
        piece('2', 12, 14, '2024-01-20'),
        piece('3', 14, 16, '2024-02-10'),
      ],
      context
    );
    expect(result.flagsByRecord.size).toBe(0);
  });
});
