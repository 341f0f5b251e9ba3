import { describe, it, expect } from 'vitest';
import {
  mapSheetRows,
  normalizeHeader,
  resolveColumn,
  resolveColumns,
} from '../engine/records/column-map.js';

describe('normalizeHeader', () => {
  it('drops case, punctuation and unit suffixes', () => {
    expect(normalizeHeader('Total Expenditure (Lakhs)')).toBe('totalexpenditure');
    expect(normalizeHeader('Original Time Limit in Days')).toBe('originaltimelimitindays');
    expect(normalizeHeader('Physical Progress (%)')).toBe('physicalprogress');
  });
});

describe('resolveColumn', () => {
  it('maps ledger headers onto record fields', () => {
    expect(resolveColumn('Sr. No.')).toBe('serialNo');
    expect(resolveColumn('Date of Work_Order')).toBe('workOrderDate');
    expect(resolveColumn('Administrative Approval Cost (Lakh)')).toBe('aaCost');
    expect(resolveColumn('budgetItemNo')).toBe('budgetItemNo');
  });

  it('returns null for unknown headers', () => {
    expect(resolveColumn('Remarks')).toBeNull();
  });
});

describe('resolveColumns', () => {
  it('reports required columns that are absent', () => {
    const resolution = resolveColumns(['Sr.', 'Remarks']);

    expect(resolution.unknownColumns).toEqual(['Remarks']);
    expect(resolution.missingColumns).toEqual(['budgetItemNo', 'workName', 'totalExpenditure']);
  });
});

describe('mapSheetRows', () => {
  it('re-keys rows and lists unrecognised headers once', () => {
    const sheet = mapSheetRows([
      {
        'Sr.': 1,
        'Budget Item No.': 'BI-1',
        'Name of the work': 'Resurfacing',
        'Total Expenditure (Lakhs)': 12.5,
        Remarks: 'checked',
      },
      { 'Sr.': 2, Remarks: '' },
    ]);

    expect(sheet.rows).toEqual([
      { serialNo: 1, budgetItemNo: 'BI-1', workName: 'Resurfacing', totalExpenditure: 12.5 },
      { serialNo: 2 },
    ]);
    expect(sheet.unknownColumns).toEqual(['Remarks']);
    expect(sheet.missingColumns).toEqual([]);
  });

  it('keeps the first non-blank cell when two headers share a field', () => {
    const sheet = mapSheetRows([{ 'Work Type': '', 'Work Category': 'Survey' }]);

    expect(sheet.rows[0]).toEqual({ workType: 'Survey' });
  });
});
