import type { Flag, FlagDetailValue, FlagId, FlagSeverity } from './types.js';

export const FLAG_IDS: readonly FlagId[] = [1, 2, 3, 4, 5, 6, 7, 8];

export const FLAG_NAMES: Readonly<Record<FlagId, string>> = {
  1: 'Diversion of Funds',
  2: 'Wasteful Expenditure on Survey Works',
  3: 'Excess Expenditure Without Approval',
  4: 'Overlapping of Work',
  5: 'Delay in Completion of Work',
  6: 'Splitting of Work',
  7: 'Non-Recovery of Centage Charges',
  8: 'Unspent Balance Not Returned',
};

export const SEVERITY_RANK: Readonly<Record<FlagSeverity, number>> = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
};

export function createFlag(
  flagId: FlagId,
  severity: FlagSeverity,
  description: string,
  details: Record<string, FlagDetailValue>
): Flag {
  return Object.freeze({
    flagId,
    flagName: FLAG_NAMES[flagId],
    severity,
    description,
    details: Object.freeze({ ...details }),
  });
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
