import { z } from 'zod';
import { parseLedgerDate } from '../engine/records/dates.js';

// Ledger cells arrive as strings, numbers, dates or blanks. Blank cells mean
// "absent" and become undefined before validation.
function blankToUndefined(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  if (typeof value === 'number' && Number.isNaN(value)) return undefined;
  return value;
}

function toNumber(value: unknown): unknown {
  const v = blankToUndefined(value);
  if (typeof v === 'string') {
    return Number(v.replace(/,/g, '').replace(/%$/, '').trim());
  }
  return v;
}

function toDate(value: unknown): unknown {
  const v = blankToUndefined(value);
  if (v instanceof Date || typeof v === 'string' || typeof v === 'number') {
    return parseLedgerDate(v);
  }
  return v;
}

function toText(value: unknown): unknown {
  const v = blankToUndefined(value);
  if (typeof v === 'number') return String(v);
  if (typeof v === 'string') return v.trim().replace(/\s+/g, ' ');
  return v;
}

const TRUE_WORDS = new Set(['yes', 'y', 'true', '1', 'deposit']);
const FALSE_WORDS = new Set(['no', 'n', 'false', '0']);

function toBoolean(value: unknown): unknown {
  const v = blankToUndefined(value);
  if (typeof v === 'number') return v === 1 ? true : v === 0 ? false : v;
  if (typeof v === 'string') {
    const word = v.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return v;
}

const ROAD_CATEGORY_ALIASES: Record<string, 'SH' | 'MDR' | 'NH'> = {
  SH: 'SH',
  'STATE HIGHWAY': 'SH',
  MDR: 'MDR',
  'MAJOR DISTRICT ROAD': 'MDR',
  NH: 'NH',
  'NATIONAL HIGHWAY': 'NH',
};

function toRoadCategory(value: unknown): unknown {
  const v = toText(value);
  if (typeof v !== 'string') return v;
  const key = v.toUpperCase().replace(/[.\-_]/g, ' ').replace(/\s+/g, ' ').trim();
  return ROAD_CATEGORY_ALIASES[key] ?? 'OTHER';
}

function toWorkType(value: unknown): unknown {
  const v = toText(value);
  if (typeof v !== 'string') return v;
  const word = v.toLowerCase();
  if (word.includes('survey')) return 'survey';
  if (word.includes('maint') || word.includes('repair')) return 'maintenance';
  if (word.includes('execution') || word.includes('construction') || word.includes('improvement')) {
    return 'execution';
  }
  return 'other';
}

const requiredText = (label: string) =>
  z.preprocess(toText, z.string({ required_error: `${label} is required` }).min(1));
const optionalText = z.preprocess(toText, z.string().optional());

const amount = z.number().finite().nonnegative();
const requiredAmount = (label: string) =>
  z.preprocess(toNumber, z.number({ required_error: `${label} is required` }).finite().nonnegative());
const optionalAmount = z.preprocess(toNumber, amount.optional());
const optionalDays = z.preprocess(toNumber, z.number().finite().int().nonnegative().optional());
const optionalDate = z.preprocess(toDate, z.date().optional());

export const WorkRecordSchema = z
  .object({
    serialNo: requiredText('Serial number'),
    budgetItemNo: requiredText('Budget item number'),
    workName: requiredText('Name of work'),
    workNameLocal: optionalText,

    headOfAccount: optionalText,
    expenditureHead: optionalText,

    aaCost: optionalAmount,
    contractCost: optionalAmount,
    totalExpenditure: requiredAmount('Total expenditure'),
    centageRecovered: optionalAmount,
    unspentBalance: optionalAmount,
    refundRecorded: z.preprocess(toBoolean, z.boolean().default(false)),

    aaDate: optionalDate,
    workOrderDate: optionalDate,
    originalTimeLimitDays: optionalDays,
    physicalCompletionDate: optionalDate,
    dlpDays: optionalDays,

    physicalProgressPercent: z.preprocess(toNumber, z.number().finite().min(0).max(100).optional()),

    roadCategory: z.preprocess(toRoadCategory, z.enum(['SH', 'MDR', 'NH', 'OTHER']).optional()),
    roadNumber: optionalText,
    chainageFrom: optionalAmount,
    chainageTo: optionalAmount,

    isDepositWork: z.preprocess(toBoolean, z.boolean().default(false)),
    workType: z.preprocess(
      toWorkType,
      z.enum(['survey', 'execution', 'maintenance', 'other']).default('execution')
    ),
  })
  .refine(
    (r) => r.chainageFrom === undefined || r.chainageTo === undefined || r.chainageFrom <= r.chainageTo,
    { message: 'Chainage from must not exceed chainage to', path: ['chainageFrom'] }
  );

export type WorkRecordInput = z.input<typeof WorkRecordSchema>;
export type ParsedWorkRecord = z.output<typeof WorkRecordSchema>;

export const WORK_RECORD_FIELDS = [
  'serialNo',
  'budgetItemNo',
  'workName',
  'workNameLocal',
  'headOfAccount',
  'expenditureHead',
  'aaCost',
  'contractCost',
  'totalExpenditure',
  'centageRecovered',
  'unspentBalance',
  'refundRecorded',
  'aaDate',
  'workOrderDate',
  'originalTimeLimitDays',
  'physicalCompletionDate',
  'dlpDays',
  'physicalProgressPercent',
  'roadCategory',
  'roadNumber',
  'chainageFrom',
  'chainageTo',
  'isDepositWork',
  'workType',
] as const;

export type WorkRecordField = (typeof WORK_RECORD_FIELDS)[number];
